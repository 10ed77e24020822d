/**
 * Doctor
 *
 * Read-only health check of a project: finds the interpreter, inspects the
 * venv and project files, and asks the venv whether streamlit is importable.
 * Nothing is created or installed.
 */
import { existsSync } from 'node:fs';
import type { LaunchOptions } from '../config/options.js';
import { InterpreterNotFoundError } from '../errors.js';
import { inspectEnvFile } from '../env/dotenv.js';
import { detectInterpreter } from '../python/interpreter.js';
import { activationEnv, venvLayout } from '../python/venv.js';
import type { CommandRunner } from '../process/runner.js';

export type CheckLevel = 'ok' | 'warn' | 'error';

export interface DoctorCheck {
  name: string;
  level: CheckLevel;
  message: string;
}

export interface DoctorContext {
  runner: CommandRunner;
  settingsPath: string | null;
  baseEnv?: NodeJS.ProcessEnv;
}

const LEVEL_PREFIX: Record<CheckLevel, string> = {
  ok: '✅',
  warn: '⚠️ ',
  error: '❌',
};

export async function runDoctor(options: LaunchOptions, context: DoctorContext): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];
  const baseEnv = context.baseEnv ?? process.env;

  checks.push(
    context.settingsPath
      ? { name: 'settings', level: 'ok', message: `Using ${context.settingsPath}` }
      : { name: 'settings', level: 'ok', message: 'No pylaunch.yaml found, using defaults' }
  );

  try {
    const interpreter = await detectInterpreter(options.candidates, context.runner, baseEnv);
    checks.push({
      name: 'interpreter',
      level: 'ok',
      message: `${interpreter.command} (Python ${interpreter.version ?? 'unknown'})`,
    });
  } catch (error) {
    if (!(error instanceof InterpreterNotFoundError)) throw error;
    checks.push({ name: 'interpreter', level: 'error', message: error.message });
  }

  const layout = venvLayout(options.venvDir, options.platform);
  const venvExists = existsSync(options.venvDir);
  checks.push(
    venvExists
      ? { name: 'venv', level: 'ok', message: `Virtual environment at ${options.venvDir}` }
      : { name: 'venv', level: 'warn', message: `No virtual environment at ${options.venvDir}; run "pylaunch setup"` }
  );

  const venvPythonExists = venvExists && existsSync(layout.python);
  if (venvExists) {
    checks.push(
      venvPythonExists
        ? { name: 'venv-python', level: 'ok', message: layout.python }
        : { name: 'venv-python', level: 'warn', message: `Missing ${layout.python}; the venv looks incomplete` }
    );
  }

  checks.push(
    existsSync(options.requirementsFile)
      ? { name: 'requirements', level: 'ok', message: options.requirementsFile }
      : { name: 'requirements', level: 'warn', message: `Requirements file not found: ${options.requirementsFile}` }
  );

  const envFile = inspectEnvFile(options.envFile);
  checks.push(
    envFile.error
      ? { name: 'env-file', level: 'warn', message: `Cannot read ${options.envFile}: ${envFile.error}` }
      : envFile.exists
      ? {
          name: 'env-file',
          level: 'ok',
          message: `${options.envFile} (${Object.keys(envFile.variables).length} variable(s))`,
        }
      : { name: 'env-file', level: 'ok', message: `No ${options.envFile}` }
  );

  checks.push(
    existsSync(options.script)
      ? { name: 'script', level: 'ok', message: options.script }
      : { name: 'script', level: 'error', message: `UI script not found: ${options.script}` }
  );

  if (venvPythonExists) {
    const result = await context.runner.run(layout.python, ['-c', 'import streamlit; print(streamlit.__version__)'], {
      cwd: options.projectDir,
      env: activationEnv(layout, baseEnv, options.platform),
    });
    checks.push(
      result.exitCode === 0
        ? { name: 'streamlit', level: 'ok', message: `streamlit ${result.stdout.trim()}` }
        : { name: 'streamlit', level: 'warn', message: 'streamlit is not importable in the venv; run "pylaunch setup"' }
    );
  }

  return checks;
}

export function formatReport(checks: readonly DoctorCheck[]): string {
  const lines = checks.map((check) => `${LEVEL_PREFIX[check.level]} ${check.name}: ${check.message}`);
  return ['== pylaunch doctor ==', ...lines, '== done =='].join('\n');
}

export function doctorExitCode(checks: readonly DoctorCheck[]): number {
  return checks.some((check) => check.level === 'error') ? 1 : 0;
}
