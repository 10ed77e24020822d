/**
 * Virtual Environment
 *
 * Creates the project's virtual environment when it is missing and builds the
 * environment variables that "activate" it for child processes. An existing
 * venv path is always reused as-is: it is never recreated or overwritten.
 */
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { formatCommand, type CommandRunner } from '../process/runner.js';
import type { PythonInterpreter } from './interpreter.js';
import { launcherLogger } from '../utils/logger.js';

export interface VenvLayout {
  root: string;
  binDir: string;
  python: string;
}

export interface VenvResult {
  layout: VenvLayout;
  created: boolean;
  /** Set when creation was attempted and the command failed */
  failure?: { command: string; exitCode: number; stderr: string };
}

export function venvLayout(venvDir: string, platform: NodeJS.Platform): VenvLayout {
  const binDir = platform === 'win32' ? join(venvDir, 'Scripts') : join(venvDir, 'bin');
  const python = platform === 'win32' ? join(binDir, 'python.exe') : join(binDir, 'python');
  return { root: venvDir, binDir, python };
}

export async function ensureVirtualEnvironment(
  interpreter: PythonInterpreter,
  venvDir: string,
  runner: CommandRunner,
  options: { platform: NodeJS.Platform; cwd: string; env?: NodeJS.ProcessEnv; signal?: AbortSignal }
): Promise<VenvResult> {
  const layout = venvLayout(venvDir, options.platform);

  if (existsSync(venvDir)) {
    launcherLogger.info({ venvDir }, 'Reusing existing virtual environment');
    return { layout, created: false };
  }

  const args = [...interpreter.args, '-m', 'venv', venvDir];
  const result = await runner.run(interpreter.file, args, {
    cwd: options.cwd,
    env: options.env,
    signal: options.signal,
  });

  if (result.exitCode !== 0) {
    const command = formatCommand(interpreter.file, args);
    launcherLogger.error({ command, exitCode: result.exitCode, stderr: result.stderr }, 'venv creation failed');
    return { layout, created: false, failure: { command, exitCode: result.exitCode, stderr: result.stderr } };
  }

  launcherLogger.info({ venvDir }, 'Created virtual environment');
  return { layout, created: true };
}

/**
 * Environment for processes that should run inside the venv. On Windows the
 * PATH variable is usually spelled "Path"; the existing key is preserved.
 */
export function activationEnv(
  layout: VenvLayout,
  baseEnv: NodeJS.ProcessEnv,
  platform: NodeJS.Platform
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  const pathKey =
    platform === 'win32' ? (Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'Path') : 'PATH';
  const separator = platform === 'win32' ? ';' : ':';
  const current = env[pathKey];

  env[pathKey] = current ? `${layout.binDir}${separator}${current}` : layout.binDir;
  env['VIRTUAL_ENV'] = layout.root;
  delete env['PYTHONHOME'];

  return env;
}
