/**
 * pip Operations
 *
 * pip always runs as `<venv python> -m pip` so the venv's own pip is used,
 * whatever is first on PATH.
 */
import { formatCommand, type CommandResult, type CommandRunner, type RunOptions } from '../process/runner.js';

export interface PipInstallConfig {
  packages?: string[];
  requirementsFile?: string;
  upgrade?: boolean;
  indexUrl?: string;
}

export interface PipOutcome extends CommandResult {
  command: string;
}

export function pipInstallArgs(config: PipInstallConfig): string[] {
  const args = ['-m', 'pip', 'install'];

  if (config.upgrade) {
    args.push('--upgrade');
  }

  if (config.requirementsFile) {
    args.push('-r', config.requirementsFile);
  } else {
    args.push(...(config.packages ?? []));
  }

  if (config.indexUrl) {
    args.push('--index-url', config.indexUrl);
  }

  return args;
}

async function runPip(
  python: string,
  config: PipInstallConfig,
  runner: CommandRunner,
  options: RunOptions
): Promise<PipOutcome> {
  const args = pipInstallArgs(config);
  const result = await runner.run(python, args, options);
  return { ...result, command: formatCommand(python, args) };
}

export function upgradePip(python: string, runner: CommandRunner, options: RunOptions = {}): Promise<PipOutcome> {
  return runPip(python, { packages: ['pip'], upgrade: true }, runner, options);
}

export function installRequirements(
  python: string,
  requirementsFile: string,
  runner: CommandRunner,
  options: RunOptions & { indexUrl?: string } = {}
): Promise<PipOutcome> {
  const { indexUrl, ...runOptions } = options;
  return runPip(python, { requirementsFile, indexUrl }, runner, runOptions);
}
