/**
 * Command Runner
 *
 * Every external command the launcher starts (interpreter probes, venv
 * creation, pip, Streamlit) goes through a CommandRunner. The runner never
 * throws for a failed command: a non-zero exit, a signal, or a missing
 * executable all come back as a non-zero exitCode so each step decides for
 * itself what a failure means.
 *
 * Dependencies:
 * - execa: process execution with a promise API and predictable results
 */
import { execa } from 'execa';
import { launcherLogger } from '../utils/logger.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** 'inherit' hands the terminal to the child; output is not captured. */
  stdio?: 'pipe' | 'inherit';
  /** Aborting terminates the child; the result then carries a non-zero exitCode. */
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Split a configured command such as "py -3" into executable and leading args. */
export function parseCommand(command: string): [string, string[]] {
  const [file = '', ...args] = command.trim().split(/\s+/);
  return [file, args];
}

/** Last non-empty lines of captured output, for error messages and logs. */
export function outputTail(output: string, lines = 5): string {
  return output
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .slice(-lines)
    .join('\n');
}

/** Render a command line for messages. Arguments with spaces are quoted. */
export function formatCommand(file: string, args: readonly string[] = []): string {
  return [file, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}

export class ExecaRunner implements CommandRunner {
  async run(file: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    launcherLogger.debug({ file, args, cwd: options.cwd }, 'Running command');

    const result = await execa(file, [...args], {
      cwd: options.cwd,
      env: options.env,
      // The caller passes the complete environment (activated venv, PYTHONPATH)
      extendEnv: options.env === undefined,
      stdio: options.stdio ?? 'pipe',
      cancelSignal: options.signal,
      reject: false,
    });

    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    if (result.failed) {
      launcherLogger.debug(
        {
          file,
          exitCode: result.exitCode,
          signal: result.signal,
          canceled: result.isCanceled,
          stderr: outputTail(stderr, 20),
        },
        'Command failed'
      );
    }

    return {
      // undefined when the executable could not be started or was killed
      exitCode: result.exitCode ?? 1,
      stdout,
      stderr,
    };
  }
}
