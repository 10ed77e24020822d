/**
 * Interpreter Detection
 *
 * Finds the first working Python interpreter among the configured candidates
 * by running `<candidate> --version`. Python 2 and some 3.x builds print the
 * version banner on stderr, so both streams are checked.
 */
import { InterpreterNotFoundError } from '../errors.js';
import { parseCommand, type CommandRunner } from '../process/runner.js';
import { launcherLogger } from '../utils/logger.js';

export interface PythonInterpreter {
  /** The candidate string as configured, e.g. "py -3" */
  command: string;
  file: string;
  /** Leading arguments the candidate carries ("-3" for the Windows launcher) */
  args: string[];
  version: string | null;
}

const VERSION_PATTERN = /Python\s+(\d+(?:\.\d+)*\S*)/;

export function parsePythonVersion(output: string): string | null {
  return VERSION_PATTERN.exec(output)?.[1] ?? null;
}

export async function detectInterpreter(
  candidates: readonly string[],
  runner: CommandRunner,
  env?: NodeJS.ProcessEnv
): Promise<PythonInterpreter> {
  for (const command of candidates) {
    const [file, args] = parseCommand(command);
    if (!file) continue;

    const result = await runner.run(file, [...args, '--version'], { env });
    if (result.exitCode !== 0) {
      launcherLogger.debug({ command, exitCode: result.exitCode }, 'Interpreter candidate rejected');
      continue;
    }

    const version = parsePythonVersion(result.stdout) ?? parsePythonVersion(result.stderr);
    launcherLogger.info({ command, version }, 'Interpreter found');
    return { command, file, args, version };
  }

  throw new InterpreterNotFoundError(candidates);
}
