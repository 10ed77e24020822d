/**
 * Launcher Errors
 *
 * Every failure the CLI reports to the user is a LauncherError. The exitCode
 * is what the process ends with when the error reaches the command handler.
 */

export class LauncherError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'LauncherError';
  }
}

export class InterpreterNotFoundError extends LauncherError {
  constructor(public readonly candidates: readonly string[]) {
    super(
      `Python was not found on PATH (tried: ${candidates.join(', ')}). ` +
        'Install Python 3 and make sure it is on PATH.',
      1
    );
    this.name = 'InterpreterNotFoundError';
  }
}

export class StepFailedError extends LauncherError {
  /** The message without the command output, e.g. for one-line notices */
  public readonly summary: string;

  constructor(
    public readonly step: string,
    public readonly command: string,
    public readonly commandExitCode: number,
    /** Tail of the command's stderr, empty when it printed nothing */
    public readonly output: string = ''
  ) {
    const summary = `Step "${step}" failed: ${command} exited with code ${commandExitCode}`;
    super(output ? `${summary}\n${output}` : summary, commandExitCode || 1);
    this.name = 'StepFailedError';
    this.summary = summary;
  }
}

export class ConfigurationError extends LauncherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 1, options);
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
