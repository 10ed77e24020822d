import { stepLabel, type LaunchEvent } from './types.js';

const STATUS_MARK = {
  ok: '[ok]',
  skipped: '[skip]',
  failed: '[fail]',
} as const;

/**
 * One console line per event. Step starts are silent, and errors are left to
 * the command that ends the process.
 */
export function formatEvent(event: LaunchEvent): string | null {
  switch (event.type) {
    case 'step_start':
      return null;
    case 'step_end': {
      const line = `${STATUS_MARK[event.status]} ${stepLabel(event.step)}`;
      return event.detail ? `${line}: ${event.detail}` : line;
    }
    case 'info':
      return `[info] ${event.message}`;
    case 'warning':
      return `[warn] ${event.message}`;
    case 'error':
      return null;
    case 'done':
      return event.result.failedSteps.length > 0
        ? `Environment ready with failed steps: ${event.result.failedSteps.join(', ')}`
        : 'Environment ready';
  }
}

export interface ConsoleLike {
  log(message: string): void;
  error(message: string): void;
}

export function createConsoleReporter(out: ConsoleLike = console): (event: LaunchEvent) => void {
  return (event) => {
    const line = formatEvent(event);
    if (line === null) return;
    if (event.type === 'warning') {
      out.error(line);
    } else {
      out.log(line);
    }
  };
}
