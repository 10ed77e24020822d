import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

const LOG_DIR = process.env['PYLAUNCH_LOG_DIR'] ?? join(process.cwd(), 'logs');

function createLogger(name: string) {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }

  const logFile = join(LOG_DIR, `${name}.log`);

  return pino(
    {
      name,
      level: process.env['LOG_LEVEL'] ?? 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: logFile,
      sync: false,
    })
  );
}

// Separate loggers for the bootstrap pipeline and the terminal UI
export const launcherLogger = createLogger('launcher');
export const uiLogger = createLogger('ui');

export function setupErrorHandlers(logger: pino.Logger) {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    // Give time for log to flush
    setTimeout(() => process.exit(1), 100);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}
