import { pino, type Logger } from 'pino';

let logger: Logger | undefined;

/**
 * Build the process logger, or retune the level of the one already built.
 */
export function createLogger(level = 'info'): Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }

  // Worker-thread transports are skipped under vitest
  const pretty = process.env.NODE_ENV !== 'test';

  logger = pino({
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });

  return logger;
}

export function getLogger(): Logger {
  if (!logger) return createLogger(process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  return logger;
}
