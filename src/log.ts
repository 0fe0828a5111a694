import pino, { type Logger } from 'pino';

// pretty print outside production and test runs
const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const transport = usePretty
    ? {
          target: 'pino-pretty',
          options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
          },
      }
    : undefined;

/**
 * Package logger. Level is read from `LOG_LEVEL`, defaulting to `info`.
 */
export const logger: Logger = pino({
    name: 'polynav',
    level: process.env.LOG_LEVEL || 'info',
    transport,
});

export type { Logger };
