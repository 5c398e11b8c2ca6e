import pino, { type Logger } from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel ?? (config.nodeEnv === 'production' ? 'info' : 'debug'),
  transport: config.nodeEnv === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    env: config.nodeEnv,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'password'],
    censor: '[REDACTED]',
  },
});

export type { Logger };

// Child loggers per module
export const createLogger = (module: string): Logger => logger.child({ module });
