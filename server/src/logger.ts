import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel,
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
  // Redact credentials forwarded to the routing service
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'apiKey'],
    censor: '[REDACTED]',
  },
});

// Create child loggers for different modules
export const createLogger = (module: string) => logger.child({ module });
