import pino from 'pino';

import { config } from '../config';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Silent unless LOG_LEVEL says otherwise
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'timelock-escrow',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export type Logger = pino.Logger;

// Child logger factory for component-specific logging
export const createServiceLogger = (component: string): Logger => {
  return logger.child({ component });
};
