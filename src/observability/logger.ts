import pino from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Silent for cleaner test output
 *
 * Secret keys are redacted wherever they appear in a logged object.
 * Every line carries the request's log context (correlation ID and friends).
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  mixin: () => ({ ...getLogContext() }),
  base: {
    service: 'asset-issuance',
    env: config.nodeEnv,
  },
  redact: {
    paths: ['secretKey', '*.secretKey', '*.*.secretKey', 'secret', '*.secret'],
    censor: '[REDACTED]',
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

// Child logger factory for service-specific logging
export const createServiceLogger = (serviceName: string) => {
  return logger.child({ service: serviceName });
};
