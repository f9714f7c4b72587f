/**
 * pino logging
 *
 * Every log line goes to stderr: stdout is reserved for CLI results. Logging
 * is switched off under Vitest.
 */

import pino from 'pino';
import { config, type Config } from '../config/index.js';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/**
 * Effective level: the debug flag wins over `level`
 */
export function resolveLogLevel(logging: Config['logging']): pino.Level {
  return logging.debug ? 'debug' : logging.level;
}

const baseOptions: pino.LoggerOptions = {
  level: resolveLogLevel(config.logging),
  enabled: !isTest,
  serializers: { err: pino.stdSerializers.err },
};

function createRootLogger(): pino.Logger {
  if (isTest) {
    // no transport worker thread in tests
    return pino(baseOptions);
  }

  if (config.runtime.nodeEnv === 'production') {
    return pino(baseOptions, pino.destination({ dest: 2, sync: false }));
  }

  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        destination: 2,
      },
    },
  });
}

export const logger = createRootLogger();

/**
 * Child logger tagged with `component`, e.g. 'scheme' or 'classifier'
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
