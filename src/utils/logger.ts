/**
 * Structured logging utility using pino
 *
 * - Level from config (LOG_LEVEL)
 * - JSON lines in production, pino-pretty elsewhere
 * - Component child loggers
 * - Credentials and binary payloads redacted
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Suppress logs under the test runner to keep output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const loggingEnabled = !isTest;

const level = config.logging.debug ? 'debug' : config.logging.level;

export const REDACTED_PATHS = [
  'password',
  'pwHash',
  'pwSalt',
  'imagenBytes',
  'connectionString',
  'secret',
  'token',
  '*.password',
  '*.pwHash',
  '*.pwSalt',
  '*.imagenBytes',
  '*.connectionString',
  '*.secret',
  '*.token',
];

const pinoOptions: pino.LoggerOptions = {
  level,
  enabled: loggingEnabled,
  redact: {
    paths: REDACTED_PATHS,
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

const usePretty = loggingEnabled && config.runtime.nodeEnv !== 'production';

// Logs go to stderr so CLI output on stdout stays machine-readable
export const logger = usePretty
  ? pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(pinoOptions, pino.destination({ dest: 2, sync: false }));

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'init', 'pg-adapter', 'reports')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
