/**
 * Logger
 *
 * Root pino logger for the engine. Output depends on NODE_ENV:
 * - development: pino-pretty, colorized
 * - production: one JSON object per line
 * - test: silent unless LOG_LEVEL is set
 *
 * Usage:
 *   import { createComponentLogger } from '../shared/logger';
 *   const log = createComponentLogger('scorer');
 *   log.info({ overall: 72.5 }, 'Match scored');
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

type RuntimeMode = 'development' | 'production' | 'test';

function detectMode(env: NodeJS.ProcessEnv): RuntimeMode {
  if (env.NODE_ENV === 'test' || env.VITEST === 'true') {
    return 'test';
  }
  return env.NODE_ENV === 'production' ? 'production' : 'development';
}

const DEFAULT_LEVEL: Record<RuntimeMode, string> = {
  development: 'debug',
  production: 'info',
  test: 'silent'
};

/**
 * Pino options for the given environment
 */
export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const mode = detectMode(env);
  const options: LoggerOptions = {
    level: env.LOG_LEVEL || DEFAULT_LEVEL[mode],
    base: { env: mode },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', 'token', 'secret', '*.apiKey', '*.token', '*.secret'],
      remove: true
    }
  };

  if (mode === 'development') {
    return {
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'hostname,env' }
      }
    };
  }

  return {
    ...options,
    formatters: {
      level: label => ({ level: label })
    }
  };
}

export const logger: Logger = pino(buildLoggerOptions());

export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  /** Extraction, scoring and optimization audit trail */
  engine: createComponentLogger('ats-engine'),
  llm: createComponentLogger('llm'),
  /** AppError records */
  errors: createComponentLogger('errors'),
  renderer: createComponentLogger('renderer')
};

export default logger;
