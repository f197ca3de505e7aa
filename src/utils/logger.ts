import pino, { type LoggerOptions } from 'pino';

/**
 * Application logger using Pino
 *
 * Pretty printed in development, JSON in production, silent under test
 * unless LOG_LEVEL says otherwise.
 */

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test';
const isDevelopment = env !== 'production' && !isTest;

export const loggerOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),

  // Pretty print in development, JSON in production
  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },

  // Faults are logged under `error` as well as `err`
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

export const logger = pino(loggerOptions);

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
