import pino, { type Logger, type LoggerOptions } from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'headers["x-api-key"]',
  'headers["X-RapidAPI-Key"]',
  'headers.authorization'
];

function baseOptions(): LoggerOptions {
  const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

  const options: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: redactPaths, censor: '[redacted]' }
  };

  if (process.env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' }
    };
  }

  return options;
}

let root: Logger | undefined;

function getRootLogger(): Logger {
  if (!root) root = pino(baseOptions());
  return root;
}

/**
 * Module-scoped logger, e.g. `createLogger('comps')`.
 */
export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

export type { Logger };
