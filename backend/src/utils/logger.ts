import { LOG_LEVEL, NODE_ENV } from '../config/env';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger whose lines carry `scope` */
  child(scope: string): Logger;
}

function writeLine(stream: NodeJS.WriteStream, line: string): void {
  stream.write(`${line}\n`);
}

function output(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[LOG_LEVEL]) return;

  if (NODE_ENV === 'production') {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      ...(scope && { scope }),
      message,
      ...(meta ?? {}),
    });
    writeLine(level === 'error' || level === 'warn' ? process.stderr : process.stdout, line);
    return;
  }

  const prefix = scope ? `[${level.toUpperCase()}] [${scope}]` : `[${level.toUpperCase()}]`;
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  writeLine(level === 'error' || level === 'warn' ? process.stderr : process.stdout, `${prefix} ${message}${suffix}`);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: NODE_ENV === 'development' ? error.stack : undefined,
    };
  }

  return {
    message: String(error),
  };
}

function createLogger(scope?: string): Logger {
  return {
    debug(message, meta) {
      output('debug', scope, message, meta);
    },
    info(message, meta) {
      output('info', scope, message, meta);
    },
    warn(message, meta) {
      output('warn', scope, message, meta);
    },
    error(message, meta) {
      output('error', scope, message, meta);
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
