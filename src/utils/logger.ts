import type { LogLevel } from '../config';

type LogMeta = Record<string, unknown>;

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
  const timestamp = new Date().toISOString();
  const base = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
}

export function createLogger(configured: LogLevel, sink: LogSink = console) {
  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (levelPriority[level] < levelPriority[configured]) return;
    const line = formatMessage(level, message, meta);
    if (level === 'error') {
      sink.error(line);
      return;
    }
    if (level === 'warn') {
      sink.warn(line);
      return;
    }
    if (level === 'debug') {
      sink.debug(line);
      return;
    }
    sink.log(line);
  };

  return {
    debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
    info: (message: string, meta?: LogMeta) => log('info', message, meta),
    warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
    error: (message: string, meta?: LogMeta) => log('error', message, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
