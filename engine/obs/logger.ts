import type { AppConfig } from '../../shared/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  /* eslint-disable no-console */
  // stdout is reserved for command results
  if (level === 'warn') {
    console.warn(line);
  } else {
    console.error(line);
  }
  /* eslint-enable no-console */
};

const build = (
  threshold: number,
  sink: LogSink,
  bindings: Record<string, unknown>,
): Logger => {
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (level !== 'error' && levelWeights[level] < threshold) return;
    const payload = JSON.stringify({
      level,
      message,
      ts: new Date().toISOString(),
      ...bindings,
      ...meta,
    });
    sink(level, payload);
  };
  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (extra) => build(threshold, sink, { ...bindings, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>, sink: LogSink = consoleSink): Logger =>
  build(levelWeights[config.observability.logLevel], sink, {});
