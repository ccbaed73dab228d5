export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel => ORDER.some((level) => level === value);

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = raw?.trim().toLowerCase() ?? '';
  return isLogLevel(value) ? value : fallback;
}

const noop = () => {};

/** Silences console methods below `level`. Returns a function restoring the originals. */
export function applyLogLevel(level: LogLevel, target: Console = console): () => void {
  const original = {
    debug: target.debug,
    info: target.info,
    warn: target.warn,
    error: target.error,
  };
  const threshold = ORDER.indexOf(level);
  if (threshold > 0) target.debug = noop;
  if (threshold > 1) target.info = noop;
  if (threshold > 2) target.warn = noop;

  return () => {
    target.debug = original.debug;
    target.info = original.info;
    target.warn = original.warn;
    target.error = original.error;
  };
}
