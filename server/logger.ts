import type { LogLevel } from './config.ts';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/** Destination for formatted log lines; console by default. */
export type LogSink = (level: LogLevel, line: string) => void;

export type Logger = {
  debug: (module: string, message: string) => void;
  info: (module: string, message: string) => void;
  warn: (module: string, message: string) => void;
  error: (module: string, message: string) => void;
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Format one log line as `ISO | level | module | message`.
 */
export function formatLogLine(stamp: Date, level: LogLevel, module: string, message: string): string {
  return `${stamp.toISOString()} | ${level} | ${module} | ${message}`;
}

export function createLogger(level: LogLevel, sink: LogSink = consoleSink, now: () => Date = () => new Date()): Logger {
  const threshold = LEVELS[level] ?? LEVELS.info;
  const log = (lvl: LogLevel, module: string, message: string) => {
    if (LEVELS[lvl] < threshold) return;
    sink(lvl, formatLogLine(now(), lvl, module, message));
  };
  return {
    debug: (module, message) => log('debug', module, message),
    info: (module, message) => log('info', module, message),
    warn: (module, message) => log('warn', module, message),
    error: (module, message) => log('error', module, message)
  };
}
