export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LoggerThreshold = LogLevel | 'silent';

const LOG_LEVEL_PRIORITY: Record<LoggerThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (level: LogLevel, message: string) => void;

export interface LoggerOptions {
  level?: LoggerThreshold;
  sink?: LogSink;
}

function consoleSink(level: LogLevel, message: string): void {
  // status on stdout, problems on stderr
  if (level === 'warn' || level === 'error') {
    console.error(`${level === 'warn' ? 'warning' : 'error'}: ${message}`);
    return;
  }
  console.log(message);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const emit = (level: LogLevel, message: string): void => {
    if (LOG_LEVEL_PRIORITY[level] >= threshold) {
      sink(level, message);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message)
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
