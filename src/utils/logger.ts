export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = {
  createdAt: string;
  level: LogLevel;
  message: string;
};

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  entries(level?: LogLevel): LogEntry[];
};

type LoggerOptions = {
  tag?: string;
  verbose?: boolean;
  sink?: LogSink;
};

/**
 * Console logger that also keeps every entry of the run, so skipped files and
 * other diagnostics can be inspected after the pipeline finishes.
 * Debug lines are recorded but only printed when verbose.
 */
export function createLogger({ tag = 'menu', verbose = false, sink = console }: LoggerOptions = {}): Logger {
  const entries: LogEntry[] = [];

  const write = (level: LogLevel, message: string) => {
    entries.push({ createdAt: new Date().toISOString(), level, message });
    const line = `[${tag}] ${level.toUpperCase()} ${message}`;
    switch (level) {
      case 'debug':
        if (verbose) sink.log(line);
        break;
      case 'info':
        sink.log(line);
        break;
      case 'warn':
        sink.warn(line);
        break;
      case 'error':
        sink.error(line);
        break;
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    entries: (level) => (level ? entries.filter((entry) => entry.level === level) : [...entries]),
  };
}
