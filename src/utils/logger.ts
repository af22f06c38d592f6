/**
 * Structured logging to stderr.
 *
 * Every entry is one JSON line so stdout stays reserved for the conversation.
 * debug/info entries are only written when verbose logging is enabled.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  [field: string]: unknown;
}

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

let verbose = false;
let sink: LogSink = (line) => console.error(line);

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

/**
 * Redirect log output. Returns the previous sink so callers can restore it.
 */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
    if ((level === 'debug' || level === 'info') && !verbose) {
      return;
    }

    // Reserved keys go last so caller fields cannot overwrite them
    const entry: LogEntry = {
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
    };
    sink(JSON.stringify(entry));
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
