// Scoped stderr logger: `[Scope:LEVEL] message {"field":...}`
// Debug lines are dropped unless PIPELINE_DEBUG is set; key/token fields are masked.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  debug?: boolean;
  sink?: (line: string) => void;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'y']);

export function isDebugEnabled(value: string | undefined = process.env.PIPELINE_DEBUG): boolean {
  return TRUTHY.has((value ?? '').trim().toLowerCase());
}

export function maskSecret(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value.length <= 12) return '***';
  return `${value.slice(0, 6)}...${value.slice(-4)}`;
}

function sanitize(data: LogFields): LogFields {
  const safe: LogFields = {};
  for (const [key, value] of Object.entries(data)) {
    const lower = key.toLowerCase();
    safe[key] = lower.includes('key') || lower.includes('token') ? maskSecret(value) : value;
  }
  return safe;
}

export function formatLogLine(scope: string, level: LogLevel, message: string, data?: LogFields): string {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(sanitize(data))}`;
  }
  return `${prefix} ${message}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? isDebugEnabled();
  const sink = options.sink ?? ((line: string) => console.error(line));

  const write = (level: LogLevel, message: string, data?: LogFields): void => {
    if (level === 'debug' && !debugEnabled) return;
    sink(formatLogLine(scope, level, message, data));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (child) => createLogger(`${scope}:${child}`, { debug: debugEnabled, sink }),
  };
}

/** Drops everything */
export const silentLogger: Logger = createLogger('silent', { debug: false, sink: () => undefined });
