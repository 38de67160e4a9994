export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'json' | 'pretty';
export type LogContext = Record<string, unknown>;

export interface LogOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: (line: string) => void;
}

export interface Logger {
  child(ctx: LogContext): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function levelIndex(level: LogLevel): number {
  return LEVELS.indexOf(level);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

export function parseLogFormat(value: string | undefined, fallback: LogFormat = 'pretty'): LogFormat {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'json' || normalized === 'pretty') {
    return normalized;
  }
  return fallback;
}

// Logs go to stderr so CLI stdout only carries results.
function defaultSink(line: string): void {
  console.error(line);
}

export function formatLogLine(
  format: LogFormat,
  level: LogLevel,
  msg: string,
  fields: LogContext,
  timestamp: string
): string {
  if (format === 'json') {
    return JSON.stringify({ ts: timestamp, level, msg, ...fields });
  }

  const { service, ...rest } = fields;
  const head = `[${timestamp}] ${level.toUpperCase()}${typeof service === 'string' ? ` ${service}` : ''}`;
  const ctxStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${head} - ${msg}${ctxStr}`;
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const level = opts.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const format = opts.format ?? parseLogFormat(process.env.LOG_FORMAT);
  const sink = opts.sink ?? defaultSink;

  function create(base: LogContext): Logger {
    const emit = (entryLevel: LogLevel, msg: string, extra?: LogContext): void => {
      if (level === 'silent' || levelIndex(entryLevel) < levelIndex(level)) {
        return;
      }
      sink(formatLogLine(format, entryLevel, msg, { ...base, ...extra }, new Date().toISOString()));
    };

    return {
      child: (ctx) => create({ ...base, ...ctx }),
      trace: (msg, ctx) => emit('trace', msg, ctx),
      debug: (msg, ctx) => emit('debug', msg, ctx),
      info: (msg, ctx) => emit('info', msg, ctx),
      warn: (msg, ctx) => emit('warn', msg, ctx),
      error: (msg, ctx) => emit('error', msg, ctx)
    };
  }

  return create(service ? { service } : {});
}
