/**
 * @cubeload/core — Structured Logger
 *
 * One JSON line per entry: `{ ts, level, ns, msg, data? }`.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * First recognised value of `CUBELOAD_LOG_LEVEL`, then `LOG_LEVEL`.
 * Defaults to `info`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  for (const raw of [env['CUBELOAD_LOG_LEVEL'], env['LOG_LEVEL']]) {
    const candidate = raw?.trim().toLowerCase();
    if (candidate !== undefined && isLogLevel(candidate)) return candidate;
  }
  return 'info';
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export interface LoggerOptions {
  /** Overrides the level read from the environment */
  level?: LogLevel;
  env?: NodeJS.ProcessEnv;
}

// Errors have no enumerable fields and would serialize as {}
function toLogData(data: unknown): unknown {
  if (data instanceof Error) return { name: data.name, message: data.message };
  return data;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? resolveLogLevel(options.env));

  const write = (level: LogLevel, msg: string, data?: unknown) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = toLogData(data);
    const line = JSON.stringify(entry) + '\n';
    if (level === 'error') process.stderr.write(line);
    else process.stdout.write(line);
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
