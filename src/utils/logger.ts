/**
 * Stderr logging for sortbench.
 *
 * Reports go to stdout; everything here goes to stderr, one line per
 * entry. The threshold starts at SORTBENCH_LOG_LEVEL (default info) and
 * is changed with setLogLevel(). SORTBENCH_LOG_JSON=true switches to
 * JSON lines.
 */

/** Log level type */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

/** Log entry structure */
export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export type LogMethod = (msg: string, meta?: Record<string, unknown>) => void;

/** Logger interface */
export type Logger = Record<EntryLevel, LogMethod>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

const envLevel = process.env.SORTBENCH_LOG_LEVEL;

const state: { threshold: LogLevel; json: boolean } = {
  threshold: isLogLevel(envLevel) ? envLevel : 'info',
  json: process.env.SORTBENCH_LOG_JSON === 'true',
};

export function setLogLevel(level: LogLevel): void {
  state.threshold = level;
}

export function getLogLevel(): LogLevel {
  return state.threshold;
}

export function setJsonMode(enabled: boolean): void {
  state.json = enabled;
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

/**
 * Render an entry as `[HH:MM:SS] LEVEL message (k=v ...)`, or as JSON.
 */
export function formatEntry(entry: LogEntry, asJson: boolean = state.json): string {
  if (asJson) {
    return JSON.stringify(entry);
  }

  const clock = entry.timestamp.slice(11, 19);
  const line = `[${clock}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.meta === undefined || Object.keys(entry.meta).length === 0) {
    return line;
  }
  return `${line} (${formatMeta(entry.meta)})`;
}

function emit(level: EntryLevel, message: string, meta?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[state.threshold]) return;

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  process.stderr.write(`${formatEntry(entry)}\n`);
}

/**
 * Logger whose messages start with `[prefix]`, e.g. `[bench-runner]`.
 */
export function createLogger(prefix: string): Logger {
  const method =
    (level: EntryLevel): LogMethod =>
    (msg, meta) =>
      emit(level, `[${prefix}] ${msg}`, meta);

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}
