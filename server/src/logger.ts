export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const resolveLogLevel = (): LogLevel => {
  const raw = (
    process.env.WAR_LOG_LEVEL ??
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === 'production' ? 'info' : 'debug')
  )
    .toString()
    .trim()
    .toLowerCase();

  return isLogLevel(raw) ? raw : 'info';
};

let minRank = LEVELS[resolveLogLevel()];

/** Override the level picked up from the environment at startup */
export const setLogLevel = (level: LogLevel): void => {
  minRank = LEVELS[level];
};

const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= minRank;

/** Context object for structured logging, correlated by session or peer */
export interface LogContext {
  sessionId?: string;
  peerId?: string;
  [key: string]: unknown;
}

const isLogContext = (arg: unknown): arg is LogContext => {
  return arg !== null && typeof arg === 'object' && !Array.isArray(arg) && !(arg instanceof Error);
};

const isCorrelated = (arg: unknown): arg is LogContext =>
  isLogContext(arg) && ('sessionId' in arg || 'peerId' in arg);

/**
 * Format structured context as key=value pairs for log correlation.
 */
const formatContext = (context: LogContext): string => {
  return Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
};

type Sink = (...args: unknown[]) => void;

const emit = (level: LogLevel, sink: Sink, args: unknown[]): void => {
  if (!shouldLog(level)) {
    return;
  }
  // A trailing context with a correlation id is rendered as key=value pairs
  const lastArg = args[args.length - 1];
  if (args.length >= 2 && isCorrelated(lastArg)) {
    sink(...args.slice(0, -1), formatContext(lastArg));
  } else {
    sink(...args);
  }
};

export const logDebug = (...args: unknown[]): void => emit('debug', console.debug, args);

export const logInfo = (...args: unknown[]): void => emit('info', console.log, args);

export const logWarn = (...args: unknown[]): void => emit('warn', console.warn, args);

export const logError = (...args: unknown[]): void => emit('error', console.error, args);
