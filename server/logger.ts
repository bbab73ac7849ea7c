export type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLevel(value: string): value is Level {
  return Object.hasOwn(order, value);
}

function resolveLevel(): Level {
  const fromEnv = (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
  return isLevel(fromEnv) ? fromEnv : 'info';
}

function shouldLog(level: Level) {
  return order[level] >= order[resolveLevel()];
}

export function formatLogLine(level: Exclude<Level, 'silent'>, msg: unknown, source?: string, time = new Date()) {
  const text = msg instanceof Error ? msg.message : String(msg);
  return `[${time.toISOString()}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${text}`;
}

export const logger = {
  debug: (msg: unknown, source?: string) => {
    if (shouldLog('debug')) console.debug(formatLogLine('debug', msg, source));
  },
  info: (msg: unknown, source?: string) => {
    if (shouldLog('info')) console.info(formatLogLine('info', msg, source));
  },
  warn: (msg: unknown, source?: string) => {
    if (shouldLog('warn')) console.warn(formatLogLine('warn', msg, source));
  },
  error: (msg: unknown, source?: string) => {
    if (shouldLog('error')) console.error(formatLogLine('error', msg, source));
  }
};
