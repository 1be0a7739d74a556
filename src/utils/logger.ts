import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Error instances stringify to {} under JSON.stringify
function serialise(meta: Meta): Meta {
  return Object.fromEntries(Object.entries(meta).map(([k, v]) =>
    [k, v instanceof Error ? { name: v.name, message: v.message } : v]));
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const m = meta ? serialise(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...m })
    : m ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(m)}`
        : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
  child(context: Meta): Logger;
}

function scoped(context: Meta): Logger {
  const withCtx = (meta?: Meta): Meta => ({ ...context, ...meta });
  return {
    debug: (msg, meta) => log('debug', msg, withCtx(meta)),
    info:  (msg, meta) => log('info',  msg, withCtx(meta)),
    warn:  (msg, meta) => log('warn',  msg, withCtx(meta)),
    error: (msg, meta) => log('error', msg, withCtx(meta)),
    child: (more) => scoped({ ...context, ...more }),
  };
}

export const logger: Logger = {
  debug: (msg, meta) => log('debug', msg, meta),
  info:  (msg, meta) => log('info',  msg, meta),
  warn:  (msg, meta) => log('warn',  msg, meta),
  error: (msg, meta) => log('error', msg, meta),
  child: (context) => scoped(context),
};
