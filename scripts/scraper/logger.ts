export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseLevel = (v: string | undefined): LogLevel =>
  ORDER.find((l) => l === (v ?? '').trim().toLowerCase()) ?? 'info';

const LOG_LEVEL = parseLevel(process.env.SCRAPER_LOG_LEVEL);

export const now = () => new Date().toISOString();
export const log = (...args: unknown[]) => console.log(`[${now()}]`, ...args);

function write(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (ORDER.indexOf(level) < ORDER.indexOf(LOG_LEVEL)) return;
  const line = `[${now()}] [${level.toUpperCase()}] ${msg}`;
  const out = level === 'error' || level === 'warn' ? console.error : console.log;
  if (meta && Object.keys(meta).length) {
    out(line, meta);
  } else {
    out(line);
  }
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => write('debug', msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => write('info', msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => write('warn', msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => write('error', msg, meta),
};
