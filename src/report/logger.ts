import path from 'node:path';
import pino from 'pino';

const LEVELS: pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function parseLevel(raw: string): pino.Level {
  const level = LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (!level) throw new Error(`Invalid LOG_LEVEL: ${raw} (expected one of ${LEVELS.join(', ')})`);
  return level;
}

export interface LoggerOptions {
  level: pino.Level;
  logDir: string;
  /** Mirror log lines to stdout (dev runs). */
  console: boolean;
}

/** JSON lines to `<logDir>/app.log`, plus stdout when `console` is set. */
export function createLogger(opts: LoggerOptions): pino.Logger {
  const streams: pino.StreamEntry[] = [
    { level: opts.level, stream: pino.destination({ dest: path.join(opts.logDir, 'app.log'), mkdir: true, sync: true }) }
  ];
  if (opts.console) streams.push({ level: opts.level, stream: process.stdout });
  return pino({ level: opts.level }, pino.multistream(streams));
}
