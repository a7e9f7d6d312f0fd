/**
 * FILE PURPOSE: Level-filtered stderr logging shared by every workspace
 *
 * WHY: Workers, the server and the CLI all log the same `LEVEL: message`
 *      lines to stderr; LOG_LEVEL decides how much of it is written.
 */

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(configured) ? LEVELS[configured] : LEVELS.info;
}

function write(level: LogLevel, message: string): void {
  if (LEVELS[level] < threshold()) return;
  process.stderr.write(`${level.toUpperCase()}: ${message}\n`);
}

export const log = {
  debug: (message: string): void => write('debug', message),
  info: (message: string): void => write('info', message),
  warn: (message: string): void => write('warn', message),
  error: (message: string): void => write('error', message),
};
