// ============================================================
// Structured Logger using Winston
// ============================================================

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

const { combine, timestamp, colorize, printf, errors } = winston.format;

// Custom log format: [timestamp] LEVEL [module] message
const logFormat = printf(({ level, message, timestamp: ts, module: mod, stack }) => {
  const moduleLabel = mod ? ` [${String(mod)}]` : '';
  const stackTrace = stack ? `\n${String(stack)}` : '';
  return `${String(ts)} ${level}${moduleLabel}: ${String(message)}${stackTrace}`;
});

const consoleFormat = combine(
  colorize({ all: true }),
  timestamp({ format: 'HH:mm:ss' }),
  errors({ stack: true }),
  logFormat,
);

const fileFormat = combine(
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  logFormat,
);

const rootLogger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

/**
 * Add a daily rotating file transport under `logsDir`.
 * The scoring engine itself never touches the filesystem; only the CLI
 * calls this when LOG_DIR is configured.
 *
 * @param logsDir - Directory for `scorer-%DATE%.log` files (created on demand)
 */
export function enableFileLogging(logsDir: string): void {
  rootLogger.add(
    new DailyRotateFile({
      filename: path.join(path.resolve(logsDir), 'scorer-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      format: fileFormat,
    }),
  );
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

/**
 * Create a child logger scoped to a module name.
 * All messages will be prefixed with [moduleName].
 *
 * @param moduleName - Name of the module (e.g. 'VsaScorer')
 */
export function createModuleLogger(moduleName: string): winston.Logger {
  return rootLogger.child({ module: moduleName });
}

export default rootLogger;
