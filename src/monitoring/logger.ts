// ============================================================
// Structured Logger using Winston
// ============================================================

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

const silent = process.env['LOG_SILENT'] === 'true';
const logsDir = path.resolve(process.cwd(), process.env['LOG_DIR'] ?? 'logs');

const { combine, timestamp, colorize, printf, errors } = winston.format;

// [timestamp] LEVEL [module] message
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

function buildTransports(): winston.transport[] {
  const console = new winston.transports.Console({ format: consoleFormat, silent });
  if (silent) return [console];

  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return [
    console,
    new DailyRotateFile({
      filename: path.join(logsDir, 'bridge-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      format: fileFormat,
    }),
  ];
}

const rootLogger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transports: buildTransports(),
});

/**
 * Create a child logger scoped to a module name.
 * All messages will be prefixed with [moduleName].
 *
 * @param moduleName - Name of the module (e.g. 'RiskEngine')
 */
export function createModuleLogger(moduleName: string): winston.Logger {
  return rootLogger.child({ module: moduleName });
}

export default rootLogger;
