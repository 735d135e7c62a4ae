import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { redactSensitive } from './redact';
import { resolveLogSettings } from './logSettings';
import type { LogSettings } from './logSettings';

const FILE_MAX_BYTES = 5 * 1024 * 1024;
const FILE_MAX_COUNT = 5;

const redact = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitive(info.message);
  }
  return info;
});

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  timestamp,
  redact(),
  winston.format.printf(({ timestamp: at, level, message, module }) =>
    module ? `${at} ${level} [${module}] ${message}` : `${at} ${level} ${message}`
  )
);

const fileFormat = winston.format.combine(timestamp, redact(), winston.format.json());

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

function buildTransports(settings: LogSettings): LogTransport[] {
  const transports: LogTransport[] = [new winston.transports.Console({ format: consoleFormat })];
  if (!settings.files) {
    return transports;
  }

  fs.mkdirSync(settings.folder, { recursive: true });
  transports.push(
    new winston.transports.File({
      filename: path.join(settings.folder, 'plugpoll-error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: FILE_MAX_BYTES,
      maxFiles: FILE_MAX_COUNT,
    }),
    new winston.transports.File({
      filename: path.join(settings.folder, 'plugpoll.log'),
      format: fileFormat,
      maxsize: FILE_MAX_BYTES,
      maxFiles: FILE_MAX_COUNT,
    })
  );
  return transports;
}

const settings = resolveLogSettings(process.env);

const logger = winston.createLogger({
  level: settings.level,
  transports: buildTransports(settings),
});

/**
 * Child logger whose lines carry [moduleName]
 */
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

/**
 * Apply the configured log level. Child loggers read the level from the root logger.
 * LOG_LEVEL in the environment wins over the configuration file.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) {
    return;
  }
  logger.level = level;
}

export default logger;
