import fs from 'fs';
import winston from 'winston';
import { config } from './config.js';

const { combine, errors, timestamp, colorize, printf } = winston.format;

function line(upperCaseLevel: boolean) {
  return printf(({ timestamp: at, level, message, stack }) => {
    const tag = upperCaseLevel ? level.toUpperCase() : level;
    return `${at} [${tag}]: ${stack ?? message}`;
  });
}

const testing = process.env.NODE_ENV === 'test';

function fileTransport() {
  fs.mkdirSync(config.paths.dataDir, { recursive: true });
  return new winston.transports.File({
    filename: config.paths.logFile,
    format: line(true),
    maxsize: 5 * 1024 * 1024,
    maxFiles: 3,
  });
}

// Console for whoever runs the check; a capped file for unattended runs.
// Tests log nowhere and leave no file behind.
export const logger = winston.createLogger({
  level: config.logging.level,
  silent: testing,
  format: combine(errors({ stack: true }), timestamp()),
  transports: [
    new winston.transports.Console({ format: combine(colorize(), line(false)) }),
    ...(testing ? [] : [fileTransport()]),
  ],
});
