/**
 * HarborGate Logger
 * Structured logging with Winston
 *
 * Console output goes to stderr so CLI results on stdout stay pipeable.
 * `HARBORGATE_HOME` moves the data directory, `LOG_LEVEL` pins the level and
 * `HARBORGATE_QUIET=1` silences the console transport.
 */

import winston from 'winston';
import path from 'path';
import { existsSync, mkdirSync } from 'fs';
import os from 'os';
import { LogLevel } from '../types';

const HARBORGATE_HOME = process.env.HARBORGATE_HOME || path.join(os.homedir(), '.harborgate');

if (!existsSync(HARBORGATE_HOME)) {
  mkdirSync(HARBORGATE_HOME, { recursive: true });
}

const LOG_FILE = path.join(HARBORGATE_HOME, 'harborgate.log');

/**
 * Error instances in metadata serialise to `{}` under JSON; replace them with
 * their name and message.
 */
const serializeErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message };
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    serializeErrors(),
    winston.format.json()
  ),
  defaultMeta: { service: 'harborgate' },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      silent: process.env.HARBORGATE_QUIET === '1',
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `[${timestamp}] ${level}: ${message}${metaStr}`;
        })
      ),
    }),

    // Structured JSON, rotated at 5MB
    new winston.transports.File({
      filename: LOG_FILE,
      maxsize: 5242880,
      maxFiles: 5,
      format: winston.format.json(),
    }),
  ],
});

/** Apply the configured level unless LOG_LEVEL pins one. Returns the level in effect. */
export function setLogLevel(level: LogLevel): string {
  if (!process.env.LOG_LEVEL) {
    logger.level = level;
  }
  return logger.level;
}

export const LOG_PATH = LOG_FILE;
export const HARBORGATE_DATA_DIR = HARBORGATE_HOME;
