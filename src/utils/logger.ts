/**
 * Logger Utility
 *
 * Centralized logging using Winston:
 * - Console: Colored output for development
 * - File: JSON logs for auditing (skipped under the test runner)
 *
 * Token values must never be passed to these loggers; log session ids,
 * state id prefixes and scope lists instead.
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Custom log format for console output
 * Format: [TIMESTAMP] [LEVEL] [COMPONENT] Message
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, component }) => {
    const comp = component ? `[${String(component)}]` : '';
    return `[${String(timestamp)}] ${level} ${comp} ${String(message)}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const logLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      silent: process.env.NODE_ENV === 'test',
    }),
  ];

  if (process.env.NODE_ENV === 'test') {
    return transports;
  }

  const logsDir = path.join(process.cwd(), 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );

  return transports;
}

const logger = winston.createLogger({
  level: logLevel,
  defaultMeta: { service: 'workspace-agent-gateway' },
  transports: createTransports(),
});

/**
 * Component-specific logger factory
 *
 * @example
 * const authLogger = createComponentLogger('Auth');
 * authLogger.info('Consent redirect issued');
 * // Output: [12:30:45] info [Auth] Consent redirect issued
 */
export function createComponentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export const authLogger = createComponentLogger('Auth');
export const stateLogger = createComponentLogger('State');
export const dbLogger = createComponentLogger('DB');
export const agentLogger = createComponentLogger('Agent');
export const serverLogger = createComponentLogger('Server');

export default logger;
