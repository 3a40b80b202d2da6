import winston from 'winston';
import fs from 'fs';
import config from '../config';

/**
 * Centralized logging with multiple transports
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    // stdout carries CLI output, logs go to stderr
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
];

// Opt-in file logging to avoid failures on read-only filesystems/containers
if (config.logging.toFiles) {
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
    }),
  );
}

const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.env === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'leg-tracer' },
  transports,
});

export default logger;
