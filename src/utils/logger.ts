// src/utils/logger.ts
import fs from 'node:fs';
import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, errors, json, colorize, simple } = winston.format;

const isProduction = config.node_env === 'production';

// Custom format for development
const devFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  errors({ stack: true }),
  simple()
);

// Custom format for production
const prodFormat = combine(
  timestamp(),
  errors({ stack: true }),
  json()
);

if (isProduction && !fs.existsSync('logs')) {
  fs.mkdirSync('logs');
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: isProduction ? prodFormat : devFormat,
  defaultMeta: { service: 'task-service' },
  silent: config.node_env === 'test',
  transports: [
    new winston.transports.Console(),

    // File transports for production
    ...(isProduction ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
      }),
      new winston.transports.File({
        filename: 'logs/combined.log'
      })
    ] : [])
  ]
});

export default logger;
