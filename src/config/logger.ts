import path from 'path';
import winston from 'winston';
import { getEnvironment } from './environment.js';

const env = getEnvironment();

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
  }),
];

if (env.LOG_PATH && env.NODE_ENV !== 'test') {
  transports.push(
    new winston.transports.File({
      filename: path.join(env.LOG_PATH, 'heinercast.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  );
}

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'heinercast' },
  transports,
});

export { logger };
