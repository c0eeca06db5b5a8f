import pino from 'pino';
import { config } from './config.js';

const isProd = config.nodeEnv === 'production';
const isTest = config.nodeEnv === 'test';

// Shared with Fastify so request logs and service logs look the same.
export const loggerOptions = {
  level: isTest ? 'silent' : config.logLevel,
  redact: ['req.headers.authorization', 'password', 'hashedPassword'],
  transport:
    isProd || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            singleLine: true,
          },
        },
};

export const logger = pino(loggerOptions);

export default logger;
