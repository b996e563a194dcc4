import pino from 'pino';
import { LOG_LEVELS } from '../config.js';

type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

// Level comes from the raw environment, not getConfig()
export const logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  transport: process.stdout.isTTY
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});
