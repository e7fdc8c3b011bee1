import { pino } from 'pino';

const pretty = process.stdout.isTTY && !process.env.VITEST;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
});
