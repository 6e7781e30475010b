import pino from 'pino';

export const logger = pino({
  name: 'media-processor',
  level: process.env.LOG_LEVEL ?? 'info',
});
