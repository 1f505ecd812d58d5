import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'model-price-watch',
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  transport: config.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
});
