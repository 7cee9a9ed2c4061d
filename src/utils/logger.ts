import pino, { type Logger } from 'pino';
import { config } from '../config.js';

export const logger: Logger = pino({
  name: 'fixture-aggregator',
  level: config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
