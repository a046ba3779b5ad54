import pino from 'pino';
import { config } from './config.js';

export type { Logger } from 'pino';

export const logger = pino({
  level: config.logLevel,
  base: { service: 'flight-booking' }
});
