import pino from 'pino';
import { config } from '../config';

// stdout carries the report, so logs go to stderr
export const logger = pino(
  {
    level: config.log.level,
    base: {
      service: 'transaction-analytics',
    },
  },
  pino.destination(2)
);
