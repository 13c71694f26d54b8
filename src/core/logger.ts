/**
 * Logger Module
 *
 * Pino logger shared by every component. Outside production the output goes
 * through pino-pretty; in production each line is a JSON object for the log
 * collector of whatever scheduler runs the fetch command.
 */

import pino from 'pino';
import { cfg } from './config.js';

export const logger = pino({
  name: 'nhl-score-ingest',
  level: cfg.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: process.env.NODE_ENV !== 'production'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
    : undefined
});
