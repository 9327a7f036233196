/**
 * Pino logger shared by every service. Writes to stderr so stdout stays
 * free for the spinner and the run summary.
 */
import { pino } from 'pino';
import pretty from 'pino-pretty';
import { readLogSettings } from './config/env.js';

const settings = readLogSettings();
const level = settings.NODE_ENV === 'test' ? 'silent' : settings.LOG_LEVEL;

const destination =
  settings.NODE_ENV === 'development'
    ? pretty({ colorize: true, ignore: 'pid,hostname', destination: 2, sync: true })
    : pino.destination(2);

export const logger = pino(
  {
    level,
    base: { service: 'memories-fetch' },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  destination
);

export default logger;
