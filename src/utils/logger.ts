import pino from 'pino';
import { readLogSettings } from '../config.js';

const settings = readLogSettings(process.env);

// Diagnostics go to stderr; stdout is left to the final summary.
export const logger =
  settings.NODE_ENV === 'development'
    ? pino({
        level: settings.LOG_LEVEL,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      })
    : pino({ level: settings.LOG_LEVEL }, pino.destination(2));

export type { Logger } from 'pino';
