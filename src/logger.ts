/**
 * Logger module - structured logging for the registry client
 */

import pino from 'pino';

// Quiet under jest unless LOG_LEVEL asks otherwise
const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

export const logger = pino({
  name: 'registry-client',
  level: process.env.LOG_LEVEL || defaultLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

// Create child loggers for different modules
export const createLogger = (name: string) => {
  return logger.child({ module: name });
};

export default logger;
