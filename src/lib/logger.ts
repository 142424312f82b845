import pino from 'pino';

const isDev = import.meta.env.DEV;

export const logger = pino({
  level: import.meta.env.VITE_LOG_LEVEL || (isDev ? 'debug' : 'info'),
  browser: {
    asObject: true,
  },
});

/**
 * Create a child logger with a specific module name
 */
export function createLogger(module: string) {
  return logger.child({ module });
}

export const apiLogger = logger.child({ module: 'api' });
export const setupLogger = logger.child({ module: 'setup' });
export const storageLogger = logger.child({ module: 'storage' });
export const journalLogger = logger.child({ module: 'journal' });
