// frontend/src/utils/logger.ts

// Thin console wrapper so every browser log line carries a level and a timestamp.

const getTimestamp = (): string => new Date().toISOString();

export const logger = {
  info: (...args: unknown[]): void => {
    console.info(`[INFO] ${getTimestamp()}:`, ...args);
  },
  warn: (...args: unknown[]): void => {
    console.warn(`[WARN] ${getTimestamp()}:`, ...args);
  },
  error: (...args: unknown[]): void => {
    console.error(`[ERROR] ${getTimestamp()}:`, ...args);
  },
  debug: (...args: unknown[]): void => {
    if (import.meta.env.DEV) {
      console.debug(`[DEBUG] ${getTimestamp()}:`, ...args);
    }
  },
};
