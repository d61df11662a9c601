import { createLogger } from './logging/logger';

/**
 * Line logger for Netlify functions: `log("start")` prints `[thumbnails] start`.
 * Follows LOG_LEVEL like the scoped loggers.
 */
export function createFnLogger(prefix: string) {
  const logger = createLogger(prefix);
  return {
    log: (m: string) => logger.info(m),
    warn: (m: string) => logger.warn(m),
    error: (m: string) => logger.error(m),
  };
}
