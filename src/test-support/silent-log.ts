import type { ScopedLogger } from '../utils/logger.js';

/** Logger muet pour les tests */
export const silentLog: ScopedLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLog,
};
