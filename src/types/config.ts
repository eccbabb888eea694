import type { LoggerBackend } from '../utils/logger.js';

/**
 * Runtime configuration for logging and diagnostics
 */
export interface Config {
  logLevel: string;
  logger?: LoggerBackend;
  nodeEnv?: string;
  debugCategories?: string[];
}
