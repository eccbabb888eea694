import logger, { isDevelopmentEnv, reconfigureLogger } from './logger.js';
import { loadConfiguration } from './config-loader.js';
import type { Config } from '../types/config.js';

export interface DebugCategories {
  xml: boolean;
  didl: boolean;
  quirks: boolean;
  events: boolean;
}

export type DebugCategory = keyof DebugCategories;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const CATEGORY_NAMES: readonly DebugCategory[] = ['xml', 'didl', 'quirks', 'events'];

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(candidate => candidate === level);
}

export class DebugManager {
  private categories: DebugCategories;

  constructor(config?: Config) {
    this.categories = {
      xml: false,     // Raw XML parse/serialize details
      didl: false,    // Class resolution and object population
      quirks: false,  // Vendor non-conformance corrections
      events: false   // LastChange and property set decoding
    };

    if (config) {
      this.initFromConfig(config);
    }
  }

  initFromConfig(config: Config): void {
    const level = config.logLevel.toLowerCase();
    if (isLogLevel(level)) {
      logger.level = level;
      logger.debug(`Log level set to '${logger.level}' from configuration`);
    }

    if (config.debugCategories) {
      this.disableAll();
    }
    if (config.debugCategories && config.debugCategories.length > 0) {
      const categoriesToEnable = config.debugCategories.map(c => c.toLowerCase());

      // Special case: '*' or 'all' enables all categories
      if (categoriesToEnable.includes('*') || categoriesToEnable.includes('all')) {
        this.enableAll();
      } else {
        for (const category of categoriesToEnable) {
          if (this.isValidCategory(category)) {
            this.categories[category] = true;
          }
        }
      }
    }

    logger.debug('Debug configuration:', {
      logLevel: logger.level,
      categories: this.enabledCategories().join(', ') || 'none'
    });
  }

  private isValidCategory(category: string): category is DebugCategory {
    return CATEGORY_NAMES.some(name => name === category);
  }

  private enabledCategories(): DebugCategory[] {
    return CATEGORY_NAMES.filter(category => this.categories[category]);
  }

  isEnabled(category: DebugCategory): boolean {
    return this.categories[category];
  }

  setCategory(category: DebugCategory, enabled: boolean): void {
    this.categories[category] = enabled;
    logger.debug(`Debug category '${category}' ${enabled ? 'enabled' : 'disabled'}`);
  }

  setLogLevel(level: LogLevel): void {
    logger.level = level;
  }

  getLogLevel(): string {
    return logger.level;
  }

  getCategories(): DebugCategories {
    return { ...this.categories };
  }

  enableAll(): void {
    for (const category of CATEGORY_NAMES) {
      this.categories[category] = true;
    }
  }

  disableAll(): void {
    for (const category of CATEGORY_NAMES) {
      this.categories[category] = false;
    }
  }

  // Conditional logging methods
  debug(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('debug')) {
      logger.debug(`[${category.toUpperCase()}] ${message}`, this.withCategory(category, meta));
    }
  }

  trace(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('trace')) {
      logger.trace(`[${category.toUpperCase()}] ${message}`, this.withCategory(category, meta));
    }
  }

  private withCategory(category: DebugCategory, meta: unknown): Record<string, unknown> {
    return typeof meta === 'object' && meta !== null ? { ...meta, category } : { data: meta, category };
  }

  private shouldLog(level: LogLevel): boolean {
    const current = logger.level;
    const currentLevelIndex = isLogLevel(current) ? LOG_LEVELS.indexOf(current) : LOG_LEVELS.indexOf('info');
    return LOG_LEVELS.indexOf(level) <= currentLevelIndex;
  }
}

// Environment only; settings files are applied through configure()
export const debugManager = new DebugManager(loadConfiguration().config);

/**
 * Re-initialize the shared debug manager from a loaded configuration
 */
export function initializeDebugManager(config: Config): DebugManager {
  debugManager.initFromConfig(config);
  return debugManager;
}

/**
 * Apply a loaded configuration: logger backend and output format, log level
 * and debug categories
 */
export function configure(config: Config): void {
  reconfigureLogger({
    ...(config.logger ? { backend: config.logger } : {}),
    ...(config.nodeEnv !== undefined ? { development: isDevelopmentEnv(config.nodeEnv) } : {})
  });
  initializeDebugManager(config);
}
