import { readFileSync } from 'fs';
import logger, { isLoggerBackend, loggerOptionsFromEnv } from './logger.js';
import type { Config } from '../types/config.js';

/**
 * Default configuration values
 */
const defaultConfig: Config = {
  logLevel: 'info',
  debugCategories: []
};

const ENV_VARS = ['NODE_ENV', 'LOGGER', 'LOG_LEVEL', 'DEBUG_LEVEL', 'DEBUG_CATEGORIES'];

/**
 * Parse comma-separated environment variable into array
 */
function parseArrayEnv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Result of configuration loading
 */
export interface ConfigLoadResult {
  config: Config;
  sources: string[];
  envOverrides: string[];
}

/**
 * Format the configuration loading info as a message
 */
export function formatConfigInfo(result: ConfigLoadResult): string {
  return result.envOverrides.length > 0
    ? `Configuration loaded from: ${result.sources.join(' → ')} (${result.envOverrides.join(', ')})`
    : `Configuration loaded from: ${result.sources.join(' → ')}`;
}

/**
 * Load configuration from multiple sources with precedence:
 * 1. Default values
 * 2. settings file (when a path is given and it exists)
 * 3. Environment variables (highest priority)
 */
export function loadConfiguration(
  settingsPath?: string,
  env: NodeJS.ProcessEnv = process.env
): ConfigLoadResult {
  let config: Config = { ...defaultConfig, logger: loggerOptionsFromEnv(env).backend };
  const sources = ['defaults'];

  if (settingsPath !== undefined) {
    const settings = readSettings(settingsPath);
    if (settings) {
      config = { ...config, ...settings };
      sources.push(settingsPath);
    }
  }

  if (env.NODE_ENV) config.nodeEnv = env.NODE_ENV;
  const requestedLogger = env.LOGGER?.toLowerCase();
  if (requestedLogger) {
    if (isLoggerBackend(requestedLogger)) {
      config.logger = requestedLogger;
    } else {
      logger.warn(`Ignoring unknown LOGGER '${env.LOGGER}'`);
    }
  }
  if (env.LOG_LEVEL || env.DEBUG_LEVEL) {
    config.logLevel = env.LOG_LEVEL || env.DEBUG_LEVEL || config.logLevel;
  }
  const categories = parseArrayEnv(env.DEBUG_CATEGORIES);
  if (categories) config.debugCategories = categories;

  const envOverrides = ENV_VARS.filter(name => env[name] !== undefined);
  if (envOverrides.length > 0) {
    sources.push('env vars');
  }

  return { config, sources, envOverrides };
}

function readSettings(settingsPath: string): Partial<Config> | undefined {
  let raw: string;
  try {
    raw = readFileSync(settingsPath, 'utf-8');
  } catch {
    // settings file is optional
    logger.debug(`No settings file at ${settingsPath}, using defaults`);
    return undefined;
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Settings file ${settingsPath} must contain a JSON object`);
  }

  const settings: Partial<Config> = {};
  if ('logLevel' in parsed && typeof parsed.logLevel === 'string') {
    settings.logLevel = parsed.logLevel;
  }
  if ('logger' in parsed && typeof parsed.logger === 'string') {
    const backend = parsed.logger.toLowerCase();
    if (isLoggerBackend(backend)) {
      settings.logger = backend;
    } else {
      logger.warn(`Ignoring unknown logger '${parsed.logger}' in ${settingsPath}`);
    }
  }
  if ('debugCategories' in parsed && Array.isArray(parsed.debugCategories)) {
    settings.debugCategories = parsed.debugCategories.filter((c): c is string => typeof c === 'string');
  }
  logger.debug(`Loaded settings from ${settingsPath}`);
  return settings;
}
