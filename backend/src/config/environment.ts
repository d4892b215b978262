/**
 * Environment Configuration Validation
 *
 * Loads and validates every environment variable used by the sample metadata
 * services: catalog locations, persistence targets, the tracker feed and
 * logging. Invalid values raise ConfigValidationError naming the variable and
 * a suggestion; nothing here terminates the process.
 */

import * as path from 'path';
import { appPaths } from './appPaths';
import { ConfigError } from '../utils/errors';
import type { DetectorCategory } from '../types/sample';
import { createServiceLogger, type LogFormat, type LoggerConfig, type LogLevel, type LogOutput } from '../services/logger';

const configLogger = createServiceLogger('config');

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * Pattern catalog locations, one YAML file per detector category
 */
export type CatalogConfig = Record<DetectorCategory, string>;

/**
 * Storage Configuration Interface
 */
export interface StorageConfig {
  /** SQLite database holding one row per sample */
  databasePath: string;
  /** Default JSON report file */
  reportPath: string;
}

/**
 * Tracker Feed Configuration Interface
 */
export interface TrackerFeedConfig {
  /** Endpoint returning the JSON tracker list */
  url: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Label written into the description of imported sections */
  provenance: string;
}

/**
 * Logging Configuration Interface
 */
export interface LoggingConfig {
  /** Global log level */
  level: LogLevel;
  /** Log format (json|text) */
  format: LogFormat;
  /** Log output destination (console|file|both) */
  output: LogOutput;
  /** Log directory */
  dir: string;
  /** Log file name */
  file: string;
}

/**
 * Complete Environment Configuration Interface
 */
export interface EnvironmentConfig {
  catalogs: CatalogConfig;
  storage: StorageConfig;
  trackers: TrackerFeedConfig;
  logging: LoggingConfig;
  /** Current environment (development|production|test) */
  environment: string;
  /** Root directory for data files */
  dataRoot: string;
}

export const DEFAULT_TRACKER_FEED_URL = 'https://etip.exodus-privacy.eu.org/api/trackers/?format=json';
export const DEFAULT_TRACKER_PROVENANCE = 'ETIP Exodus Privacy list';

type Env = Record<string, string | undefined>;

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

/**
 * Configuration validation error
 */
export class ConfigValidationError extends ConfigError {
  constructor(
    message: string,
    public readonly variable?: string,
    public readonly suggestion?: string
  ) {
    super(message, variable);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate URL format
 */
function validateUrl(value: string, variableName: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error(url.protocol);
    }
    return value;
  } catch {
    throw new ConfigValidationError(
      `Invalid URL format for ${variableName}: ${value}`,
      variableName,
      'Please provide a valid URL including protocol (http:// or https://)'
    );
  }
}

/**
 * Validate timeout value (milliseconds)
 */
function validateTimeout(value: string, variableName: string, min = 100, max = 3600000): number {
  const timeout = parseInt(value, 10);
  if (isNaN(timeout) || timeout < min || timeout > max) {
    throw new ConfigValidationError(
      `Invalid timeout for ${variableName}: ${value}ms`,
      variableName,
      `Please provide a timeout between ${min}ms and ${max}ms`
    );
  }
  return timeout;
}

/**
 * Validate a file system path (not required to exist yet)
 */
function validatePath(value: string, variableName: string): string {
  if (!value || value.trim() === '') {
    throw new ConfigValidationError(
      `Empty path for ${variableName}`,
      variableName,
      'Please provide a valid file system path'
    );
  }

  return path.resolve(value);
}

function validateChoice<T extends string>(value: string, variableName: string, choices: readonly T[]): T {
  const normalized = value.toLowerCase().trim();
  const choice = choices.find(candidate => candidate === normalized);

  if (choice === undefined) {
    throw new ConfigValidationError(
      `Invalid value for ${variableName}: ${value}`,
      variableName,
      `Please use one of: ${choices.join(', ')}`
    );
  }

  return choice;
}

// =============================================================================
// CONFIGURATION LOADERS
// =============================================================================

function loadCatalogConfig(env: Env, dataRoot: string): CatalogConfig {
  const catalogsDir = path.join(dataRoot, 'catalogs');

  return {
    smali: validatePath(env.SMALI_CONFIGFILE || path.join(catalogsDir, 'smali.yaml'), 'SMALI_CONFIGFILE'),
    wide: validatePath(env.WIDE_CONFIGFILE || path.join(catalogsDir, 'wide.yaml'), 'WIDE_CONFIGFILE'),
    arm: validatePath(env.ARM_CONFIGFILE || path.join(catalogsDir, 'arm.yaml'), 'ARM_CONFIGFILE'),
    kit: validatePath(env.KIT_CONFIGFILE || path.join(catalogsDir, 'kit.yaml'), 'KIT_CONFIGFILE')
  };
}

function loadStorageConfig(env: Env, dataRoot: string): StorageConfig {
  return {
    databasePath: validatePath(env.SAMPLES_DB || path.join(dataRoot, 'samples.db'), 'SAMPLES_DB'),
    reportPath: validatePath(env.REPORT_FILE || 'report.json', 'REPORT_FILE')
  };
}

function loadTrackerFeedConfig(env: Env): TrackerFeedConfig {
  return {
    url: validateUrl(env.TRACKER_FEED_URL || DEFAULT_TRACKER_FEED_URL, 'TRACKER_FEED_URL'),
    timeout: validateTimeout(env.TRACKER_FEED_TIMEOUT || '30000', 'TRACKER_FEED_TIMEOUT'),
    provenance: env.TRACKER_FEED_PROVENANCE || DEFAULT_TRACKER_PROVENANCE
  };
}

function loadLoggingConfig(env: Env, dataRoot: string): LoggingConfig {
  return {
    level: validateChoice(env.LOG_LEVEL || 'info', 'LOG_LEVEL', ['error', 'warn', 'info', 'debug']),
    format: validateChoice(env.LOG_FORMAT || 'json', 'LOG_FORMAT', ['json', 'text']),
    output: validateChoice(env.LOG_OUTPUT || 'console', 'LOG_OUTPUT', ['console', 'file', 'both']),
    dir: validatePath(env.LOG_DIR || path.join(dataRoot, 'logs'), 'LOG_DIR'),
    file: env.LOG_FILE || 'droidmeta.log'
  };
}

// =============================================================================
// MAIN CONFIGURATION LOADER
// =============================================================================

/**
 * Load and validate complete environment configuration
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const dataRoot = env.DATA_ROOT ? validatePath(env.DATA_ROOT, 'DATA_ROOT') : appPaths.root;

  return {
    catalogs: loadCatalogConfig(env, dataRoot),
    storage: loadStorageConfig(env, dataRoot),
    trackers: loadTrackerFeedConfig(env),
    logging: loadLoggingConfig(env, dataRoot),
    environment: env.NODE_ENV || 'development',
    dataRoot
  };
}

/**
 * Logger settings matching a validated logging configuration
 */
export function toLoggerSettings(logging: LoggingConfig): Partial<LoggerConfig> {
  return {
    level: logging.level,
    format: logging.format,
    output: logging.output,
    logDir: path.resolve(logging.dir),
    logFile: logging.file
  };
}

/**
 * Environment-specific sanity checks; returns warnings instead of printing them
 */
export function validateEnvironmentConfig(config: EnvironmentConfig, environment?: string): string[] {
  const targetEnv = environment || config.environment;
  const warnings: string[] = [];

  if (targetEnv === 'production') {
    if (config.logging.level === 'debug') {
      warnings.push('Debug logging enabled in production environment');
    }
    if (!config.trackers.url.startsWith('https://')) {
      warnings.push('Tracker feed is fetched over plain HTTP in production environment');
    }
  }

  return warnings;
}

/**
 * Load configuration and report environment-specific warnings
 */
export function getEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const config = loadEnvironmentConfig(env);
  for (const warning of validateEnvironmentConfig(config)) {
    configLogger.warn('config_warning', warning);
  }
  return config;
}

// =============================================================================
// CONFIGURATION UTILITIES
// =============================================================================

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: EnvironmentConfig): Record<string, unknown> {
  return {
    environment: config.environment,
    dataRoot: config.dataRoot,
    catalogs: { ...config.catalogs },
    storage: {
      databasePath: config.storage.databasePath,
      reportPath: config.storage.reportPath
    },
    trackers: {
      url: config.trackers.url,
      timeout: config.trackers.timeout
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      output: config.logging.output
    }
  };
}
