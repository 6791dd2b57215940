/**
 * Configuration loader for the bead-array QC tools.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, BlockConfig, QcConfig, ServerConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { ConfigError } from '../qc/errors.js';
import type { QcLogger } from '../logging/logger.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
  /** Receives warnings about missing files and unset variables */
  logger?: QcLogger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'];
const BLOCK_STRATEGIES = ['auto', 'fixed-count', 'next-marker'];

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, unset: Set<string>): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    unset.add(varName);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, unset: Set<string>): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, unset);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, unset));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, unset);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (source overrides target).
 */
function deepMerge<T extends object>(target: T, source: unknown): T {
  if (!isPlainObject(source)) return { ...target };
  const result: Record<string, unknown> = Object.assign<Record<string, unknown>, T>({}, target);

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is Partial<ServerConfig> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !LOG_LEVELS.includes(String(c.logLevel))) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, c.logLevel);
  }

  if (c.cors !== undefined) {
    if (!isPlainObject(c.cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, c.cors);
    }
    const origins = c.cors.origins;
    if (origins !== undefined && (!Array.isArray(origins) || !origins.every((o) => typeof o === 'string'))) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, origins);
    }
  }
}

function validateStringList(value: unknown, path: string): void {
  if (!Array.isArray(value) || !value.every((v) => typeof v === 'string' && v.length > 0)) {
    throw new ConfigValidationError('must be a list of non-empty strings', path, value);
  }
}

/**
 * Validate block location settings.
 */
function validateBlockConfig(config: unknown, path: string): asserts config is Partial<BlockConfig> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.strategy !== undefined && !BLOCK_STRATEGIES.includes(String(c.strategy))) {
    throw new ConfigValidationError(`strategy must be one of: ${BLOCK_STRATEGIES.join(', ')}`, `${path}.strategy`, c.strategy);
  }

  if (c.wellCount !== undefined && (typeof c.wellCount !== 'number' || !Number.isInteger(c.wellCount) || c.wellCount < 1)) {
    throw new ConfigValidationError('wellCount must be a positive integer', `${path}.wellCount`, c.wellCount);
  }

  if (c.strategy === 'fixed-count' && c.wellCount === undefined) {
    throw new ConfigValidationError('wellCount is required when strategy is "fixed-count"', `${path}.wellCount`, c.wellCount);
  }

  for (const key of ['mfiMarker', 'countMarker', 'countExclude'] as const) {
    const value = c[key];
    if (value !== undefined && (typeof value !== 'string' || value.length === 0)) {
      throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
    }
  }

  if (typeof c.countMarker === 'string') {
    try {
      new RegExp(c.countMarker);
    } catch (err) {
      throw new ConfigValidationError(
        `countMarker is not a valid regular expression: ${err instanceof Error ? err.message : String(err)}`,
        `${path}.countMarker`,
        c.countMarker
      );
    }
  }

  if (c.terminators !== undefined) {
    validateStringList(c.terminators, `${path}.terminators`);
  }
}

/**
 * Validate QC run settings.
 */
function validateQcConfig(config: unknown, path = 'qc'): asserts config is Partial<QcConfig> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (
    c.beadThreshold !== undefined &&
    (typeof c.beadThreshold !== 'number' || !Number.isInteger(c.beadThreshold) || c.beadThreshold < 0)
  ) {
    throw new ConfigValidationError('beadThreshold must be an integer >= 0', `${path}.beadThreshold`, c.beadThreshold);
  }

  if (
    c.rSquaredThreshold !== undefined &&
    (typeof c.rSquaredThreshold !== 'number' || c.rSquaredThreshold <= 0 || c.rSquaredThreshold >= 1)
  ) {
    throw new ConfigValidationError('rSquaredThreshold must be a number in (0, 1)', `${path}.rSquaredThreshold`, c.rSquaredThreshold);
  }

  if (c.backgroundAnalyte !== undefined && typeof c.backgroundAnalyte !== 'string') {
    throw new ConfigValidationError('backgroundAnalyte must be a string', `${path}.backgroundAnalyte`, c.backgroundAnalyte);
  }

  if (c.standardAnalytes !== undefined) {
    validateStringList(c.standardAnalytes, `${path}.standardAnalytes`);
  }

  if (c.outputDir !== undefined && (typeof c.outputDir !== 'string' || c.outputDir.length === 0)) {
    throw new ConfigValidationError('outputDir must be a non-empty string', `${path}.outputDir`, c.outputDir);
  }

  if (c.strict !== undefined && typeof c.strict !== 'boolean') {
    throw new ConfigValidationError('strict must be a boolean', `${path}.strict`, c.strict);
  }

  if (c.fileExtension !== undefined && (typeof c.fileExtension !== 'string' || !c.fileExtension.startsWith('.'))) {
    throw new ConfigValidationError('fileExtension must start with "."', `${path}.fileExtension`, c.fileExtension);
  }

  if (
    c.concurrency !== undefined &&
    (typeof c.concurrency !== 'number' || !Number.isInteger(c.concurrency) || c.concurrency < 1)
  ) {
    throw new ConfigValidationError('concurrency must be a positive integer', `${path}.concurrency`, c.concurrency);
  }

  if (c.blocks !== undefined) {
    validateBlockConfig(c.blocks, `${path}.blocks`);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is Partial<AppConfig> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.qc !== undefined) {
    validateQcConfig(config.qc);
  }
}

/**
 * Build a full configuration from a parsed (possibly partial) document.
 */
export function mergeWithDefaults(partial: { server?: unknown; qc?: unknown }): AppConfig {
  return {
    server: deepMerge(DEFAULT_CONFIG.server, partial.server),
    qc: deepMerge(DEFAULT_CONFIG.qc, partial.qc),
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    options.logger?.warn(`Config file not found at ${absolutePath}, using defaults`);
    return mergeWithDefaults({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content) ?? {};
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const unset = new Set<string>();
  const substituted = substituteEnvVarsRecursive(parsed, unset);
  for (const varName of unset) {
    options.logger?.warn(`Environment variable ${varName} is not set and has no default`);
  }

  if (options.validate !== false) {
    validateConfig(substituted);
  }

  return mergeWithDefaults(isPlainObject(substituted) ? substituted : {});
}

/**
 * Settings consumed by a QC run.
 */
export type QcSettings = QcConfig;

/**
 * Resolve the QC settings for a run, applying command-line or request
 * overrides on top of the loaded configuration.
 */
export function resolveQcSettings(config: AppConfig, overrides: Partial<QcConfig> = {}): QcSettings {
  const settings = deepMerge(config.qc, overrides);
  validateQcConfig(settings);
  if (!settings.backgroundAnalyte) {
    throw new ConfigError('qc.backgroundAnalyte must name the background analyte column');
  }
  return settings;
}
