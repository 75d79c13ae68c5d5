/**
 * Configuration loader for the protocol generator.
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
import type { TemplateOptions } from '../template/TemplatePatcher.js';
import type { MultipleRegionPolicy } from '../template/TemplateRegion.js';
import type { AppConfig, CorsConfig, GeneratorConfig, LogLevel, ServerConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
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

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const MULTIPLE_REGION_POLICIES: readonly MultipleRegionPolicy[] = ['error', 'first'];

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string.
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isObject(obj)) {
    const result: ConfigObject = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function section(config: ConfigObject, key: string, path: string): ConfigObject {
  const value = config[key];
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

function optionalString(config: ConfigObject, key: string, path: string): string | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigValidationError(`${key} must be a string`, `${path}.${key}`, value);
  }
  return value;
}

// Values filled in from environment variables arrive as strings.
function optionalNumber(config: ConfigObject, key: string, path: string): number | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (typeof value !== 'number') {
    throw new ConfigValidationError(`${key} must be a number`, `${path}.${key}`, value);
  }
  return value;
}

function optionalBoolean(config: ConfigObject, key: string, path: string): boolean | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(`${key} must be a boolean`, `${path}.${key}`, value);
  }
  return value;
}

function optionalStringList(config: ConfigObject, key: string, path: string): string[] | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(`${key} must be a list of strings`, `${path}.${key}`, value);
  }
  const strings = value.filter((item): item is string => typeof item === 'string');
  if (strings.length !== value.length) {
    throw new ConfigValidationError(`${key} must be a list of strings`, `${path}.${key}`, value);
  }
  return strings;
}

function optionalChoice<T extends string>(
  config: ConfigObject,
  key: string,
  path: string,
  choices: readonly T[],
): T | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  const choice = choices.find((c) => c === value);
  if (choice === undefined) {
    throw new ConfigValidationError(`${key} must be one of: ${choices.join(', ')}`, `${path}.${key}`, value);
  }
  return choice;
}

/**
 * Validate and merge server configuration over defaults.
 */
function readServerConfig(config: ConfigObject, path = 'server'): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = optionalNumber(config, 'port', path) ?? defaults.port;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, port);
  }

  const corsPath = `${path}.cors`;
  const cors = section(config, 'cors', corsPath);
  const mergedCors: CorsConfig = {
    enabled: optionalBoolean(cors, 'enabled', corsPath) ?? defaults.cors.enabled,
    origins: optionalStringList(cors, 'origins', corsPath) ?? [...defaults.cors.origins],
  };

  return {
    port,
    host: optionalString(config, 'host', path) ?? defaults.host,
    logLevel: optionalChoice(config, 'logLevel', path, LOG_LEVELS) ?? defaults.logLevel,
    cors: mergedCors,
  };
}

function readTemplateOptions(config: ConfigObject, path: string): TemplateOptions {
  const defaults = DEFAULT_CONFIG.generator.template;
  const multipleRegions = optionalChoice(config, 'multipleRegions', path, MULTIPLE_REGION_POLICIES);
  const markerComment = optionalString(config, 'markerComment', path) ?? defaults.markerComment;
  if (markerComment.trim().length === 0) {
    throw new ConfigValidationError('markerComment must not be empty', `${path}.markerComment`, markerComment);
  }
  const variable = optionalString(config, 'variable', path) ?? defaults.variable;
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(variable)) {
    throw new ConfigValidationError('variable must be an identifier', `${path}.variable`, variable);
  }

  return {
    markerComment,
    variable,
    iterationComment: optionalString(config, 'iterationComment', path) ?? defaults.iterationComment,
    labelLiteral: optionalString(config, 'labelLiteral', path) ?? defaults.labelLiteral,
    labelTemplate: optionalString(config, 'labelTemplate', path) ?? defaults.labelTemplate,
    multipleRegions: multipleRegions ?? defaults.multipleRegions,
  };
}

/**
 * Validate and merge generator configuration over defaults.
 */
function readGeneratorConfig(config: ConfigObject, path = 'generator'): GeneratorConfig {
  const defaults = DEFAULT_CONFIG.generator;
  const iterationPattern = optionalString(config, 'iterationPattern', path) ?? defaults.iterationPattern;
  try {
    new RegExp(iterationPattern);
  } catch (err) {
    throw new ConfigValidationError(
      `iterationPattern is not a valid regular expression: ${err instanceof Error ? err.message : String(err)}`,
      `${path}.iterationPattern`,
      iterationPattern,
    );
  }
  const outputDir = optionalString(config, 'outputDir', path);

  return {
    templatePath: optionalString(config, 'templatePath', path) ?? defaults.templatePath,
    ...(outputDir !== undefined ? { outputDir } : {}),
    iterationPattern,
    template: readTemplateOptions(section(config, 'template', `${path}.template`), `${path}.template`),
  };
}

/**
 * Validate a parsed configuration document and merge it over the defaults.
 */
export function resolveConfig(document: unknown): AppConfig {
  if (document === null || document === undefined) {
    return resolveConfig({});
  }
  if (!isObject(document)) {
    throw new ConfigValidationError('must be an object', '', document);
  }
  return {
    server: readServerConfig(section(document, 'server', 'server')),
    generator: readGeneratorConfig(section(document, 'generator', 'generator')),
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env['CONFIG_PATH']
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return resolveConfig(substituteEnvVarsRecursive(parsed));
}
