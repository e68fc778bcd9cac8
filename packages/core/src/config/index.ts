/**
 * Configuration loader
 *
 * Reads the YAML configuration, resolves ${ENV:VAR} and ${file:path}
 * references, then validates the result with Zod.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { OpenAssocConfigSchema, type OpenAssocConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, OpenAssocError } from '../utils/errors.js';

export * from './schema.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

/**
 * Configuration loading options
 */
export interface ConfigLoadOptions {
  /** Base directory for ${file:} resolution (default: config file directory) */
  secrets_base_dir?: string;
}

/**
 * Load configuration from a YAML file
 *
 * @param configPath Path to the YAML file
 * @returns Validated configuration with defaults applied
 * @throws ConfigurationError if the file cannot be read, resolved or validated
 */
export async function loadConfig(
  configPath: string,
  options: ConfigLoadOptions = {}
): Promise<OpenAssocConfig> {
  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(
        `Config file ${configPath} exceeds 1MB size limit`,
        'config_too_large'
      );
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const baseDir = options.secrets_base_dir || path.dirname(path.resolve(configPath));
    const config = await parseConfig(fileContent, baseDir);

    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof OpenAssocError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Parse configuration from YAML text
 *
 * @param content YAML document (empty means all defaults)
 * @param secretsBaseDir Base directory for ${file:} references
 */
export async function parseConfig(
  content: string,
  secretsBaseDir: string = process.cwd()
): Promise<OpenAssocConfig> {
  const rawConfig: unknown =
    parseYaml(content, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    }) ?? {};

  const resolvedConfig = await resolveReferences(rawConfig, secretsBaseDir);

  try {
    return OpenAssocConfigSchema.parse(resolvedConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, 'configuration_error', {
        issues,
      });
    }
    throw error;
  }
}

/**
 * Resolve ${ENV:VAR} and ${file:path} references in config values
 */
async function resolveReferences(obj: unknown, secretsBaseDir: string): Promise<unknown> {
  if (typeof obj === 'string') {
    const envMatch = obj.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (envMatch?.[1]) {
      const value = process.env[envMatch[1]];
      if (value === undefined) {
        throw new ConfigurationError(
          `Environment variable ${envMatch[1]} not found`,
          'config_resolution_error'
        );
      }
      return coerceScalar(value);
    }

    const fileMatch = obj.match(/^\$\{file:(.+)\}$/);
    if (fileMatch?.[1]) {
      return coerceScalar(await resolveFileReference(fileMatch[1], secretsBaseDir));
    }

    return obj;
  }

  if (Array.isArray(obj)) {
    return Promise.all(obj.map(item => resolveReferences(item, secretsBaseDir)));
  }

  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = await resolveReferences(value, secretsBaseDir);
    }
    return resolved;
  }

  return obj;
}

/**
 * Resolved references are strings; numeric and boolean settings are coerced
 * so `${ENV:RP_TIMEOUT}` can feed an integer field.
 */
function coerceScalar(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * Resolve ${file:path} reference, contained to the secrets base directory
 */
async function resolveFileReference(filePath: string, secretsBaseDir: string): Promise<string> {
  const absolutePath = path.isAbsolute(filePath)
    ? filePath
    : path.resolve(secretsBaseDir, filePath);

  let realPath: string;
  let realBase: string;
  try {
    realPath = await fs.realpath(absolutePath);
    realBase = await fs.realpath(secretsBaseDir);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read referenced file ${filePath}: ${error instanceof Error ? error.message : 'unknown error'}`,
      'file_resolution_error'
    );
  }

  if (!realPath.startsWith(realBase + path.sep) && realPath !== realBase) {
    throw new ConfigurationError(
      `Referenced file escapes allowed directory: ${filePath}`,
      'path_traversal_blocked'
    );
  }

  const stats = await fs.stat(realPath);
  if (stats.size > MAX_CONFIG_BYTES) {
    throw new ConfigurationError(`Referenced file ${realPath} exceeds 1MB`, 'file_too_large');
  }

  const content = await fs.readFile(realPath, 'utf-8');
  return content.trim();
}
