/**
 * Configuration File Loader
 *
 * Loads configuration from .datamodeldiffrc or .datamodeldiffrc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.datamodeldiffrc)
 *
 * @example
 * // .datamodeldiffrc in project root
 * {
 *   "log": { "level": "debug" },
 *   // list up to ten column names per element
 *   "diff": { "maxColumnLabels": 10 }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  diffConfigSchema,
  logConfigSchema,
  parseConfigSection,
  type DiffConfig,
  type LogConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).strict().optional(),

  diff: z.object({
    maxColumnLabels: z.number().int().min(1).max(100).optional(),
    descriptionPreviewLength: z.number().int().min(10).max(1000).optional(),
    longStringThreshold: z.number().int().min(1).max(10000).optional(),
    showElidedCount: z.boolean().optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

/**
 * Names of config files to search for (in priority order).
 */
export const CONFIG_FILE_NAMES = [
  '.datamodeldiffrc',
  '.datamodeldiffrc.json',
  'datamodeldiffrc.json',
];

function getSearchPaths(cwd: string): string[] {
  const paths = [cwd];

  try {
    const home = homedir();
    if (home && !paths.includes(home)) {
      paths.push(home);
    }
  } catch (error) {
    log.debug('Home directory unavailable', { error: String(error) });
  }

  return paths;
}

function findConfigFile(cwd: string): string | null {
  const searchPaths = getSearchPaths(cwd);

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. Invalid files are logged and ignored.
 */
function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    // Allow // and /* */ comments in the config file
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        path: filePath,
        errors: result.error.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', {
      path: filePath,
      sections: Object.keys(result.data),
    });

    return result.data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', {
        path: filePath,
        error: error.message,
      });
    } else {
      log.warn('Failed to read config file', {
        path: filePath,
        error: String(error),
      });
    }
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let configFileLoaded = false;

/**
 * Get the loaded config file (cached after first load).
 *
 * @param cwd - Directory searched first; only used on the first load
 */
export function getConfigFile(cwd: string = process.cwd()): ConfigFile {
  if (!configFileLoaded) {
    const filePath = findConfigFile(cwd);
    cachedConfigFile = filePath ? loadConfigFile(filePath) : {};
    configFileLoaded = true;
  }
  return cachedConfigFile ?? {};
}

/**
 * Clear the config file cache.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  configFileLoaded = false;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 * Config file values are used unless overridden by environment variables.
 */
export function getMergedLogConfig(): LogConfig {
  const file = getConfigFile().log ?? {};

  const merged = {
    level: process.env.LOG_LEVEL ?? file.level,
    prettyPrint: process.env.LOG_PRETTY ?? boolToEnvString(file.prettyPrint),
  };

  return parseConfigSection('log', logConfigSchema, merged);
}

/**
 * Get merged diff configuration.
 */
export function getMergedDiffConfig(): DiffConfig {
  const file = getConfigFile().diff ?? {};

  const merged = {
    maxColumnLabels: process.env.DIFF_MAX_COLUMN_LABELS ?? numToEnvString(file.maxColumnLabels),
    descriptionPreviewLength:
      process.env.DIFF_DESCRIPTION_PREVIEW_LENGTH ?? numToEnvString(file.descriptionPreviewLength),
    longStringThreshold:
      process.env.DIFF_LONG_STRING_THRESHOLD ?? numToEnvString(file.longStringThreshold),
    showElidedCount: process.env.DIFF_SHOW_ELIDED_COUNT ?? boolToEnvString(file.showElidedCount),
  };

  return parseConfigSection('diff', diffConfigSchema, merged);
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Generate a sample .datamodeldiffrc file with all available options.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    diff: {
      maxColumnLabels: 5,
      descriptionPreviewLength: 100,
      longStringThreshold: 50,
      showElidedCount: true,
    },
  };

  return JSON.stringify(sample, null, 2);
}
