/**
 * Configuration Loader Tests
 *
 * Tests for the .datamodeldiffrc configuration file loading system.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  clearConfigFileCache,
  configFileSchema,
  generateSampleConfig,
  getConfigFile,
  getMergedDiffConfig,
  getMergedLogConfig,
} from '../../src/utils/config-loader.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';

// Store original env vars
const originalEnv = { ...process.env };

const DIFF_ENV_VARS = [
  'DIFF_MAX_COLUMN_LABELS',
  'DIFF_DESCRIPTION_PREVIEW_LENGTH',
  'DIFF_LONG_STRING_THRESHOLD',
  'DIFF_SHOW_ELIDED_COUNT',
  'LOG_PRETTY',
];

describe('ConfigLoader', () => {
  let testDir: string;

  beforeEach(() => {
    clearConfigFileCache();
    process.env = { ...originalEnv };
    for (const name of DIFF_ENV_VARS) {
      delete process.env[name];
    }
    testDir = mkdtempSync(join(tmpdir(), 'datamodel-diff-config-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    clearConfigFileCache();
    process.env = { ...originalEnv };
  });

  describe('configFileSchema', () => {
    it('should accept a full configuration', () => {
      const result = configFileSchema.safeParse(JSON.parse(generateSampleConfig()));
      expect(result.success).toBe(true);
    });

    it('should accept empty configuration', () => {
      expect(configFileSchema.safeParse({}).success).toBe(true);
    });

    it('should reject an out-of-range label limit', () => {
      expect(configFileSchema.safeParse({ diff: { maxColumnLabels: 0 } }).success).toBe(false);
    });

    it('should reject unknown keys (strict mode)', () => {
      expect(configFileSchema.safeParse({ unknownKey: 'value' }).success).toBe(false);
      expect(configFileSchema.safeParse({ diff: { maxLabels: 3 } }).success).toBe(false);
    });
  });

  describe('getConfigFile', () => {
    it('should load a config file from the working directory', () => {
      writeFileSync(
        join(testDir, '.datamodeldiffrc'),
        `{
          // keep reports short
          "diff": { "maxColumnLabels": 3 }
        }`
      );

      expect(getConfigFile(testDir)).toEqual({ diff: { maxColumnLabels: 3 } });
    });

    it('should ignore an invalid config file', () => {
      writeFileSync(join(testDir, '.datamodeldiffrc.json'), '{ "diff": { "maxColumnLabels": "many" } }');

      expect(getConfigFile(testDir)).toEqual({});
    });

    it('should cache the config file', () => {
      const first = getConfigFile(testDir);
      expect(getConfigFile(testDir)).toBe(first);
    });
  });

  describe('getMergedDiffConfig', () => {
    it('should use defaults without file or environment', () => {
      getConfigFile(testDir);

      expect(getMergedDiffConfig()).toEqual({
        maxColumnLabels: 5,
        descriptionPreviewLength: 100,
        longStringThreshold: 50,
        showElidedCount: true,
      });
    });

    it('should read values from the config file', () => {
      writeFileSync(
        join(testDir, '.datamodeldiffrc'),
        JSON.stringify({ diff: { maxColumnLabels: 8, showElidedCount: false } })
      );
      getConfigFile(testDir);

      const config = getMergedDiffConfig();

      expect(config.maxColumnLabels).toBe(8);
      expect(config.showElidedCount).toBe(false);
    });

    it('should let environment variables override the file', () => {
      writeFileSync(join(testDir, '.datamodeldiffrc'), JSON.stringify({ diff: { maxColumnLabels: 8 } }));
      getConfigFile(testDir);
      process.env.DIFF_MAX_COLUMN_LABELS = '12';
      process.env.DIFF_SHOW_ELIDED_COUNT = 'no';

      const config = getMergedDiffConfig();

      expect(config.maxColumnLabels).toBe(12);
      expect(config.showElidedCount).toBe(false);
    });

    it('should raise ConfigValidationError for invalid values', () => {
      getConfigFile(testDir);
      process.env.DIFF_LONG_STRING_THRESHOLD = 'lots';

      expect(() => getMergedDiffConfig()).toThrow(ConfigValidationError);
      expect(() => getMergedDiffConfig()).toThrow(/Configuration validation failed for diff/);
    });
  });

  describe('getMergedLogConfig', () => {
    it('should take the level from the environment', () => {
      getConfigFile(testDir);
      process.env.LOG_LEVEL = 'warn';

      expect(getMergedLogConfig()).toEqual({ level: 'warn', prettyPrint: false });
    });

    it('should read prettyPrint from the file', () => {
      writeFileSync(join(testDir, '.datamodeldiffrc'), JSON.stringify({ log: { prettyPrint: true } }));
      getConfigFile(testDir);
      process.env.LOG_LEVEL = 'error';

      expect(getMergedLogConfig()).toEqual({ level: 'error', prettyPrint: true });
    });
  });
});
