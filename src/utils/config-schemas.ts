/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration. Environment variables and config
 * file values arrive as strings and are coerced here.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; an unset value keeps the default.
 */
export function booleanStringWithDefault(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min: number; max: number; default: number }) {
  return z.coerce.number().int().min(options.min).max(options.max).default(options.default);
}

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringWithDefault(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// DIFF CONFIGURATION
// ============================================

export const diffConfigSchema = z.object({
  maxColumnLabels: integerStringSchema({ min: 1, max: 100, default: 5 }),
  descriptionPreviewLength: integerStringSchema({ min: 10, max: 1000, default: 100 }),
  longStringThreshold: integerStringSchema({ min: 1, max: 10000, default: 50 }),
  showElidedCount: booleanStringWithDefault(true),
});

export type DiffConfig = z.infer<typeof diffConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse a config section, raising ConfigValidationError on failure.
 */
export function parseConfigSection<T extends z.ZodTypeAny>(
  section: string,
  schema: T,
  value: unknown
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}
