/**
 * Error Messages with Actionable Suggestions
 *
 * User-facing messages for the command-line tool: what went wrong, and what
 * to try instead.
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run */
  command?: string;
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// USAGE ERRORS
// =============================================================================

/**
 * Error when file arguments do not come in old/new pairs
 */
export function unpairedArgumentsError(count: number): string {
  return buildErrorMessage({
    message: `Expected old/new file pairs, got ${count} path${count === 1 ? '' : 's'}.`,
    command: 'datamodel-diff <old.json> <new.json> [<old.json> <new.json> ...]',
    alternatives: ['Pass "-" as the old path when there is no previous version'],
  });
}

/**
 * Error for an unrecognised option
 */
export function unknownOptionError(option: string): string {
  return buildErrorMessage({
    message: `Unknown option: ${option}`,
    command: 'datamodel-diff --help',
  });
}

/**
 * Error for an option whose value is missing or invalid
 */
export function invalidOptionValueError(option: string, value: string | undefined, expected: string): string {
  return buildErrorMessage({
    message: value === undefined
      ? `Option ${option} requires a value.`
      : `Invalid value for ${option}: ${value}`,
    suggestions: [`Expected ${expected}`],
  });
}

// =============================================================================
// DOCUMENT ERRORS
// =============================================================================

/**
 * Error when a snapshot cannot be read or parsed
 */
export function documentUnreadableError(label: string, reason: string): string {
  return buildErrorMessage({
    message: `Could not load ${label}: ${reason}`,
    suggestions: [
      'Check that the file contains a single JSON object',
      'Export the document again if it was edited by hand',
    ],
  });
}
