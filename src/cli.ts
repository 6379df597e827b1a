#!/usr/bin/env node
/**
 * datamodel-diff command line
 *
 * Usage:
 *   datamodel-diff [options] <old.json> <new.json> [<old.json> <new.json> ...]
 *
 * Pass "-" (or a path that does not exist) as the old file for a document
 * with no previous version.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import {
  compareSources,
  renderMarkdownReport,
  type ComparisonPair,
} from './core/change-report.js';
import { FileDocumentSource, NO_PRIOR_VERSION } from './core/document-source.js';
import type { DiffOptions } from './types/data-model.js';
import { getMergedDiffConfig, getMergedLogConfig } from './utils/config-loader.js';
import { ConfigValidationError } from './utils/config-schemas.js';
import {
  invalidOptionValueError,
  unknownOptionError,
  unpairedArgumentsError,
} from './utils/error-messages.js';
import { configureLogger, logger } from './utils/logger.js';

export type OutputFormat = 'markdown' | 'json';

export interface CliOptions {
  pairs: Array<{ oldPath: string; newPath: string }>;
  format: OutputFormat;
  maxLabels?: number;
  help: boolean;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

/**
 * Where the CLI writes; swapped out in tests
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const USAGE = `Usage: datamodel-diff [options] <old.json> <new.json> [<old.json> <new.json> ...]

Compares data model documents and prints a change report.
Use "-" as the old file when there is no previous version.

Options:
  --format <markdown|json>  Output format (default: markdown)
  --max-labels <n>          Column names listed per element before summarising
  -h, --help                Show this help`;

/**
 * Parse command-line arguments (without the node and script paths)
 */
export function parseCliArgs(args: string[]): ParseResult {
  const paths: string[] = [];
  let format: OutputFormat = 'markdown';
  let maxLabels: number | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg === '--format') {
      const value = args[++i];
      if (value !== 'markdown' && value !== 'json') {
        return { ok: false, error: invalidOptionValueError('--format', value, 'markdown or json') };
      }
      format = value;
    } else if (arg === '--max-labels') {
      const value = args[++i];
      const parsed = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(parsed) || parsed < 1) {
        return { ok: false, error: invalidOptionValueError('--max-labels', value, 'a positive integer') };
      }
      maxLabels = parsed;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: unknownOptionError(arg) };
    } else {
      paths.push(arg);
    }
  }

  if (help) {
    return { ok: true, options: { pairs: [], format, maxLabels, help } };
  }

  if (paths.length === 0 || paths.length % 2 !== 0) {
    return { ok: false, error: unpairedArgumentsError(paths.length) };
  }

  const pairs: CliOptions['pairs'] = [];
  for (let i = 0; i < paths.length; i += 2) {
    pairs.push({ oldPath: paths[i], newPath: paths[i + 1] });
  }

  return { ok: true, options: { pairs, format, maxLabels, help } };
}

function toComparisonPair(pair: CliOptions['pairs'][number]): ComparisonPair {
  return {
    file: pair.newPath,
    old: pair.oldPath === '-' ? NO_PRIOR_VERSION : new FileDocumentSource(pair.oldPath),
    new: new FileDocumentSource(pair.newPath),
  };
}

/**
 * Run the CLI and resolve with its exit code:
 * 0 on success, 1 when a pair could not be compared, 2 on usage errors.
 */
export async function runCli(
  args: string[],
  io: CliIO = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
  }
): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    io.stderr(`${parsed.error}\n`);
    return 2;
  }

  const { options } = parsed;
  if (options.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  let diffOptions: DiffOptions;
  try {
    const logConfig = getMergedLogConfig();
    configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });
    diffOptions = getMergedDiffConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      io.stderr(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  if (options.maxLabels !== undefined) {
    diffOptions = { ...diffOptions, maxColumnLabels: options.maxLabels };
  }

  const results = await compareSources(options.pairs.map(toComparisonPair), diffOptions);

  io.stdout(
    options.format === 'json'
      ? `${JSON.stringify(results, null, 2)}\n`
      : `${renderMarkdownReport(results)}\n`
  );

  const failed = results.filter(result => result.status === 'failed').length;
  if (failed > 0) {
    logger.cli.warn('Some documents could not be compared', { failed });
    return 1;
  }
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.cli.error('Fatal error', { error });
      process.exitCode = 1;
    });
}
