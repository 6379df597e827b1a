/**
 * Change Report
 *
 * Caller side of the diff engine:
 * - Runs the structural comparison and falls back to the top-level field
 *   diff when it finds nothing although the documents differ
 * - Loads document pairs from their sources, one result per file
 * - Renders results as markdown for PR comments or terminals
 */

import type { ChangeEntry, ChangeKind, DataModelDocument, DiffOptions } from '../types/data-model.js';
import { logger } from '../utils/logger.js';
import { diffTopLevelFields } from './fallback-field-differ.js';
import { DocumentLoadError, type DocumentSource } from './document-source.js';
import { compareDocuments, documentsEquivalent } from './structural-comparator.js';

const log = logger.report;

// ============================================
// TYPES
// ============================================

/**
 * Which pass produced the entries
 */
export type AnalysisSource = 'structural' | 'fallback' | 'none';

/**
 * Changes between two snapshots of one document
 */
export interface ChangeAnalysis {
  hasChanges: boolean;
  source: AnalysisSource;
  entries: ChangeEntry[];
}

/**
 * An old/new pair to compare, named after the file it describes
 */
export interface ComparisonPair {
  file: string;
  old: DocumentSource;
  new: DocumentSource;
}

/**
 * Outcome for one file of a batch
 */
export type ComparisonResult =
  | { file: string; status: 'compared'; analysis: ChangeAnalysis }
  | { file: string; status: 'failed'; error: string };

// ============================================
// ANALYSIS
// ============================================

/**
 * Compare two snapshots, using the field-level fallback when the
 * structural pass reports nothing for documents that are not equivalent.
 * Reordered pages, elements or columns are not a change.
 */
export function analyzeChanges(
  oldDoc: DataModelDocument | undefined,
  newDoc: DataModelDocument,
  options?: Partial<DiffOptions>
): ChangeAnalysis {
  const structural = compareDocuments(oldDoc, newDoc, options);
  if (structural.length > 0) {
    return { hasChanges: true, source: 'structural', entries: structural };
  }

  if (documentsEquivalent(oldDoc, newDoc)) {
    return { hasChanges: false, source: 'none', entries: [] };
  }

  log.debug('No structural changes between differing documents, using field diff');
  const fallback = diffTopLevelFields(oldDoc, newDoc, options);
  return { hasChanges: fallback.length > 0, source: 'fallback', entries: fallback };
}

/**
 * Load and compare every pair. A pair that cannot be loaded becomes a
 * failed result; the rest of the batch still runs.
 */
export async function compareSources(
  pairs: ComparisonPair[],
  options?: Partial<DiffOptions>
): Promise<ComparisonResult[]> {
  const startTime = Date.now();

  const results = await Promise.all(
    pairs.map(async (pair): Promise<ComparisonResult> => {
      try {
        const [oldDoc, newDoc] = await Promise.all([pair.old.load(), pair.new.load()]);
        if (!newDoc) {
          return { file: pair.file, status: 'failed', error: `${pair.new.label} does not exist` };
        }

        const analysis = analyzeChanges(oldDoc, newDoc, options);
        log.debug('Compared document', {
          file: pair.file,
          source: analysis.source,
          entries: analysis.entries.length,
        });
        return { file: pair.file, status: 'compared', analysis };
      } catch (error) {
        if (!(error instanceof DocumentLoadError)) {
          throw error;
        }
        log.warn('Could not load document', { file: pair.file, error: error.reason });
        return { file: pair.file, status: 'failed', error: `${error.label}: ${error.reason}` };
      }
    })
  );

  log.timed('Compared documents', startTime, { operation: 'compareSources', entries: results.length });
  return results;
}

// ============================================
// MARKDOWN RENDERING
// ============================================

const MARKERS: Record<ChangeKind, string> = {
  'new-document': '🆕',
  added: '➕',
  removed: '➖',
  renamed: '✏️',
  modified: '📝',
};

/**
 * Render one entry as a markdown line
 */
export function renderChangeEntry(entry: ChangeEntry): string {
  if (entry.kind === 'new-document') {
    return `${MARKERS[entry.kind]} **${entry.message}**`;
  }

  // Element listing under a new document
  if (entry.subject === 'element' && entry.columnCount !== undefined) {
    return `- ${entry.message}`;
  }

  const line = `${MARKERS[entry.kind]} ${entry.message}`;
  return entry.subject === 'column' || entry.subject === 'columns' ? `  ${line}` : line;
}

/**
 * Render a batch of results as a markdown report
 */
export function renderMarkdownReport(results: ComparisonResult[]): string {
  if (results.length === 0) {
    return 'No data model changes detected.';
  }

  const lines: string[] = [`**${results.length} data model(s) changed:**`, ''];

  for (const result of results) {
    lines.push(`### \`${result.file}\``, '');

    if (result.status === 'failed') {
      lines.push(`⚠️ Could not compare: ${result.error}`);
    } else if (!result.analysis.hasChanges) {
      lines.push('_No changes detected_');
    } else {
      lines.push(...result.analysis.entries.map(renderChangeEntry));
    }

    lines.push('');
  }

  return lines.join('\n');
}
