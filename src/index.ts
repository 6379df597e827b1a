/**
 * datamodel-diff
 *
 * Compares two versions of a data model document and reports what
 * changed: added, removed and renamed pages, elements and columns, column
 * definition changes, and top-level field changes when nothing structural
 * moved.
 *
 * Usage:
 * ```typescript
 * import { analyzeChanges, renderChangeEntry } from 'datamodel-diff';
 *
 * const analysis = analyzeChanges(previousModel, currentModel);
 * console.log(analysis.entries.map(renderChangeEntry).join('\n'));
 * ```
 */

export {
  StructuralComparator,
  createStructuralComparator,
  compareDocuments,
  compareColumns,
  documentsEquivalent,
  matchByIdentity,
  type ColumnComparison,
  type IdentityMatch,
} from './core/structural-comparator.js';

export { diffTopLevelFields } from './core/fallback-field-differ.js';

export {
  analyzeChanges,
  compareSources,
  renderChangeEntry,
  renderMarkdownReport,
  type AnalysisSource,
  type ChangeAnalysis,
  type ComparisonPair,
  type ComparisonResult,
} from './core/change-report.js';

export {
  DocumentLoadError,
  FileDocumentSource,
  InMemoryDocumentSource,
  NO_PRIOR_VERSION,
  parseDocument,
  type DocumentSource,
} from './core/document-source.js';

export {
  DEFAULT_DIFF_OPTIONS,
  resolveDiffOptions,
  dataModelDocumentSchema,
  type ChangeEntry,
  type ChangeKind,
  type ChangeSubject,
  type Column,
  type DataModelDocument,
  type DiffOptions,
  type Element,
  type Page,
} from './types/data-model.js';

export {
  getConfigFile,
  clearConfigFileCache,
  getMergedDiffConfig,
  getMergedLogConfig,
  generateSampleConfig,
} from './utils/config-loader.js';

export { ConfigValidationError } from './utils/config-schemas.js';

export { configureLogger, logger, type LogLevel } from './utils/logger.js';
