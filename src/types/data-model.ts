/**
 * Data Model Types
 *
 * Shape of a data model document (document -> pages -> elements ->
 * columns) and of the change entries produced when two versions of one are
 * compared. Schemas are lenient: every field is optional and unknown fields
 * pass through, since exported documents carry vendor-specific metadata.
 */

import { z } from 'zod';

// ============================================
// DOCUMENT SCHEMAS
// ============================================

/**
 * Identity key as it appears in a document. Usually a string id; any other
 * value is accepted and treated as no key.
 */
export const identitySchema = z.unknown();

const optionalText = z.string().nullable().optional();

export const columnSchema = z
  .object({
    id: identitySchema,
    name: optionalText,
    formula: optionalText,
  })
  .passthrough();

export const elementSchema = z
  .object({
    id: identitySchema,
    name: optionalText,
    kind: optionalText,
    columns: z.array(columnSchema).nullable().optional(),
  })
  .passthrough();

export const pageSchema = z
  .object({
    id: identitySchema,
    name: optionalText,
    elements: z.array(elementSchema).nullable().optional(),
  })
  .passthrough();

export const dataModelDocumentSchema = z
  .object({
    name: optionalText,
    description: optionalText,
    pages: z.array(pageSchema).nullable().optional(),
  })
  .passthrough();

export type Column = z.infer<typeof columnSchema>;
export type Element = z.infer<typeof elementSchema>;
export type Page = z.infer<typeof pageSchema>;
export type DataModelDocument = z.infer<typeof dataModelDocumentSchema>;

// ============================================
// CHANGE ENTRIES
// ============================================

/**
 * Classification of a reported difference
 */
export type ChangeKind = 'added' | 'removed' | 'renamed' | 'modified' | 'new-document';

/**
 * What a change entry is about
 */
export type ChangeSubject =
  | 'document'
  | 'name'
  | 'description'
  | 'page'
  | 'element'
  | 'column'
  | 'columns'
  | 'field';

/**
 * One reported unit of difference
 */
export interface ChangeEntry {
  kind: ChangeKind;
  subject: ChangeSubject;

  /** Plain-text rendering, e.g. "renamed page: Sales → Sales2" */
  message: string;

  /** Element the entry belongs to (column entries) */
  elementName?: string;

  /** Element kind tag (element entries) */
  elementKind?: string;

  /** Top-level field name (fallback entries) */
  field?: string;

  /** Name or value before the change */
  before?: string;

  /** Name or value after the change */
  after?: string;

  /** Every label of a column list, including those elided from `message` */
  labels?: string[];

  /** Number of labels left out of `message` */
  elided?: number;

  /** Column count (new-document element entries) */
  columnCount?: number;
}

// ============================================
// OPTIONS
// ============================================

/**
 * Tuning for how changes are summarised. Resolved by the caller and passed
 * in; the engine never reads configuration on its own.
 */
export interface DiffOptions {
  /** Column labels listed per element before the rest are summarised */
  maxColumnLabels: number;

  /** Characters of an added description shown in its preview */
  descriptionPreviewLength: number;

  /** Strings longer than this are compared by length in the fallback diff */
  longStringThreshold: number;

  /** Append "and N more" when a label list is truncated */
  showElidedCount: boolean;
}

export const DEFAULT_DIFF_OPTIONS: DiffOptions = {
  maxColumnLabels: 5,
  descriptionPreviewLength: 100,
  longStringThreshold: 50,
  showElidedCount: true,
};

/**
 * Merge partial options over the defaults
 */
export function resolveDiffOptions(options: Partial<DiffOptions> = {}): DiffOptions {
  return {
    maxColumnLabels: options.maxColumnLabels ?? DEFAULT_DIFF_OPTIONS.maxColumnLabels,
    descriptionPreviewLength:
      options.descriptionPreviewLength ?? DEFAULT_DIFF_OPTIONS.descriptionPreviewLength,
    longStringThreshold: options.longStringThreshold ?? DEFAULT_DIFF_OPTIONS.longStringThreshold,
    showElidedCount: options.showElidedCount ?? DEFAULT_DIFF_OPTIONS.showElidedCount,
  };
}
