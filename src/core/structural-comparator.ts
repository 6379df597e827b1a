/**
 * Structural Comparator
 *
 * Compares two versions of a data model document level by level
 * (document -> page -> element -> column), matching entities by identity
 * key rather than position, and reports:
 * - Added and removed pages, elements and columns
 * - Renamed pages, elements and id-keyed columns
 * - Columns whose definition (formula, type, ...) changed
 * - Name and description changes on the document itself
 *
 * @example
 * ```typescript
 * import { compareDocuments } from 'datamodel-diff';
 *
 * const entries = compareDocuments(previousModel, currentModel);
 * for (const entry of entries) {
 *   console.log(entry.message);
 * }
 * ```
 */

import {
  resolveDiffOptions,
  type ChangeEntry,
  type ChangeSubject,
  type Column,
  type DataModelDocument,
  type DiffOptions,
  type Element,
  type Page,
} from '../types/data-model.js';
import {
  UNNAMED,
  columnKey,
  displayName,
  identityKey,
  pluralize,
  sortedKeys,
  summarizeLabels,
  textOf,
  truncatePreview,
  valuesEqual,
} from '../utils/change-format.js';

// ============================================
// IDENTITY MATCHING
// ============================================

/**
 * Result of pairing two collections by identity key
 */
export interface IdentityMatch<T> {
  /** Only in the new collection, keyed ones first in key order */
  added: T[];

  /** Only in the old collection, keyed ones first in key order */
  removed: T[];

  /** Present on both sides, in key order */
  common: Array<[T, T]>;
}

/**
 * Pair entities by `id`. Entities whose id is missing or repeated within
 * their own collection cannot be matched by key: they pair up only with a
 * deep-equal entity on the other side, and are otherwise reported as
 * removed and added, never renamed.
 */
export function matchByIdentity<T extends { id?: unknown }>(
  oldItems: readonly T[],
  newItems: readonly T[]
): IdentityMatch<T> {
  const oldIndex = indexByIdentity(oldItems);
  const newIndex = indexByIdentity(newItems);

  const added: T[] = [];
  const removed: T[] = [];
  const common: Array<[T, T]> = [];

  for (const key of sortedKeys(newIndex.keyed.keys())) {
    const item = newIndex.keyed.get(key);
    if (item !== undefined && !oldIndex.keyed.has(key)) {
      added.push(item);
    }
  }

  for (const key of sortedKeys(oldIndex.keyed.keys())) {
    const oldItem = oldIndex.keyed.get(key);
    if (oldItem === undefined) continue;

    const newItem = newIndex.keyed.get(key);
    if (newItem === undefined) {
      removed.push(oldItem);
    } else {
      common.push([oldItem, newItem]);
    }
  }

  // Unkeyed entities: drop identical pairs, report the rest
  const unmatchedNew = [...newIndex.unkeyed];
  for (const oldItem of oldIndex.unkeyed) {
    const twin = unmatchedNew.findIndex(newItem => valuesEqual(oldItem, newItem));
    if (twin >= 0) {
      unmatchedNew.splice(twin, 1);
    } else {
      removed.push(oldItem);
    }
  }
  added.push(...unmatchedNew);

  return { added, removed, common };
}

interface IdentityIndex<T> {
  keyed: Map<string, T>;
  unkeyed: T[];
}

function indexByIdentity<T extends { id?: unknown }>(items: readonly T[]): IdentityIndex<T> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = identityKey(item.id);
    if (key !== undefined) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  const keyed = new Map<string, T>();
  const unkeyed: T[] = [];
  for (const item of items) {
    const key = identityKey(item.id);
    if (key !== undefined && counts.get(key) === 1) {
      keyed.set(key, item);
    } else {
      unkeyed.push(item);
    }
  }

  return { keyed, unkeyed };
}

// ============================================
// COLUMN MATCHING
// ============================================

/**
 * Column differences within one element
 */
export interface ColumnComparison {
  renamed: Array<{ from: string; to: string }>;
  added: string[];
  removed: string[];
  modified: string[];
}

/**
 * Compare two column lists. Columns are keyed by `id`, falling back to
 * `name`; later columns with the same key replace earlier ones.
 *
 * A column is renamed when both sides carry the same id under different
 * names, and modified when anything besides its name differs. One column
 * can be both.
 */
export function compareColumns(
  oldColumns: readonly Column[],
  newColumns: readonly Column[]
): ColumnComparison {
  const oldByKey = new Map(oldColumns.map(column => [columnKey(column), column] as const));
  const newByKey = new Map(newColumns.map(column => [columnKey(column), column] as const));

  const result: ColumnComparison = { renamed: [], added: [], removed: [], modified: [] };

  for (const key of sortedKeys(newByKey.keys())) {
    const column = newByKey.get(key);
    if (column !== undefined && !oldByKey.has(key)) {
      result.added.push(displayName(column.name, key || UNNAMED));
    }
  }

  for (const key of sortedKeys(oldByKey.keys())) {
    const oldColumn = oldByKey.get(key);
    if (oldColumn === undefined) continue;

    const newColumn = newByKey.get(key);
    if (newColumn === undefined) {
      result.removed.push(displayName(oldColumn.name, key || UNNAMED));
      continue;
    }

    const oldId = identityKey(oldColumn.id);
    const newId = identityKey(newColumn.id);
    if (oldId !== undefined && oldId === newId && textOf(oldColumn.name) !== textOf(newColumn.name)) {
      result.renamed.push({
        from: displayName(oldColumn.name),
        to: displayName(newColumn.name),
      });
    }

    if (!valuesEqual(withoutField(oldColumn, 'name'), withoutField(newColumn, 'name'))) {
      result.modified.push(displayName(newColumn.name, newId ?? UNNAMED));
    }
  }

  return result;
}

/**
 * Shallow copy of a record without one field
 */
function withoutField(record: object, omitted: string): Record<string, unknown> {
  const rest: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(record)) {
    if (field !== omitted) {
      rest[field] = value;
    }
  }
  return rest;
}

// ============================================
// EQUIVALENCE
// ============================================

/**
 * Whether two lists hold the same members in any order
 */
function sameMembers<T>(
  oldItems: readonly T[],
  newItems: readonly T[],
  equivalent: (a: T, b: T) => boolean
): boolean {
  if (oldItems.length !== newItems.length) return false;

  const unmatched = [...newItems];
  for (const oldItem of oldItems) {
    const twin = unmatched.findIndex(newItem => equivalent(oldItem, newItem));
    if (twin < 0) return false;
    unmatched.splice(twin, 1);
  }
  return true;
}

function elementsEquivalent(a: Element, b: Element): boolean {
  return (
    valuesEqual(withoutField(a, 'columns'), withoutField(b, 'columns')) &&
    sameMembers(a.columns ?? [], b.columns ?? [], valuesEqual)
  );
}

function pagesEquivalent(a: Page, b: Page): boolean {
  return (
    valuesEqual(withoutField(a, 'elements'), withoutField(b, 'elements')) &&
    sameMembers(a.elements ?? [], b.elements ?? [], elementsEquivalent)
  );
}

/**
 * Deep equality that ignores the order of pages, elements and columns and
 * treats a missing collection as empty. Two documents that differ only in
 * those respects carry no change to report.
 */
export function documentsEquivalent(
  oldDoc: DataModelDocument | undefined,
  newDoc: DataModelDocument | undefined
): boolean {
  if (!oldDoc || !newDoc) {
    return oldDoc === newDoc;
  }

  return (
    valuesEqual(withoutField(oldDoc, 'pages'), withoutField(newDoc, 'pages')) &&
    sameMembers(oldDoc.pages ?? [], newDoc.pages ?? [], pagesEquivalent)
  );
}

// ============================================
// COMPARATOR
// ============================================

/**
 * Structural Comparator
 *
 * Stateless: the same instance can compare any number of document pairs.
 */
export class StructuralComparator {
  private options: DiffOptions;

  constructor(options: Partial<DiffOptions> = {}) {
    this.options = resolveDiffOptions(options);
  }

  /**
   * Compare two snapshots of a document
   *
   * @param oldDoc - Previous snapshot, undefined when there is none
   * @param newDoc - Current snapshot
   * @returns Ordered change entries; empty when nothing structural changed
   */
  compare(oldDoc: DataModelDocument | undefined, newDoc: DataModelDocument): ChangeEntry[] {
    if (!oldDoc) {
      return this.describeNewDocument(newDoc);
    }

    const changes: ChangeEntry[] = [];

    this.compareText(changes, 'name', oldDoc.name, newDoc.name);
    this.compareText(changes, 'description', oldDoc.description, newDoc.description);
    this.comparePages(changes, oldDoc.pages ?? [], newDoc.pages ?? []);

    return changes;
  }

  /**
   * A document without history: list every element it defines
   */
  private describeNewDocument(doc: DataModelDocument): ChangeEntry[] {
    const name = textOf(doc.name);
    const changes: ChangeEntry[] = [
      {
        kind: 'new-document',
        subject: 'document',
        message: name ? `new document: ${name}` : 'new document',
        ...(name ? { after: name } : {}),
      },
    ];

    for (const page of doc.pages ?? []) {
      for (const element of page.elements ?? []) {
        const kind = displayName(element.kind, 'unknown');
        const elementName = displayName(element.name);
        const columnCount = (element.columns ?? []).length;

        changes.push({
          kind: 'added',
          subject: 'element',
          message: `${kind}: ${elementName} (${pluralize(columnCount, 'column')})`,
          elementName,
          elementKind: kind,
          columnCount,
        });
      }
    }

    return changes;
  }

  private compareText(
    changes: ChangeEntry[],
    subject: Extract<ChangeSubject, 'name' | 'description'>,
    oldValue: string | null | undefined,
    newValue: string | null | undefined
  ): void {
    const before = textOf(oldValue);
    const after = textOf(newValue);
    if (before === after) return;

    if (before && after) {
      changes.push({
        kind: 'modified',
        subject,
        message: subject === 'name' ? `modified name: ${before} → ${after}` : 'modified description',
        before,
        after,
      });
    } else if (after) {
      const shown =
        subject === 'description'
          ? truncatePreview(after, this.options.descriptionPreviewLength)
          : after;
      changes.push({ kind: 'added', subject, message: `added ${subject}: ${shown}`, after });
    } else {
      changes.push({
        kind: 'removed',
        subject,
        message: subject === 'name' ? `removed name: ${before}` : 'removed description',
        before,
      });
    }
  }

  private comparePages(changes: ChangeEntry[], oldPages: Page[], newPages: Page[]): void {
    const match = matchByIdentity(oldPages, newPages);

    for (const page of match.added) {
      changes.push({ kind: 'added', subject: 'page', message: `added page: ${displayName(page.name)}` });
    }

    for (const page of match.removed) {
      changes.push({ kind: 'removed', subject: 'page', message: `removed page: ${displayName(page.name)}` });
    }

    for (const [oldPage, newPage] of match.common) {
      if (textOf(oldPage.name) !== textOf(newPage.name)) {
        const before = displayName(oldPage.name);
        const after = displayName(newPage.name);
        changes.push({
          kind: 'renamed',
          subject: 'page',
          message: `renamed page: ${before} → ${after}`,
          before,
          after,
        });
      }

      this.compareElements(changes, oldPage.elements ?? [], newPage.elements ?? []);
    }
  }

  private compareElements(changes: ChangeEntry[], oldElements: Element[], newElements: Element[]): void {
    const match = matchByIdentity(oldElements, newElements);

    for (const element of match.added) {
      const kind = displayName(element.kind, 'element');
      const elementName = displayName(element.name);
      changes.push({
        kind: 'added',
        subject: 'element',
        message: `added ${kind}: ${elementName}`,
        elementName,
        elementKind: kind,
      });
    }

    for (const element of match.removed) {
      const kind = displayName(element.kind, 'element');
      const elementName = displayName(element.name);
      changes.push({
        kind: 'removed',
        subject: 'element',
        message: `removed ${kind}: ${elementName}`,
        elementName,
        elementKind: kind,
      });
    }

    for (const [oldElement, newElement] of match.common) {
      const kind = displayName(newElement.kind, 'element');
      const elementName = displayName(newElement.name);

      if (textOf(oldElement.name) !== textOf(newElement.name)) {
        const before = displayName(oldElement.name);
        changes.push({
          kind: 'renamed',
          subject: 'element',
          message: `renamed ${kind}: ${before} → ${elementName}`,
          elementName,
          elementKind: kind,
          before,
          after: elementName,
        });
      }

      this.reportColumns(
        changes,
        elementName,
        compareColumns(oldElement.columns ?? [], newElement.columns ?? [])
      );
    }
  }

  private reportColumns(changes: ChangeEntry[], elementName: string, columns: ColumnComparison): void {
    for (const { from, to } of columns.renamed) {
      changes.push({
        kind: 'renamed',
        subject: 'column',
        message: `renamed column: ${from} → ${to}`,
        elementName,
        before: from,
        after: to,
      });
    }

    const lists: Array<['added' | 'removed' | 'modified', string[]]> = [
      ['added', columns.added],
      ['removed', columns.removed],
      ['modified', columns.modified],
    ];

    for (const [kind, labels] of lists) {
      if (labels.length === 0) continue;

      const summary = summarizeLabels(
        labels,
        this.options.maxColumnLabels,
        this.options.showElidedCount
      );
      changes.push({
        kind,
        subject: 'columns',
        message: `${kind} columns in ${elementName}: ${summary.text}`,
        elementName,
        labels,
        elided: summary.elided,
      });
    }
  }
}

// ============================================
// FACTORY FUNCTIONS
// ============================================

/**
 * Create a new StructuralComparator
 */
export function createStructuralComparator(options?: Partial<DiffOptions>): StructuralComparator {
  return new StructuralComparator(options);
}

/**
 * Compare two document snapshots (convenience function)
 */
export function compareDocuments(
  oldDoc: DataModelDocument | undefined,
  newDoc: DataModelDocument,
  options?: Partial<DiffOptions>
): ChangeEntry[] {
  return new StructuralComparator(options).compare(oldDoc, newDoc);
}
