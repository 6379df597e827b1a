/**
 * Change Formatting Helpers
 *
 * Shared by the structural comparator and the fallback field differ:
 * identity-key derivation, deep equality, serialized sizes and the
 * summarising of long label lists.
 */

import type { Column } from '../types/data-model.js';

/** Placeholder for entities without a name */
export const UNNAMED = 'Unnamed';

// ============================================
// VALUE INSPECTION
// ============================================

/**
 * Check if a value is a plain object
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a collection (object or array)
 */
export function isComposite(value: unknown): boolean {
  return typeof value === 'object' && value !== null;
}

/**
 * Check if two values are equal using deep comparison
 * (key order insensitive for objects)
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b) return false;
  if (a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((val, idx) => valuesEqual(val, b[idx]));
  }

  if (isObject(a) && isObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);

    if (keysA.length !== keysB.length) return false;

    return keysA.every(key => key in b && valuesEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Length of the compact JSON serialization of a value
 */
export function serializedSize(value: unknown): number {
  const json: string | undefined = JSON.stringify(value);
  return json === undefined ? 0 : json.length;
}

// ============================================
// IDENTITY KEYS
// ============================================

/**
 * Normalise an `id` field to a string key. Only non-empty strings and
 * finite numbers identify an entity.
 */
export function identityKey(id: unknown): string | undefined {
  if (typeof id === 'string') {
    return id.length > 0 ? id : undefined;
  }
  if (typeof id === 'number' && Number.isFinite(id)) {
    return String(id);
  }
  return undefined;
}

/**
 * Column identity: `id` when present, else `name`, else the empty string.
 */
export function columnKey(column: Column): string {
  return identityKey(column.id) ?? column.name ?? '';
}

/**
 * Sort keys in code-unit order so report order never depends on input order
 */
export function sortedKeys(keys: Iterable<string>): string[] {
  return [...keys].sort();
}

// ============================================
// TEXT
// ============================================

/**
 * Treat null, undefined and '' alike
 */
export function textOf(value: string | null | undefined): string {
  return value ?? '';
}

/**
 * Display name with a placeholder for unnamed entities
 */
export function displayName(name: string | null | undefined, fallback: string = UNNAMED): string {
  return name ? name : fallback;
}

/**
 * First `maxLength` characters of a text, marked when cut
 */
export function truncatePreview(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Render a scalar for a change message
 */
export function formatScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  return String(value);
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * A label list cut down to `maxLabels` entries
 */
export interface LabelSummary {
  text: string;
  elided: number;
}

/**
 * Join labels, keeping at most `maxLabels` of them.
 * With `showElidedCount` the dropped ones are counted as "and N more".
 */
export function summarizeLabels(
  labels: string[],
  maxLabels: number,
  showElidedCount: boolean
): LabelSummary {
  const shown = labels.slice(0, maxLabels);
  const elided = labels.length - shown.length;
  let text = shown.join(', ');

  if (elided > 0 && showElidedCount) {
    text += ` and ${elided} more`;
  }

  return { text, elided };
}
