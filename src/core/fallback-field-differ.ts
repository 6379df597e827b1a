/**
 * Fallback Field Differ
 *
 * Shallow comparison of the top-level fields of two documents. Used when
 * the structural comparison found nothing although the documents differ,
 * e.g. when only schema metadata or version fields changed.
 *
 * Large values are summarised by size instead of printed.
 */

import {
  resolveDiffOptions,
  type ChangeEntry,
  type DataModelDocument,
  type DiffOptions,
} from '../types/data-model.js';
import { formatScalar, isComposite, serializedSize, sortedKeys, valuesEqual } from '../utils/change-format.js';

function lengthOf(value: unknown): number {
  return typeof value === 'string' ? value.length : serializedSize(value);
}

/**
 * Describe how one top-level field changed
 */
function describeModifiedField(
  field: string,
  oldValue: unknown,
  newValue: unknown,
  longStringThreshold: number
): string {
  if (isComposite(oldValue) || isComposite(newValue)) {
    return `modified field: ${field} (size ${serializedSize(oldValue)} → ${serializedSize(newValue)} characters)`;
  }

  const isLongString = (value: unknown) =>
    typeof value === 'string' && value.length > longStringThreshold;

  if (isLongString(oldValue) || isLongString(newValue)) {
    return `modified field: ${field} (length ${lengthOf(oldValue)} → ${lengthOf(newValue)})`;
  }

  return `modified field: ${field}: ${formatScalar(oldValue)} → ${formatScalar(newValue)}`;
}

/**
 * Compare top-level fields of two documents
 *
 * @param oldDoc - Previous snapshot, undefined when there is none
 * @param newDoc - Current snapshot
 * @param options - Summarisation thresholds
 * @returns One entry per differing field, in field-name order
 */
export function diffTopLevelFields(
  oldDoc: DataModelDocument | undefined,
  newDoc: DataModelDocument,
  options: Partial<DiffOptions> = {}
): ChangeEntry[] {
  const { longStringThreshold } = resolveDiffOptions(options);

  if (!oldDoc) {
    return [
      {
        kind: 'new-document',
        subject: 'document',
        message: `new document created (~${serializedSize(newDoc)} characters)`,
      },
    ];
  }

  const changes: ChangeEntry[] = [];
  const fields = sortedKeys(new Set([...Object.keys(oldDoc), ...Object.keys(newDoc)]));

  for (const field of fields) {
    const inOld = Object.prototype.hasOwnProperty.call(oldDoc, field);
    const inNew = Object.prototype.hasOwnProperty.call(newDoc, field);

    if (!inOld) {
      changes.push({ kind: 'added', subject: 'field', field, message: `added field: ${field}` });
      continue;
    }

    if (!inNew) {
      changes.push({ kind: 'removed', subject: 'field', field, message: `removed field: ${field}` });
      continue;
    }

    const oldValue = oldDoc[field];
    const newValue = newDoc[field];
    if (valuesEqual(oldValue, newValue)) continue;

    const scalars = !isComposite(oldValue) && !isComposite(newValue);

    changes.push({
      kind: 'modified',
      subject: 'field',
      field,
      message: describeModifiedField(field, oldValue, newValue, longStringThreshold),
      ...(scalars ? { before: formatScalar(oldValue), after: formatScalar(newValue) } : {}),
    });
  }

  return changes;
}
