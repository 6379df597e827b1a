/**
 * Document Sources
 *
 * Where snapshots come from. The comparator only ever sees deserialized
 * documents; sources do the reading and parsing, and report "no prior
 * version" as undefined.
 */

import { readFile } from 'fs/promises';
import { dataModelDocumentSchema, type DataModelDocument } from '../types/data-model.js';
import { documentUnreadableError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';

const log = logger.source;

/**
 * Raised when a snapshot exists but cannot be turned into a document
 */
export class DocumentLoadError extends Error {
  constructor(
    public readonly label: string,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(documentUnreadableError(label, reason), options);
    this.name = 'DocumentLoadError';
  }
}

/**
 * Provides one snapshot of a document
 */
export interface DocumentSource {
  /** Human-readable origin, used in reports and errors */
  readonly label: string;

  /** The document, or undefined when this version does not exist */
  load(): Promise<DataModelDocument | undefined>;
}

/**
 * Validate a deserialized value as a document
 *
 * @throws DocumentLoadError when the value is not a document object
 */
export function parseDocument(value: unknown, label: string = 'document'): DataModelDocument {
  const result = dataModelDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DocumentLoadError(label, `${issue?.message ?? 'invalid document'}${where}`);
  }
  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a JSON document from disk. A missing file means "no version".
 */
export class FileDocumentSource implements DocumentSource {
  readonly label: string;

  constructor(private readonly path: string) {
    this.label = path;
  }

  async load(): Promise<DataModelDocument | undefined> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.debug('No document at path', { file: this.path });
        return undefined;
      }
      throw new DocumentLoadError(this.label, String(error), { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocumentLoadError(this.label, `invalid JSON (${reason})`, { cause: error });
    }

    return parseDocument(parsed, this.label);
  }
}

/**
 * A snapshot already held in memory
 */
export class InMemoryDocumentSource implements DocumentSource {
  constructor(
    readonly label: string,
    private readonly value: unknown
  ) {}

  async load(): Promise<DataModelDocument | undefined> {
    if (this.value === undefined || this.value === null) {
      return undefined;
    }
    return parseDocument(this.value, this.label);
  }
}

/**
 * Source for a version that does not exist
 */
export const NO_PRIOR_VERSION: DocumentSource = {
  label: '(none)',
  load: async () => undefined,
};
