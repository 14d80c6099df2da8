/**
 * @module catalog
 * Immutable key → Entry store for one (language, file), built once from a
 * parsed message document.
 *
 * @see {@link @lexicon/types#Catalog} for the interface contract
 */

import type { Catalog, Entry, EntryBuildIssue } from '@lexicon/types';
import { buildEntry, isRecord } from './entry';

/** Thrown when a message document cannot be turned into a catalog at all. */
export class CatalogBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogBuildError';
  }
}

/** Concrete implementation of {@link Catalog}, backed by a `Map`. */
export class CatalogImpl implements Catalog {
  private readonly entries: ReadonlyMap<string, Entry>;

  constructor(entries: Iterable<readonly [string, Entry]>) {
    this.entries = new Map(entries);
    Object.freeze(this);
  }

  /** @inheritdoc */
  get size(): number {
    return this.entries.size;
  }

  /** @inheritdoc */
  get(key: string): Entry | undefined {
    return this.entries.get(key);
  }

  /** @inheritdoc */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** @inheritdoc */
  keys(): string[] {
    return [...this.entries.keys()];
  }
}

/** Output of {@link buildCatalog}. */
export interface CatalogBuildResult {
  catalog: Catalog;
  /** Values that were rejected and left out of the catalog. */
  issues: EntryBuildIssue[];
}

/**
 * Build a catalog from a parsed message document.
 *
 * Invalid values are skipped and reported in `issues`; the rest of the
 * document still loads.
 *
 * @param source - Label used in the error message (usually the file path).
 * @throws CatalogBuildError if the document root is not an object.
 */
export function buildCatalog(document: unknown, source = 'document'): CatalogBuildResult {
  if (!isRecord(document)) {
    throw new CatalogBuildError(`${source}: root must be an object of key/value pairs`);
  }

  const entries: Array<[string, Entry]> = [];
  const issues: EntryBuildIssue[] = [];

  for (const [key, value] of Object.entries(document)) {
    const result = buildEntry(value);
    if (result.ok) {
      entries.push([key, result.entry]);
    } else {
      issues.push({ key, reason: result.reason, message: result.message });
    }
  }

  return { catalog: new CatalogImpl(entries), issues };
}

/** A catalog with no entries. */
export function emptyCatalog(): Catalog {
  return new CatalogImpl([]);
}
