/**
 * @module entry
 * Turns parsed document values into catalog entries.
 *
 * A string is a plain entry. An object is reduced to its string fields; if
 * every remaining key is a plural bucket the entry is plural, otherwise it is
 * gendered. Anything else is rejected. Entries and their variant maps are
 * frozen.
 */

import type { Entry, EntryBuildIssueReason, PluralCategory } from '@lexicon/types';

/** Plural buckets in selection order. */
export const PLURAL_CATEGORIES: readonly PluralCategory[] = ['none', 'one', 'many'];

/** Result of {@link buildEntry}. */
export type EntryBuildResult =
  | { ok: true; entry: Entry }
  | { ok: false; reason: EntryBuildIssueReason; message: string };

/** Narrow `value` to a plain (non-array, non-null) object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPluralCategory(key: string): key is PluralCategory {
  return (PLURAL_CATEGORIES as readonly string[]).includes(key);
}

/** Collect the string-valued own fields of `record`, keeping document order. */
function stringFields(record: Record<string, unknown>): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      fields.push([key, value]);
    }
  }
  return fields;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Build an {@link Entry} from one document value.
 *
 * Non-string fields inside an object are ignored. An object left with no
 * string fields is rejected as `empty-variants`.
 */
export function buildEntry(value: unknown): EntryBuildResult {
  if (typeof value === 'string') {
    const entry: Entry = { kind: 'plain', text: value };
    return { ok: true, entry: Object.freeze(entry) };
  }

  if (!isRecord(value)) {
    return {
      ok: false,
      reason: 'unsupported-value',
      message: `expected a string or an object, got ${describe(value)}`,
    };
  }

  const fields = stringFields(value);
  if (fields.length === 0) {
    return {
      ok: false,
      reason: 'empty-variants',
      message: 'object has no string variants',
    };
  }

  const variants: Readonly<Record<string, string>> = Object.freeze(Object.fromEntries(fields));
  const entry: Entry = fields.every(([key]) => isPluralCategory(key))
    ? { kind: 'plural', variants }
    : { kind: 'gendered', variants };
  return { ok: true, entry: Object.freeze(entry) };
}
