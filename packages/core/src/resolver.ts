/**
 * @module resolver
 * Key resolution against a primary catalog with wholesale fallback.
 *
 * Lookup failures are values, never exceptions: whatever happens, callers get
 * a renderable string. An entry that exists in the primary catalog but lacks
 * the requested variant is retried as a whole against the fallback catalog;
 * variants are never mixed across languages.
 */

import type {
  Catalog,
  Entry,
  LookupResult,
  Resolution,
  ResolutionMode,
} from '@lexicon/types';
import { pluralCategory } from './plural';
import { substitutePlaceholders } from './placeholders';

/** Text returned when neither catalog can resolve a key. */
export const MISSING_TEXT = 'Error missing text';

/** Pick the display string of `entry` for `mode`, then substitute arguments. */
export function resolveEntry(entry: Entry, key: string, mode: ResolutionMode): LookupResult {
  switch (mode.kind) {
    case 'plain':
    case 'plain-args': {
      if (entry.kind !== 'plain') {
        return { ok: false, failure: { kind: 'shape-mismatch', key, expected: 'plain', actual: entry.kind } };
      }
      const text = mode.kind === 'plain-args' ? substitutePlaceholders(entry.text, mode.args) : entry.text;
      return { ok: true, text };
    }

    case 'plural':
    case 'plural-args': {
      if (entry.kind !== 'plural') {
        return { ok: false, failure: { kind: 'shape-mismatch', key, expected: 'plural', actual: entry.kind } };
      }
      const category = pluralCategory(mode.count);
      const template = entry.variants[category];
      if (template === undefined) {
        return { ok: false, failure: { kind: 'missing-variant', key, variant: category } };
      }
      const args = mode.kind === 'plural-args' ? [mode.count, ...mode.args] : [mode.count];
      return { ok: true, text: substitutePlaceholders(template, args) };
    }

    case 'gendered':
    case 'gendered-args': {
      if (entry.kind !== 'gendered') {
        return { ok: false, failure: { kind: 'shape-mismatch', key, expected: 'gendered', actual: entry.kind } };
      }
      // Own keys only, so "constructor" or "toString" never match.
      if (!Object.prototype.hasOwnProperty.call(entry.variants, mode.gender)) {
        return { ok: false, failure: { kind: 'missing-variant', key, variant: mode.gender } };
      }
      const template = entry.variants[mode.gender];
      const text = mode.kind === 'gendered-args' ? substitutePlaceholders(template, mode.args) : template;
      return { ok: true, text };
    }
  }
}

/** Look `key` up in a single, possibly absent, catalog. */
export function lookup(catalog: Catalog | undefined, key: string, mode: ResolutionMode): LookupResult {
  if (!catalog) {
    return { ok: false, failure: { kind: 'catalog-absent' } };
  }
  const entry = catalog.get(key);
  if (!entry) {
    return { ok: false, failure: { kind: 'key-absent', key } };
  }
  return resolveEntry(entry, key, mode);
}

/**
 * Resolve `key` against `primary`, retrying against `fallback` when the
 * primary lookup fails. The fallback is skipped when it is the same catalog
 * as the primary.
 */
export function resolve(
  primary: Catalog | undefined,
  fallback: Catalog | undefined,
  key: string,
  mode: ResolutionMode,
): Resolution {
  const first = lookup(primary, key, mode);
  if (first.ok) {
    return { text: first.text, missing: false, source: 'primary', failures: [] };
  }

  const failures = [first.failure];
  if (fallback && fallback !== primary) {
    const second = lookup(fallback, key, mode);
    if (second.ok) {
      return { text: second.text, missing: false, source: 'fallback', failures };
    }
    failures.push(second.failure);
  }

  return { text: MISSING_TEXT, missing: true, source: null, failures };
}
