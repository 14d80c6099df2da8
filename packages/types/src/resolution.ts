/**
 * @module resolution
 * Lookup modes and resolution outcomes.
 */

import type { EntryKind } from './entry';

/** A positional interpolation argument. */
export type Argument = string | number | bigint | boolean;

/** How a key should be resolved. */
export type ResolutionMode =
  | { kind: 'plain' }
  | { kind: 'plain-args'; args: readonly Argument[] }
  | { kind: 'plural'; count: number }
  | { kind: 'plural-args'; count: number; args: readonly Argument[] }
  | { kind: 'gendered'; gender: string }
  | { kind: 'gendered-args'; gender: string; args: readonly Argument[] };

/** Discriminator of {@link ResolutionMode}. */
export type ResolutionModeKind = ResolutionMode['kind'];

/** Why a single catalog could not produce a string. */
export type LookupFailure =
  | { kind: 'catalog-absent' }
  | { kind: 'key-absent'; key: string }
  | { kind: 'shape-mismatch'; key: string; expected: EntryKind; actual: EntryKind }
  | { kind: 'missing-variant'; key: string; variant: string };

/** Outcome of a lookup against a single catalog. */
export type LookupResult =
  | { ok: true; text: string }
  | { ok: false; failure: LookupFailure };

/** Which catalog produced the text. */
export type ResolutionSource = 'primary' | 'fallback';

/** Final outcome of a key resolution across primary and fallback catalogs. */
export interface Resolution {
  /** Renderable text. `"Error missing text"` when `missing` is true. */
  text: string;
  /** Diagnostic flag: no catalog produced a string. */
  missing: boolean;
  /** Catalog that produced the text, or null when missing. */
  source: ResolutionSource | null;
  /** Failures in the order they were met (primary first). */
  failures: LookupFailure[];
}
