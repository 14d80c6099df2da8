/**
 * @module entry
 * Catalog entry definitions.
 * Each key in a message file resolves to exactly one Entry: a plain string,
 * a map of gender variants, or a map of plural buckets.
 */

/** Discriminator for entry shapes. */
export type EntryKind = 'plain' | 'gendered' | 'plural';

/** Plural bucket: `none` for 0, `one` for 1, `many` for every other count. */
export type PluralCategory = 'none' | 'one' | 'many';

/** A single untagged string. */
export interface PlainEntry {
  readonly kind: 'plain';
  /** Display text, possibly containing `{{name}}` placeholders. */
  readonly text: string;
}

/** Variants keyed by an open set of gender tags ("male", "female", "neutral", ...). */
export interface GenderedEntry {
  readonly kind: 'gendered';
  /** Gender tag → text. Never empty. */
  readonly variants: Readonly<Record<string, string>>;
}

/** Variants keyed by plural bucket. At least one bucket is present. */
export interface PluralEntry {
  readonly kind: 'plural';
  readonly variants: Readonly<Partial<Record<PluralCategory, string>>>;
}

/** A catalog value. */
export type Entry = PlainEntry | GenderedEntry | PluralEntry;

/** Why a document value could not become an Entry. */
export type EntryBuildIssueReason =
  | 'unsupported-value'
  | 'empty-variants';

/** A document value rejected while building a catalog. */
export interface EntryBuildIssue {
  /** Key of the rejected value. */
  key: string;
  reason: EntryBuildIssueReason;
  /** Human-readable detail for diagnostics. */
  message: string;
}
