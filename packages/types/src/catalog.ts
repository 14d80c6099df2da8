/**
 * @module catalog
 * Catalog and message document types.
 */

import type { Entry } from './entry';

/** Language identifier, usually the name of a folder under the messages root ("en", "fr-CA"). */
export type LanguageCode = string;

/** Logical message file name (file stem without `.json`). */
export type FileName = string;

/** A value as it appears in a parsed JSON message file. */
export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue };

/** Parsed content of one message file: a flat object of key → value. */
export type MessageDocument = { [key: string]: DocumentValue };

/** Every message document, keyed by language then file name. */
export type MessageBundle = Record<LanguageCode, Record<FileName, MessageDocument>>;

/** Read-only key → Entry mapping for one (language, file). Immutable once built. */
export interface Catalog {
  /** Number of entries. */
  readonly size: number;
  /** Entry for `key`, or undefined. */
  get(key: string): Entry | undefined;
  /** Whether the catalog contains `key`. */
  has(key: string): boolean;
  /** All keys in document order. */
  keys(): string[];
}
