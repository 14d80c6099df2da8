/**
 * @lexicon/types
 *
 * Shared type definitions for Lexicon.
 * This package contains zero runtime code, only TypeScript interfaces
 * and types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Entries
export type {
  Entry,
  EntryBuildIssue,
  EntryBuildIssueReason,
  EntryKind,
  GenderedEntry,
  PlainEntry,
  PluralCategory,
  PluralEntry,
} from './entry';

// Catalogs & documents
export type {
  Catalog,
  DocumentValue,
  FileName,
  LanguageCode,
  MessageBundle,
  MessageDocument,
} from './catalog';

// Resolution
export type {
  Argument,
  LookupFailure,
  LookupResult,
  Resolution,
  ResolutionMode,
  ResolutionModeKind,
  ResolutionSource,
} from './resolution';

// Registry
export type { Registry, TranslationHandle } from './registry';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
