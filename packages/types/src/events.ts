/**
 * @module events
 * Type-safe event bus definitions for diagnostics.
 * The core never logs; it reports through the EventBus and the host decides
 * what to print.
 */

import type { FileName, LanguageCode } from './catalog';
import type { EntryBuildIssueReason } from './entry';
import type { ResolutionModeKind } from './resolution';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired after a catalog is built and registered. */
  'catalog:loaded': { lang: LanguageCode; file: FileName; keyCount: number };
  /** Fired when a message file cannot be read or parsed. */
  'catalog:parse-failed': { lang: LanguageCode; file: FileName; path: string; message: string };
  /** Fired for each document value rejected while building a catalog. */
  'catalog:entry-rejected': {
    lang: LanguageCode;
    file: FileName;
    key: string;
    reason: EntryBuildIssueReason;
  };
  /** Fired when a file exists for some languages but not for `lang`. */
  'catalog:file-missing': { lang: LanguageCode; file: FileName };
  /** Fired when a language folder name is not a known locale code. */
  'locale:nonstandard': { lang: LanguageCode };
  /** Fired when the messages root does not exist. */
  'messages:dir-missing': { path: string };
  /** Fired when the current or fallback language is set to one with no catalogs. */
  'language:unavailable': { lang: LanguageCode; role: 'current' | 'fallback' };
  /** Fired when a resolution falls through both catalogs. */
  'translation:missing': {
    lang: LanguageCode;
    fallbackLang: LanguageCode;
    file: FileName;
    key: string;
    mode: ResolutionModeKind;
  };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with its payload. */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
