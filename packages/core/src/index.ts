/**
 * @lexicon/core
 *
 * Translation resolution engine: catalogs, resolver, registry and the
 * diagnostics bus.
 *
 * @packageDocumentation
 */

export { EventBusImpl } from './event-bus';
export { buildEntry, isPluralCategory, isRecord, PLURAL_CATEGORIES } from './entry';
export type { EntryBuildResult } from './entry';
export { buildCatalog, CatalogBuildError, CatalogImpl, emptyCatalog } from './catalog';
export type { CatalogBuildResult } from './catalog';
export { pluralCategory } from './plural';
export { placeholderNames, substitutePlaceholders } from './placeholders';
export { lookup, MISSING_TEXT, resolve, resolveEntry } from './resolver';
export { DEFAULT_LANG, RegistryImpl, TranslationHandleImpl } from './registry';
export type { RegistryOptions } from './registry';
export { isStandardLocale, knownLocales, normalizeLocale } from './locale-codes';
