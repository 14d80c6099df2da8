/**
 * @module registry
 * Registry and translation handle contracts.
 */

import type { Catalog, FileName, LanguageCode } from './catalog';
import type { Argument, Resolution, ResolutionMode } from './resolution';

/** Per-file lookup surface bound to the catalogs selected at the time it was created. */
export interface TranslationHandle {
  /** File this handle was requested for. */
  readonly file: FileName;
  /** Current-language catalog for the file, if loaded. */
  readonly primary: Catalog | undefined;
  /** Fallback-language catalog for the file, if loaded. */
  readonly fallback: Catalog | undefined;

  /** Resolve `key` in the given mode and report the full outcome. */
  resolve(key: string, mode: ResolutionMode): Resolution;
  /** Plain string lookup. */
  t(key: string): string;
  /** Plain string lookup with positional arguments. */
  tWithArg(key: string, args: readonly Argument[]): string;
  /** Plural lookup. `count` fills the first placeholder. */
  tWithPlural(key: string, count: number): string;
  /** Plural lookup. `count` fills the first placeholder, `args` the following ones. */
  tWithPluralAndArg(key: string, count: number, args: readonly Argument[]): string;
  /** Gendered lookup. */
  tWithGender(key: string, gender: string): string;
  /** Gendered lookup with positional arguments. */
  tWithGenderAndArg(key: string, gender: string, args: readonly Argument[]): string;
}

/** Owns every loaded catalog and the current/fallback language selection. */
export interface Registry {
  /** Store the catalog for (lang, file). Load time only. */
  register(lang: LanguageCode, file: FileName, catalog: Catalog): void;
  /** Set the current language. No check that catalogs exist for it. */
  setLang(code: LanguageCode): void;
  /** Set the fallback language. No check that catalogs exist for it. */
  setFallbackLang(code: LanguageCode): void;
  /** Current language. */
  getLang(): LanguageCode;
  /** Fallback language. */
  getFallbackLang(): LanguageCode;
  /** Languages with at least one catalog, sorted. */
  languages(): LanguageCode[];
  /** Files loaded for `lang`, sorted. */
  files(lang: LanguageCode): FileName[];
  /** Catalog for (lang, file), or undefined. */
  getCatalog(lang: LanguageCode, file: FileName): Catalog | undefined;
  /** Build a handle for `file` from the current language state. */
  translation(file: FileName): TranslationHandle;
  /** Drop every catalog. */
  dispose(): void;
}
