/**
 * @module registry
 * Catalog ownership and current/fallback language state.
 *
 * Language state belongs to a registry instance rather than to the module,
 * so independent registries can coexist (one per test, one per tenant).
 * Changing language never rebuilds catalogs; it only changes what the next
 * {@link RegistryImpl.translation} call selects.
 *
 * @see {@link @lexicon/types#Registry} for the interface contract
 */

import type {
  Argument,
  Catalog,
  EventBus,
  FileName,
  LanguageCode,
  Registry,
  Resolution,
  ResolutionMode,
  TranslationHandle,
} from '@lexicon/types';
import { resolve } from './resolver';

/** Language used for both slots when none is given. */
export const DEFAULT_LANG: LanguageCode = 'en';

/** Options for {@link RegistryImpl}. */
export interface RegistryOptions {
  /** Initial current language (default `en`). */
  lang?: LanguageCode;
  /** Initial fallback language (default `en`). */
  fallbackLang?: LanguageCode;
  /** Receives `language:unavailable` and `translation:missing` diagnostics. */
  bus?: EventBus;
}

/** Language pair read by the handle when it reports a missing translation. */
interface HandleContext {
  lang: LanguageCode;
  fallbackLang: LanguageCode;
  bus: EventBus | undefined;
}

/**
 * Lookup surface for one file. Holds the catalogs that were selected when it
 * was created; ask the registry for a new handle after a language switch.
 */
export class TranslationHandleImpl implements TranslationHandle {
  constructor(
    readonly file: FileName,
    readonly primary: Catalog | undefined,
    readonly fallback: Catalog | undefined,
    private readonly context: HandleContext,
  ) {}

  /** @inheritdoc */
  resolve(key: string, mode: ResolutionMode): Resolution {
    const resolution = resolve(this.primary, this.fallback, key, mode);
    if (resolution.missing) {
      this.context.bus?.emit('translation:missing', {
        lang: this.context.lang,
        fallbackLang: this.context.fallbackLang,
        file: this.file,
        key,
        mode: mode.kind,
      });
    }
    return resolution;
  }

  /** @inheritdoc */
  t(key: string): string {
    return this.resolve(key, { kind: 'plain' }).text;
  }

  /** @inheritdoc */
  tWithArg(key: string, args: readonly Argument[]): string {
    return this.resolve(key, { kind: 'plain-args', args }).text;
  }

  /** @inheritdoc */
  tWithPlural(key: string, count: number): string {
    return this.resolve(key, { kind: 'plural', count }).text;
  }

  /** @inheritdoc */
  tWithPluralAndArg(key: string, count: number, args: readonly Argument[]): string {
    return this.resolve(key, { kind: 'plural-args', count, args }).text;
  }

  /** @inheritdoc */
  tWithGender(key: string, gender: string): string {
    return this.resolve(key, { kind: 'gendered', gender }).text;
  }

  /** @inheritdoc */
  tWithGenderAndArg(key: string, gender: string, args: readonly Argument[]): string {
    return this.resolve(key, { kind: 'gendered-args', gender, args }).text;
  }
}

/** Concrete implementation of {@link Registry}. */
export class RegistryImpl implements Registry {
  private catalogs = new Map<LanguageCode, Map<FileName, Catalog>>();
  private lang: LanguageCode;
  private fallbackLang: LanguageCode;
  private readonly bus: EventBus | undefined;

  constructor(options: RegistryOptions = {}) {
    this.lang = options.lang ?? DEFAULT_LANG;
    this.fallbackLang = options.fallbackLang ?? DEFAULT_LANG;
    this.bus = options.bus;
  }

  /**
   * @inheritdoc
   * @throws RangeError if a catalog is already registered for (lang, file).
   */
  register(lang: LanguageCode, file: FileName, catalog: Catalog): void {
    let files = this.catalogs.get(lang);
    if (!files) {
      files = new Map();
      this.catalogs.set(lang, files);
    }
    if (files.has(file)) {
      throw new RangeError(`Catalog already registered for "${lang}/${file}"`);
    }
    files.set(file, catalog);
  }

  /** @inheritdoc */
  setLang(code: LanguageCode): void {
    this.lang = code;
    this.reportUnavailable(code, 'current');
  }

  /** @inheritdoc */
  setFallbackLang(code: LanguageCode): void {
    this.fallbackLang = code;
    this.reportUnavailable(code, 'fallback');
  }

  /** @inheritdoc */
  getLang(): LanguageCode {
    return this.lang;
  }

  /** @inheritdoc */
  getFallbackLang(): LanguageCode {
    return this.fallbackLang;
  }

  /** @inheritdoc */
  languages(): LanguageCode[] {
    return [...this.catalogs.keys()].sort();
  }

  /** @inheritdoc */
  files(lang: LanguageCode): FileName[] {
    return [...(this.catalogs.get(lang)?.keys() ?? [])].sort();
  }

  /** @inheritdoc */
  getCatalog(lang: LanguageCode, file: FileName): Catalog | undefined {
    return this.catalogs.get(lang)?.get(file);
  }

  /** @inheritdoc */
  translation(file: FileName): TranslationHandle {
    return new TranslationHandleImpl(
      file,
      this.getCatalog(this.lang, file),
      this.getCatalog(this.fallbackLang, file),
      { lang: this.lang, fallbackLang: this.fallbackLang, bus: this.bus },
    );
  }

  /** @inheritdoc */
  dispose(): void {
    this.catalogs.clear();
  }

  private reportUnavailable(lang: LanguageCode, role: 'current' | 'fallback'): void {
    if (!this.catalogs.has(lang)) {
      this.bus?.emit('language:unavailable', { lang, role });
    }
  }
}
