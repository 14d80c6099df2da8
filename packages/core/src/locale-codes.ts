/**
 * @module locale-codes
 * Known language and language-region codes, used to flag message folders
 * whose name is probably a typo ("eng", "fr_FRA").
 */

import localeTable from './data/locales.json';

const KNOWN = new Set(localeTable.map(normalizeLocale));

/** Lowercase and use `-` as separator, so `pt_BR`, `pt-br` and `pt-BR` compare equal. */
export function normalizeLocale(code: string): string {
  return code.trim().replace(/_/g, '-').toLowerCase();
}

/** Whether `code` is a known language or language-region code. */
export function isStandardLocale(code: string): boolean {
  return KNOWN.has(normalizeLocale(code));
}

/** The known codes, sorted. */
export function knownLocales(): string[] {
  return [...localeTable].sort();
}
