/**
 * @module load-messages
 * Load-time collaborator: reads message files, builds one catalog per
 * (language, file) and hands them to a registry.
 *
 * Nothing here throws for bad content. Unreadable files, rejected values,
 * odd folder names and files missing from some languages are all reported
 * on the event bus, and whatever did load stays usable.
 */

import * as fs from 'node:fs';
import { buildCatalog, isStandardLocale } from '@lexicon/core';
import type { EventBus, FileName, LanguageCode, MessageBundle, Registry } from '@lexicon/types';
import { findMissingFiles, parseMessageDocument, scanMessagesDir } from './messages-dir';
import type { MissingFile } from './messages-dir';

/** Where loaded catalogs and diagnostics go. */
export interface LoadContext {
  registry: Registry;
  bus?: EventBus;
}

/** A file that could not be read, parsed or built. */
export interface LoadFailure {
  lang: LanguageCode;
  file: FileName;
  path: string;
  message: string;
}

/** A value left out of its catalog. */
export interface RejectedEntry {
  lang: LanguageCode;
  file: FileName;
  key: string;
  message: string;
}

/** Summary of a load. */
export interface LoadReport {
  /** Language folders (or bundle languages) seen, sorted. */
  languages: LanguageCode[];
  /** Number of catalogs registered. */
  catalogs: number;
  failures: LoadFailure[];
  rejected: RejectedEntry[];
  missingFiles: MissingFile[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyReport(): LoadReport {
  return { languages: [], catalogs: 0, failures: [], rejected: [], missingFiles: [] };
}

/** Build and register one document, recording the outcome in `report`. */
function registerDocument(
  context: LoadContext,
  report: LoadReport,
  lang: LanguageCode,
  file: FileName,
  source: string,
  document: unknown,
): void {
  const { registry, bus } = context;
  try {
    const { catalog, issues } = buildCatalog(document, source);
    for (const issue of issues) {
      report.rejected.push({ lang, file, key: issue.key, message: issue.message });
      bus?.emit('catalog:entry-rejected', { lang, file, key: issue.key, reason: issue.reason });
    }
    registry.register(lang, file, catalog);
    report.catalogs += 1;
    bus?.emit('catalog:loaded', { lang, file, keyCount: catalog.size });
  } catch (error) {
    const message = errorMessage(error);
    report.failures.push({ lang, file, path: source, message });
    bus?.emit('catalog:parse-failed', { lang, file, path: source, message });
  }
}

/** Shared tail of both loaders: locale-name and completeness diagnostics. */
function checkLayout(
  context: LoadContext,
  report: LoadReport,
  layout: ReadonlyMap<LanguageCode, readonly FileName[]>,
): void {
  for (const lang of report.languages) {
    if (!isStandardLocale(lang)) {
      context.bus?.emit('locale:nonstandard', { lang });
    }
  }
  report.missingFiles = findMissingFiles(layout);
  for (const gap of report.missingFiles) {
    context.bus?.emit('catalog:file-missing', gap);
  }
}

/**
 * Load every `<root>/<lang>/<file>.json` into the registry.
 *
 * A missing root emits `messages:dir-missing` and loads nothing.
 */
export function loadMessages(root: string, context: LoadContext): LoadReport {
  const report = emptyReport();
  const folders = scanMessagesDir(root);
  if (!folders) {
    context.bus?.emit('messages:dir-missing', { path: root });
    return report;
  }

  const layout = new Map<LanguageCode, FileName[]>();
  for (const folder of folders) {
    report.languages.push(folder.lang);
    layout.set(folder.lang, folder.files.map((f) => f.file));

    for (const { file, path } of folder.files) {
      let document: unknown;
      try {
        document = parseMessageDocument(fs.readFileSync(path, 'utf-8'));
      } catch (error) {
        const message = errorMessage(error);
        report.failures.push({ lang: folder.lang, file, path, message });
        context.bus?.emit('catalog:parse-failed', { lang: folder.lang, file, path, message });
        continue;
      }
      registerDocument(context, report, folder.lang, file, path, document);
    }
  }

  checkLayout(context, report, layout);
  return report;
}

/** Load every document of a bundle into the registry. */
export function loadBundle(bundle: MessageBundle, context: LoadContext): LoadReport {
  const report = emptyReport();
  const layout = new Map<LanguageCode, FileName[]>();
  const languages = Object.entries(bundle).sort(([a], [b]) => a.localeCompare(b));

  for (const [lang, documents] of languages) {
    report.languages.push(lang);
    const files = Object.entries(documents).sort(([a], [b]) => a.localeCompare(b));
    layout.set(lang, files.map(([file]) => file));

    for (const [file, document] of files) {
      registerDocument(context, report, lang, file, `${lang}/${file}`, document);
    }
  }

  checkLayout(context, report, layout);
  return report;
}
