/**
 * @module messages-dir
 * Discovery of `<root>/<lang>/<file>.json` message files and the
 * cross-language completeness check.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isRecord } from '@lexicon/core';
import type { DocumentValue, FileName, LanguageCode, MessageDocument } from '@lexicon/types';

/** Extension of message files. */
export const MESSAGE_FILE_EXT = '.json';

/** One message file on disk. */
export interface MessageFile {
  file: FileName;
  path: string;
}

/** One language folder and its message files, sorted by file name. */
export interface LanguageFolder {
  lang: LanguageCode;
  path: string;
  files: MessageFile[];
}

/** A file present for some languages but absent for `lang`. */
export interface MissingFile {
  lang: LanguageCode;
  file: FileName;
}

/**
 * List language folders under `root`, sorted by name.
 * Returns null when `root` is not a directory.
 */
export function scanMessagesDir(root: string): LanguageFolder[] | null {
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    return null;
  }

  const folders: LanguageFolder[] = [];
  for (const dirent of fs.readdirSync(root, { withFileTypes: true })) {
    if (!dirent.isDirectory()) continue;

    const folderPath = path.join(root, dirent.name);
    const files = fs
      .readdirSync(folderPath, { withFileTypes: true })
      .filter((entry) => entry.isFile() && path.extname(entry.name) === MESSAGE_FILE_EXT)
      .map((entry) => ({
        file: path.basename(entry.name, MESSAGE_FILE_EXT),
        path: path.join(folderPath, entry.name),
      }))
      .sort((a, b) => a.file.localeCompare(b.file));

    folders.push({ lang: dirent.name, path: folderPath, files });
  }

  return folders.sort((a, b) => a.lang.localeCompare(b.lang));
}

/**
 * For every file present in at least one language, report each language that
 * lacks it. Sorted by language, then file.
 */
export function findMissingFiles(layout: ReadonlyMap<LanguageCode, readonly FileName[]>): MissingFile[] {
  const allFiles = new Set<FileName>();
  for (const files of layout.values()) {
    files.forEach((file) => allFiles.add(file));
  }

  const missing: MissingFile[] = [];
  for (const [lang, files] of [...layout].sort(([a], [b]) => a.localeCompare(b))) {
    const present = new Set(files);
    for (const file of [...allFiles].sort((a, b) => a.localeCompare(b))) {
      if (!present.has(file)) {
        missing.push({ lang, file });
      }
    }
  }
  return missing;
}

function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) return value.every(isDocumentValue);
      return isRecord(value) && Object.values(value).every(isDocumentValue);
    default:
      return false;
  }
}

/** Narrow a parsed JSON value to a message document (an object at the root). */
export function isMessageDocument(value: unknown): value is MessageDocument {
  return isRecord(value) && isDocumentValue(value);
}

/**
 * Parse the text of a message file.
 * @throws SyntaxError on invalid JSON, TypeError when the root is not an object.
 */
export function parseMessageDocument(raw: string): MessageDocument {
  const parsed: unknown = JSON.parse(raw);
  if (!isMessageDocument(parsed)) {
    throw new TypeError('root must be an object of key/value pairs');
  }
  return parsed;
}
