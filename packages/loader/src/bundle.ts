/**
 * @module bundle
 * Single-file bundles of every message document, so a deployment can ship
 * one JSON file instead of the `messages/` tree.
 *
 * Bundle layout: `{ "<lang>": { "<file>": { ...document } } }`. Records are
 * built with `Object.fromEntries` so any folder or file name, `__proto__`
 * included, becomes an own key.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isRecord } from '@lexicon/core';
import type { EventBus, MessageBundle, MessageDocument } from '@lexicon/types';
import { isMessageDocument, parseMessageDocument, scanMessagesDir } from './messages-dir';

/**
 * Read the whole messages tree into a bundle.
 *
 * Files that fail to parse are left out and reported as
 * `catalog:parse-failed`. A missing root yields an empty bundle.
 */
export function bundleMessages(root: string, bus?: EventBus): MessageBundle {
  const folders = scanMessagesDir(root);
  if (!folders) {
    bus?.emit('messages:dir-missing', { path: root });
    return {};
  }

  const languages: Array<[string, MessageBundle[string]]> = [];
  for (const folder of folders) {
    const documents: Array<[string, MessageDocument]> = [];
    for (const { file, path: filePath } of folder.files) {
      try {
        documents.push([file, parseMessageDocument(fs.readFileSync(filePath, 'utf-8'))]);
      } catch (error) {
        bus?.emit('catalog:parse-failed', {
          lang: folder.lang,
          file,
          path: filePath,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    languages.push([folder.lang, Object.fromEntries(documents)]);
  }
  return Object.fromEntries(languages);
}

/**
 * Bundle `root` and write it to `outFile` as pretty-printed JSON.
 * Parent directories are created. Always writes, even an empty `{}`.
 */
export function writeBundle(root: string, outFile: string, bus?: EventBus): MessageBundle {
  const bundle = bundleMessages(root, bus);
  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(outFile, `${JSON.stringify(bundle, null, 2)}\n`, 'utf-8');
  return bundle;
}

/**
 * Validate a parsed bundle.
 * @throws TypeError naming the first language or file with the wrong shape.
 */
export function parseBundle(value: unknown): MessageBundle {
  if (!isRecord(value)) {
    throw new TypeError('bundle root must be an object keyed by language');
  }

  const languages: Array<[string, MessageBundle[string]]> = [];
  for (const [lang, files] of Object.entries(value)) {
    if (!isRecord(files)) {
      throw new TypeError(`bundle language "${lang}" must be an object keyed by file`);
    }
    const documents: Array<[string, MessageDocument]> = [];
    for (const [file, document] of Object.entries(files)) {
      if (!isMessageDocument(document)) {
        throw new TypeError(`bundle document "${lang}/${file}" must be an object`);
      }
      documents.push([file, document]);
    }
    languages.push([lang, Object.fromEntries(documents)]);
  }
  return Object.fromEntries(languages);
}

/**
 * Read and validate a bundle file.
 * @throws if the file cannot be read, is not JSON, or has the wrong shape.
 */
export function readBundle(file: string): MessageBundle {
  return parseBundle(JSON.parse(fs.readFileSync(file, 'utf-8')));
}
