/**
 * @lexicon/loader
 *
 * Node.js loading of `messages/<lang>/<file>.json` trees and bundles into a
 * registry, plus the console reporter for diagnostics.
 *
 * @packageDocumentation
 */

export {
  findMissingFiles,
  isMessageDocument,
  MESSAGE_FILE_EXT,
  parseMessageDocument,
  scanMessagesDir,
} from './messages-dir';
export type { LanguageFolder, MessageFile, MissingFile } from './messages-dir';
export { loadBundle, loadMessages } from './load-messages';
export type { LoadContext, LoadFailure, LoadReport, RejectedEntry } from './load-messages';
export { bundleMessages, parseBundle, readBundle, writeBundle } from './bundle';
export { attachConsoleReporter } from './console-reporter';
export type { ConsoleReporterOptions, Logger } from './console-reporter';
