/**
 * @module console-reporter
 * Prints bus diagnostics as `[lexicon]` console lines.
 *
 * Warnings are yellow, failures red. A missing translation is printed once
 * per (language, file, key) so a render loop does not flood the console.
 */

import { Chalk } from 'chalk';
import type { EventBus } from '@lexicon/types';

/** Console-like sink. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Options for {@link attachConsoleReporter}. */
export interface ConsoleReporterOptions {
  /** Where lines go (default `console`). */
  logger?: Logger;
  /** Also print one line per loaded catalog. */
  verbose?: boolean;
  /** Force colors on or off (default: detected from the terminal). */
  color?: boolean;
}

const PREFIX = '[lexicon]';

/**
 * Subscribe a console printer to every diagnostic event on `bus`.
 * @returns A function that detaches every subscription.
 */
export function attachConsoleReporter(bus: EventBus, options: ConsoleReporterOptions = {}): () => void {
  const logger = options.logger ?? console;
  const chalk = options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });
  const warn = (message: string) => logger.warn(chalk.yellow(`${PREFIX} ${message}`));
  const fail = (message: string) => logger.error(chalk.red(`${PREFIX} ${message}`));
  const reportedMissing = new Set<string>();

  const unsubscribers = [
    bus.on('catalog:loaded', ({ lang, file, keyCount }) => {
      if (options.verbose) {
        logger.info(`${PREFIX} Loaded ${lang}/${file} (${keyCount} keys)`);
      }
    }),
    bus.on('catalog:parse-failed', ({ path, message }) => {
      fail(`Failed to load ${path}: ${message}`);
    }),
    bus.on('catalog:entry-rejected', ({ lang, file, key, reason }) => {
      warn(`Ignored "${key}" in ${lang}/${file} (${reason})`);
    }),
    bus.on('catalog:file-missing', ({ lang, file }) => {
      warn(`Folder '${lang}' is missing file '${file}'`);
    }),
    bus.on('locale:nonstandard', ({ lang }) => {
      warn(`Locale '${lang}' may not be a standard locale code`);
    }),
    bus.on('messages:dir-missing', ({ path }) => {
      warn(`Messages folder not found: ${path}`);
    }),
    bus.on('language:unavailable', ({ lang, role }) => {
      warn(`No catalogs loaded for ${role} language '${lang}'`);
    }),
    bus.on('translation:missing', ({ lang, fallbackLang, file, key }) => {
      const mark = `${lang}::${file}::${key}`;
      if (reportedMissing.has(mark)) return;
      reportedMissing.add(mark);
      warn(`Missing translation "${file}.${key}" for '${lang}' (fallback '${fallbackLang}')`);
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
