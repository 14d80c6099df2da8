/**
 * @module context
 * Builds the registry the MCP tools operate on.
 */

import { EventBusImpl, RegistryImpl } from '@lexicon/core';
import { attachConsoleReporter, loadBundle, loadMessages, readBundle } from '@lexicon/loader';
import type { Logger, LoadReport } from '@lexicon/loader';
import type { EventBus, Registry } from '@lexicon/types';
import type { ServerConfig } from './config.js';

/** State shared by every tool call. */
export interface ToolContext {
  registry: Registry;
  bus: EventBus;
  /** Outcome of the startup load. */
  report: LoadReport;
}

/**
 * Logger that writes every line to stderr. stdout carries the MCP protocol
 * and must stay clean.
 */
export const stderrLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(message),
  error: (message) => console.error(message),
};

/**
 * Load catalogs per `config`, then apply the configured languages so
 * unavailable ones are reported.
 * @throws if the configured bundle file cannot be read.
 */
export function createToolContext(config: ServerConfig, logger: Logger = stderrLogger): ToolContext {
  const bus = new EventBusImpl();
  attachConsoleReporter(bus, { logger, verbose: config.verbose });

  const registry = new RegistryImpl({ bus });
  const report = config.bundleFile
    ? loadBundle(readBundle(config.bundleFile), { registry, bus })
    : loadMessages(config.messagesDir, { registry, bus });

  registry.setLang(config.lang);
  registry.setFallbackLang(config.fallbackLang);

  return { registry, bus, report };
}
