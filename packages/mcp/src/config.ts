/**
 * @module config
 * Server configuration from CLI flags, then environment, then defaults.
 *
 *   --messages <dir>    LEXICON_MESSAGES_DIR    default ./messages
 *   --bundle <file>     LEXICON_BUNDLE          loads a bundle instead of the tree
 *   --lang <code>       LEXICON_LANG            default en
 *   --fallback <code>   LEXICON_FALLBACK_LANG   default en
 *   --verbose           LEXICON_VERBOSE=1       log every loaded catalog
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { DEFAULT_LANG } from '@lexicon/core';

/** Resolved server settings. */
export interface ServerConfig {
  /** Absolute path of the messages root. */
  messagesDir: string;
  /** Absolute path of a bundle file; takes precedence over `messagesDir`. */
  bundleFile: string | undefined;
  lang: string;
  fallbackLang: string;
  verbose: boolean;
}

/** Thrown for unknown flags, missing flag values and empty settings. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve the server configuration.
 * @param argv - Arguments after the script name.
 * @param cwd - Base for relative paths.
 * @throws ConfigError on invalid flags.
 */
export function resolveServerConfig(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): ServerConfig {
  let values: {
    messages?: string;
    bundle?: string;
    lang?: string;
    fallback?: string;
    verbose?: boolean;
  };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        messages: { type: 'string' },
        bundle: { type: 'string' },
        lang: { type: 'string' },
        fallback: { type: 'string' },
        verbose: { type: 'boolean' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  for (const flag of ['messages', 'bundle', 'lang', 'fallback'] as const) {
    if (values[flag] !== undefined && nonEmpty(values[flag]) === undefined) {
      throw new ConfigError(`--${flag} must not be empty`);
    }
  }

  const messagesDir = nonEmpty(values.messages) ?? nonEmpty(env.LEXICON_MESSAGES_DIR) ?? 'messages';
  const bundleFile = nonEmpty(values.bundle) ?? nonEmpty(env.LEXICON_BUNDLE);

  return {
    messagesDir: path.resolve(cwd, messagesDir),
    bundleFile: bundleFile === undefined ? undefined : path.resolve(cwd, bundleFile),
    lang: nonEmpty(values.lang) ?? nonEmpty(env.LEXICON_LANG) ?? DEFAULT_LANG,
    fallbackLang: nonEmpty(values.fallback) ?? nonEmpty(env.LEXICON_FALLBACK_LANG) ?? DEFAULT_LANG,
    verbose: values.verbose ?? env.LEXICON_VERBOSE === '1',
  };
}
