/**
 * @module tools
 * MCP tool definitions and handlers for a Lexicon registry.
 *
 * Each tool has a JSON Schema input definition and a handler that validates
 * its arguments, calls the registry, and formats the response. Handlers never
 * throw: failures come back as `Error: ...` text results.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Argument, ResolutionMode } from '@lexicon/types';
import type { ToolContext } from './context.js';

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  // ── Language state ─────────────────────────────────────────────
  {
    name: 'get_language',
    description: 'Get the current and fallback languages.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'set_language',
    description:
      'Set the current language. Any code is accepted; lookups in a language without ' +
      'catalogs fall back to the fallback language.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        lang: { type: 'string', description: 'Language code, e.g. "en" or "fr-CA"' },
      },
      required: ['lang'],
    },
  },
  {
    name: 'set_fallback_language',
    description: 'Set the fallback language used when the current language has no text for a key.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        lang: { type: 'string', description: 'Language code' },
      },
      required: ['lang'],
    },
  },

  // ── Inspection ─────────────────────────────────────────────────
  {
    name: 'list_languages',
    description: 'List the languages that have at least one loaded message file.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'list_files',
    description: 'List the message files loaded for a language (default: the current language).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        lang: { type: 'string', description: 'Language code' },
      },
    },
  },
  {
    name: 'check_catalogs',
    description:
      'Report load problems: files that failed to parse, values that were ignored, and ' +
      'files present for some languages but missing for others.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },

  // ── Translation ────────────────────────────────────────────────
  {
    name: 'translate',
    description:
      'Resolve a message key in the current language, falling back to the fallback language. ' +
      'Give "count" for plural entries or "gender" for gendered entries; "args" fill ' +
      '{{placeholders}} left to right (after the count, for plural entries).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        file: { type: 'string', description: 'Message file name without .json' },
        key: { type: 'string', description: 'Message key' },
        count: { type: 'integer', description: 'Count selecting the plural form (0, 1, or many)' },
        gender: { type: 'string', description: 'Gender tag, matched case-sensitively' },
        args: {
          type: 'array',
          items: { type: ['string', 'number', 'boolean'] },
          description: 'Positional placeholder values',
        },
      },
      required: ['file', 'key'],
    },
  },
];

/** Thrown by argument readers; turned into an error result by the handler. */
class ToolInputError extends Error {}

function requireString(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ToolInputError(`"${name}" must be a non-empty string`);
  }
  return value;
}

function optionalString(args: Record<string, unknown>, name: string): string | undefined {
  return args[name] === undefined ? undefined : requireString(args, name);
}

function optionalCount(args: Record<string, unknown>): number | undefined {
  const value = args.count;
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ToolInputError('"count" must be an integer');
  }
  return value;
}

function optionalArgs(args: Record<string, unknown>): Argument[] | undefined {
  const value = args.args;
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ToolInputError('"args" must be an array');
  }
  return value.map((item: unknown, index) => {
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      return item;
    }
    throw new ToolInputError(`"args[${index}]" must be a string, number or boolean`);
  });
}

/** Pick the resolution mode from the arguments present. */
function modeFor(count: number | undefined, gender: string | undefined, args: Argument[] | undefined): ResolutionMode {
  if (count !== undefined && gender !== undefined) {
    throw new ToolInputError('"count" and "gender" cannot be combined');
  }
  if (count !== undefined) {
    return args ? { kind: 'plural-args', count, args } : { kind: 'plural', count };
  }
  if (gender !== undefined) {
    return args ? { kind: 'gendered-args', gender, args } : { kind: 'gendered', gender };
  }
  return args ? { kind: 'plain-args', args } : { kind: 'plain' };
}

/** Dispatch a tool call to its handler. */
export function handleToolCall(
  context: ToolContext,
  toolName: string,
  args: Record<string, unknown>,
): ToolResult {
  const { registry, report } = context;
  try {
    switch (toolName) {
      case 'get_language':
        return jsonResult({ lang: registry.getLang(), fallbackLang: registry.getFallbackLang() });

      case 'set_language': {
        registry.setLang(requireString(args, 'lang'));
        return jsonResult({ lang: registry.getLang(), fallbackLang: registry.getFallbackLang() });
      }

      case 'set_fallback_language': {
        registry.setFallbackLang(requireString(args, 'lang'));
        return jsonResult({ lang: registry.getLang(), fallbackLang: registry.getFallbackLang() });
      }

      case 'list_languages':
        return jsonResult({ languages: registry.languages() });

      case 'list_files': {
        const lang = optionalString(args, 'lang') ?? registry.getLang();
        return jsonResult({ lang, files: registry.files(lang) });
      }

      case 'check_catalogs':
        return jsonResult({
          failures: report.failures,
          rejected: report.rejected,
          missingFiles: report.missingFiles,
        });

      case 'translate': {
        const file = requireString(args, 'file');
        const key = requireString(args, 'key');
        const mode = modeFor(optionalCount(args), optionalString(args, 'gender'), optionalArgs(args));
        const resolution = registry.translation(file).resolve(key, mode);
        return jsonResult({
          text: resolution.text,
          missing: resolution.missing,
          source: resolution.source,
          lang: registry.getLang(),
          fallbackLang: registry.getFallbackLang(),
        });
      }

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    return errorResult(e instanceof Error ? e.message : String(e));
  }
}

// ── Response formatters ────────────────────────────────────────

type ContentItem = { type: 'text'; text: string };
export type ToolResult = { content: ContentItem[]; isError?: boolean };

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
