/**
 * @module tools.test
 * Tests for MCP tool definitions and handler logic, run against an
 * in-memory registry (no stdio transport, no filesystem).
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { buildCatalog, EventBusImpl, RegistryImpl } from '@lexicon/core';
import type { ToolContext } from '../context.js';
import { TOOLS, handleToolCall } from '../tools.js';
import type { ToolResult } from '../tools.js';

function textOf(result: ToolResult): string {
  return result.content[0]?.text ?? '';
}

function jsonOf(result: ToolResult): unknown {
  return JSON.parse(textOf(result));
}

let context: ToolContext;

beforeEach(() => {
  const bus = new EventBusImpl();
  const registry = new RegistryImpl({ lang: 'en', fallbackLang: 'fr', bus });
  registry.register(
    'en',
    'main',
    buildCatalog({
      greeting: 'Hello',
      welcome: 'Welcome {{name}}',
      apples: { none: 'No apples', one: 'One apple', many: '{{count}} apples' },
      files: { many: '{{count}} files in {{dir}}' },
      arrived: { male: 'He arrived', female: 'She arrived from {{city}}' },
    }).catalog,
  );
  registry.register('fr', 'main', buildCatalog({ greeting: 'Bonjour', farewell: 'Au revoir' }).catalog);
  registry.register('fr', 'settings', buildCatalog({ title: 'Réglages' }).catalog);
  context = {
    registry,
    bus,
    report: {
      languages: ['en', 'fr'],
      catalogs: 3,
      failures: [],
      rejected: [{ lang: 'fr', file: 'main', key: 'n', message: 'expected a string or an object, got number' }],
      missingFiles: [{ lang: 'en', file: 'settings' }],
    },
  };
});

describe('TOOLS definitions', () => {
  it('should have unique tool names', () => {
    const names = TOOLS.map((t) => t.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should define every tool', () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      'get_language',
      'set_language',
      'set_fallback_language',
      'list_languages',
      'list_files',
      'check_catalogs',
      'translate',
    ]);
  });

  it('should have valid inputSchema for each tool', () => {
    for (const tool of TOOLS) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.description?.length).toBeGreaterThan(0);
    }
  });

  it('should mark required fields', () => {
    const toolMap = new Map(TOOLS.map((t) => [t.name, t]));
    expect(toolMap.get('set_language')?.inputSchema.required).toEqual(['lang']);
    expect(toolMap.get('translate')?.inputSchema.required).toEqual(['file', 'key']);
  });
});

describe('language tools', () => {
  it('get_language returns both languages', () => {
    expect(jsonOf(handleToolCall(context, 'get_language', {}))).toEqual({ lang: 'en', fallbackLang: 'fr' });
  });

  it('set_language switches the current language', () => {
    const result = handleToolCall(context, 'set_language', { lang: 'fr' });
    expect(jsonOf(result)).toEqual({ lang: 'fr', fallbackLang: 'fr' });
    expect(context.registry.getLang()).toBe('fr');
  });

  it('set_fallback_language switches the fallback language', () => {
    handleToolCall(context, 'set_fallback_language', { lang: 'de' });
    expect(context.registry.getFallbackLang()).toBe('de');
  });

  it('set_language rejects a missing code', () => {
    const result = handleToolCall(context, 'set_language', {});
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error: "lang" must be a non-empty string');
    expect(context.registry.getLang()).toBe('en');
  });
});

describe('inspection tools', () => {
  it('list_languages lists loaded languages', () => {
    expect(jsonOf(handleToolCall(context, 'list_languages', {}))).toEqual({ languages: ['en', 'fr'] });
  });

  it('list_files defaults to the current language', () => {
    expect(jsonOf(handleToolCall(context, 'list_files', {}))).toEqual({ lang: 'en', files: ['main'] });
    expect(jsonOf(handleToolCall(context, 'list_files', { lang: 'fr' }))).toEqual({
      lang: 'fr',
      files: ['main', 'settings'],
    });
  });

  it('check_catalogs returns the load report problems', () => {
    expect(jsonOf(handleToolCall(context, 'check_catalogs', {}))).toEqual({
      failures: [],
      rejected: [{ lang: 'fr', file: 'main', key: 'n', message: 'expected a string or an object, got number' }],
      missingFiles: [{ lang: 'en', file: 'settings' }],
    });
  });
});

describe('translate', () => {
  it('resolves a plain key', () => {
    expect(jsonOf(handleToolCall(context, 'translate', { file: 'main', key: 'greeting' }))).toEqual({
      text: 'Hello',
      missing: false,
      source: 'primary',
      lang: 'en',
      fallbackLang: 'fr',
    });
  });

  it('uses args for plain templates', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'welcome', args: ['Ada'] });
    expect(jsonOf(result)).toMatchObject({ text: 'Welcome Ada' });
  });

  it('uses count for plural entries', () => {
    expect(jsonOf(handleToolCall(context, 'translate', { file: 'main', key: 'apples', count: 5 }))).toMatchObject({
      text: '5 apples',
    });
    expect(jsonOf(handleToolCall(context, 'translate', { file: 'main', key: 'apples', count: 0 }))).toMatchObject({
      text: 'No apples',
    });
  });

  it('puts the count before args for plural entries', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'files', count: 2, args: ['docs'] });
    expect(jsonOf(result)).toMatchObject({ text: '2 files in docs' });
  });

  it('uses gender for gendered entries', () => {
    const result = handleToolCall(context, 'translate', {
      file: 'main',
      key: 'arrived',
      gender: 'female',
      args: ['Lyon'],
    });
    expect(jsonOf(result)).toMatchObject({ text: 'She arrived from Lyon', missing: false });
  });

  it('reports fallback text as not missing', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'farewell' });
    expect(jsonOf(result)).toMatchObject({ text: 'Au revoir', missing: false, source: 'fallback' });
  });

  it('reports missing text', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'nope' });
    expect(result.isError).toBeUndefined();
    expect(jsonOf(result)).toMatchObject({ text: 'Error missing text', missing: true, source: null });
  });

  it('rejects a non-integer count', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'apples', count: 1.5 });
    expect(textOf(result)).toBe('Error: "count" must be an integer');
  });

  it('rejects count combined with gender', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'apples', count: 1, gender: 'male' });
    expect(textOf(result)).toBe('Error: "count" and "gender" cannot be combined');
  });

  it('rejects args that are not scalars', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'welcome', args: [{ a: 1 }] });
    expect(textOf(result)).toBe('Error: "args[0]" must be a string, number or boolean');
  });

  it('rejects args that are not an array', () => {
    const result = handleToolCall(context, 'translate', { file: 'main', key: 'welcome', args: 'Ada' });
    expect(textOf(result)).toBe('Error: "args" must be an array');
  });

  it('requires file and key', () => {
    expect(textOf(handleToolCall(context, 'translate', { key: 'greeting' }))).toBe(
      'Error: "file" must be a non-empty string',
    );
    expect(textOf(handleToolCall(context, 'translate', { file: 'main' }))).toBe(
      'Error: "key" must be a non-empty string',
    );
  });
});

describe('unknown tools', () => {
  it('returns an error result', () => {
    const result = handleToolCall(context, 'nonexistent_tool', {});
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error: Unknown tool: nonexistent_tool');
  });
});
