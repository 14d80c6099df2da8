import { describe, expect, it, vi } from 'vitest';
import { EventBusImpl } from '@lexicon/core';
import { attachConsoleReporter } from './console-reporter';

function setup(options: { verbose?: boolean } = {}) {
  const bus = new EventBusImpl();
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const detach = attachConsoleReporter(bus, { logger, color: false, ...options });
  return { bus, logger, detach };
}

describe('attachConsoleReporter', () => {
  it('prints parse failures as errors', () => {
    const { bus, logger } = setup();
    bus.emit('catalog:parse-failed', {
      lang: 'en',
      file: 'main',
      path: 'messages/en/main.json',
      message: 'Unexpected end of JSON input',
    });
    expect(logger.error).toHaveBeenCalledWith(
      '[lexicon] Failed to load messages/en/main.json: Unexpected end of JSON input',
    );
  });

  it('prints completeness gaps as warnings', () => {
    const { bus, logger } = setup();
    bus.emit('catalog:file-missing', { lang: 'fr', file: 'settings' });
    expect(logger.warn).toHaveBeenCalledWith("[lexicon] Folder 'fr' is missing file 'settings'");
  });

  it('prints rejected entries, odd locales, missing roots and unavailable languages', () => {
    const { bus, logger } = setup();
    bus.emit('catalog:entry-rejected', { lang: 'en', file: 'main', key: 'n', reason: 'unsupported-value' });
    bus.emit('locale:nonstandard', { lang: 'english' });
    bus.emit('messages:dir-missing', { path: '/srv/messages' });
    bus.emit('language:unavailable', { lang: 'ja', role: 'fallback' });

    expect(logger.warn.mock.calls).toEqual([
      ['[lexicon] Ignored "n" in en/main (unsupported-value)'],
      ["[lexicon] Locale 'english' may not be a standard locale code"],
      ['[lexicon] Messages folder not found: /srv/messages'],
      ["[lexicon] No catalogs loaded for fallback language 'ja'"],
    ]);
  });

  it('prints each missing translation once', () => {
    const { bus, logger } = setup();
    const payload = { lang: 'en', fallbackLang: 'fr', file: 'main', key: 'title', mode: 'plain' as const };

    bus.emit('translation:missing', payload);
    bus.emit('translation:missing', payload);
    bus.emit('translation:missing', { ...payload, key: 'subtitle' });

    expect(logger.warn.mock.calls).toEqual([
      ["[lexicon] Missing translation \"main.title\" for 'en' (fallback 'fr')"],
      ["[lexicon] Missing translation \"main.subtitle\" for 'en' (fallback 'fr')"],
    ]);
  });

  it('prints loaded catalogs only when verbose', () => {
    const quiet = setup();
    quiet.bus.emit('catalog:loaded', { lang: 'en', file: 'main', keyCount: 4 });
    expect(quiet.logger.info).not.toHaveBeenCalled();

    const verbose = setup({ verbose: true });
    verbose.bus.emit('catalog:loaded', { lang: 'en', file: 'main', keyCount: 4 });
    expect(verbose.logger.info).toHaveBeenCalledWith('[lexicon] Loaded en/main (4 keys)');
  });

  it('colors warnings when colors are forced on', () => {
    const bus = new EventBusImpl();
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    attachConsoleReporter(bus, { logger, color: true });

    bus.emit('locale:nonstandard', { lang: 'xx' });

    expect(logger.warn).toHaveBeenCalledWith(
      "\u001B[33m[lexicon] Locale 'xx' may not be a standard locale code\u001B[39m",
    );
  });

  it('stops printing after detach', () => {
    const { bus, logger, detach } = setup();
    detach();
    bus.emit('catalog:file-missing', { lang: 'fr', file: 'main' });
    expect(logger.warn).not.toHaveBeenCalled();
    expect(bus.listenerCount('catalog:file-missing')).toBe(0);
  });
});
