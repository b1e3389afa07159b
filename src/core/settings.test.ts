import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../utils/errors.js';
import { resolveSessionSettings } from './settings.js';

describe('resolveSessionSettings', () => {
  it('falls back to built-in defaults', () => {
    expect(resolveSessionSettings({}, {}, {})).toEqual({
      backendUrl: 'http://localhost:11434',
      model: 'qwen2.5-coder:7b',
      temperature: 0.3,
      maxTokens: 2000,
      contextWindow: 32768,
      operationHistoryTokens: 4000,
      workspaceDir: './workspace',
      stream: true,
      debug: false,
    });
  });

  it('prefers flags over environment over stored configuration', () => {
    const stored = {
      backend: { url: 'http://stored:11434', model: 'stored-model' },
      generation: { temperature: 0.1, maxTokens: 500 },
      workspace: { defaultDir: '/srv/stored' },
    };
    const env = { KILN_MODEL: 'env-model', KILN_TEMPERATURE: '0.7', KILN_OLLAMA_URL: '  ' };

    const settings = resolveSessionSettings({ model: 'flag-model', maxTokens: '64' }, env, stored);

    expect(settings.model).toBe('flag-model');
    expect(settings.temperature).toBe(0.7);
    expect(settings.maxTokens).toBe(64);
    expect(settings.backendUrl).toBe('http://stored:11434');
    expect(settings.workspaceDir).toBe('/srv/stored');
  });

  it('carries stream and debug flags', () => {
    const settings = resolveSessionSettings({ stream: false, debug: true }, {}, { debug: false });
    expect(settings.stream).toBe(false);
    expect(settings.debug).toBe(true);
  });

  it('rejects out-of-range and malformed values', () => {
    expect(() => resolveSessionSettings({ temperature: '1.5' }, {}, {})).toThrow(ConfigurationError);
    expect(() => resolveSessionSettings({}, { KILN_MAX_TOKENS: 'lots' }, {})).toThrow(/^Invalid setting maxTokens/);
    expect(() => resolveSessionSettings({ url: 'not a url' }, {}, {})).toThrow(/^Invalid setting backendUrl/);
  });
});
