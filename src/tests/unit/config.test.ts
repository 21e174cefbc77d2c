import { describe, expect, it } from 'vitest';
import { DEFAULT_CAPABILITIES_PATH, DEFAULT_PRODUCT_SCOPE_PATH, loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      capabilitiesPath: DEFAULT_CAPABILITIES_PATH,
      productScopePath: DEFAULT_PRODUCT_SCOPE_PATH,
      routerMaxRetries: 2,
      routerHistoryTurns: 4,
      logLevel: 'info',
    });
    expect(DEFAULT_CAPABILITIES_PATH.endsWith('catalog/CAPABILITIES.yaml')).toBe(true);
  });

  it('should read and coerce environment values, treating empty strings as unset', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: '',
      LLM_TEXT_MODEL: 'test-model',
      ROUTER_MAX_RETRIES: '3',
      CAPABILITIES_PATH: '/tmp/caps.yaml',
    });

    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.llmTextModel).toBe('test-model');
    expect(config.routerMaxRetries).toBe(3);
    expect(config.capabilitiesPath).toBe('/tmp/caps.yaml');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ ROUTER_HISTORY_TURNS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/logLevel/);
  });
});
