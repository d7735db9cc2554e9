import { describe, expect, it } from 'vitest';
import { ConfigError, ROUTING_DEFAULTS, loadRoutingSettings, resolveLogLevel } from '../src/core/config.js';

describe('loadRoutingSettings', () => {
  it('uses the defaults without overrides', () => {
    expect(loadRoutingSettings({})).toEqual(ROUTING_DEFAULTS);
  });

  it('reads overrides from the environment', () => {
    const settings = loadRoutingSettings({
      LEDGER_ROUTER_MAX_SUGGESTIONS: '3',
      LEDGER_ROUTER_FUZZY_THRESHOLD: ' 90 ',
      LEDGER_ROUTER_NAME_WEIGHT: '0.25',
    });
    expect(settings).toEqual({ ...ROUTING_DEFAULTS, maxSuggestions: 3, fuzzyThreshold: 90, nameOverlapWeight: 0.25 });
  });

  it('treats blank values as unset', () => {
    expect(loadRoutingSettings({ LEDGER_ROUTER_CLARIFY_BELOW: '  ' })).toEqual(ROUTING_DEFAULTS);
  });

  it('rejects invalid values', () => {
    expect(() => loadRoutingSettings({ LEDGER_ROUTER_MAX_SUGGESTIONS: 'many' })).toThrow(ConfigError);
    expect(() => loadRoutingSettings({ LEDGER_ROUTER_FUZZY_THRESHOLD: '150' })).toThrow(
      /LEDGER_ROUTER_FUZZY_THRESHOLD/,
    );
  });
});

describe('resolveLogLevel', () => {
  it('reads LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('is silent under the test runner', () => {
    expect(resolveLogLevel({ VITEST: 'true' })).toBe('silent');
  });

  it('falls back to info', () => {
    expect(resolveLogLevel({})).toBe('info');
    expect(resolveLogLevel({ LOG_LEVEL: 'loud' })).toBe('info');
  });
});
