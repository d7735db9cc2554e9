import { describe, expect, it } from 'vitest';
import { parseTodayOption, toRoutingJson } from '../src/commands/route.js';
import { toIsoDate } from '../src/core/routing/dates.js';
import { routeQuery } from '../src/core/routing/router.js';

describe('toRoutingJson', () => {
  it('ranks suggestions and keeps the outcome', () => {
    const json = toRoutingJson(routeQuery('unpaid invoices', { today: new Date(2024, 10, 15) }));
    expect(json).toMatchObject({
      query: 'unpaid invoices',
      outcome: 'pattern',
      dateRange: null,
      clarificationNeeded: null,
      resultCount: 1,
    });
    expect(json.matchedTools[0]).toMatchObject({
      rank: 1,
      toolName: 'invoice_list_sales',
      score: 10,
      confidence: 'definitive',
      suggestedParams: { status_id: 2 },
    });
  });

  it('rounds keyword scores', () => {
    const json = toRoutingJson(routeQuery('list customers', { today: new Date(2024, 10, 15) }));
    expect(json.matchedTools.map((t) => t.score)).toEqual([3, 2.5, 2.5, 2, 2]);
  });
});

describe('parseTodayOption', () => {
  it('parses a calendar date', () => {
    const today = parseTodayOption('2024-11-15');
    expect(today && toIsoDate(today)).toBe('2024-11-15');
  });

  it('defaults to undefined', () => {
    expect(parseTodayOption(undefined)).toBeUndefined();
  });

  it('rejects other formats', () => {
    expect(() => parseTodayOption('15/11/2024')).toThrow('Invalid --today date: 15/11/2024 (expected YYYY-MM-DD)');
  });
});
