import { describe, expect, it, vi } from 'vitest';
import {
  DOMAIN_HANDLERS,
  buildToolRegistry,
  executeTool,
  getReadOnlyTools,
  getToolByName,
  getToolCount,
  getToolsByGroup,
  isKnownTool,
  pickParams,
} from '../src/core/registry/index.js';
import type { AccountingClient, ToolDomainHandler } from '../src/core/registry/index.js';
import { utilityHandler } from '../src/core/registry/handlers.js';

function fakeClient(): AccountingClient {
  return {
    get: vi.fn().mockResolvedValue({ data: [] }),
    clearCache: vi.fn().mockResolvedValue(4),
    cacheStats: vi.fn().mockResolvedValue({ hits: 3, misses: 1 }),
  };
}

describe('catalog lookups', () => {
  it('finds tools by name', () => {
    expect(getToolByName('contact_list')?.group).toBe('contacts');
    expect(getToolByName('nope')).toBeUndefined();
    expect(isKnownTool('financial_sales_by_person')).toBe(true);
  });

  it('groups tools by domain', () => {
    expect(getToolsByGroup('outstanding').map((t) => t.name)).toEqual([
      'outstanding_by_customer',
      'outstanding_by_vendor',
    ]);
  });

  it('counts the catalog', () => {
    expect(getToolCount()).toBe(26);
    expect(getReadOnlyTools().map((t) => t.name)).not.toContain('utility_clear_cache');
    expect(getReadOnlyTools()).toHaveLength(25);
  });
});

describe('buildToolRegistry', () => {
  it('maps every catalog tool to a handler', () => {
    expect(buildToolRegistry().size).toBe(26);
  });

  it('rejects catalog tools without a handler', () => {
    expect(() => buildToolRegistry([utilityHandler])).toThrow('invoice_list_sales has no handler');
  });

  it('rejects handlers for unknown tools', () => {
    const rogue: ToolDomainHandler = { group: 'utilities', tools: ['utility_reboot'], execute: vi.fn() };
    expect(() => buildToolRegistry([...DOMAIN_HANDLERS, rogue])).toThrow(
      'utilities handler serves unknown tool utility_reboot',
    );
  });

  it('rejects a handler serving another group', () => {
    const wrongGroup: ToolDomainHandler = { ...utilityHandler, group: 'financial' };
    const handlers = DOMAIN_HANDLERS.map((h) => (h === utilityHandler ? wrongGroup : h));
    expect(() => buildToolRegistry(handlers)).toThrow(
      'utility_clear_cache is in group utilities but served by the financial handler',
    );
  });
});

describe('pickParams', () => {
  it('keeps listed scalar values only', () => {
    expect(pickParams({ search: 'acme', page: 2, nested: { a: 1 }, status_id: null }, ['search', 'page', 'nested', 'status_id']))
      .toEqual({ search: 'acme', page: 2 });
  });
});

describe('executeTool', () => {
  it('forwards list filters as query params', async () => {
    const client = fakeClient();
    const result = await executeTool(client, 'invoice_list_sales', {
      status_id: 2,
      date_from: '2024-11-01',
      unrelated: 'x',
    });
    expect(result).toMatchObject({ ok: true, tool: 'invoice_list_sales', output: { data: [] } });
    expect(client.get).toHaveBeenCalledWith('invoices', 'list', {
      params: { status_id: 2, date_from: '2024-11-01' },
    });
  });

  it('substitutes path parameters', async () => {
    const client = fakeClient();
    await executeTool(client, 'invoice_get_detail', { invoice_id: 42 });
    expect(client.get).toHaveBeenCalledWith('invoices', 'detail', {
      params: {},
      pathParams: { invoice_id: 42 },
    });
  });

  it('applies handler defaults under the input', async () => {
    const client = fakeClient();
    await executeTool(client, 'outstanding_by_vendor', { limit: 5 });
    expect(client.get).toHaveBeenCalledWith('reports', 'outstanding_by_contact', {
      params: { contact_type: 'vendor', limit: 5 },
    });
  });

  it('reports a missing path parameter without calling the API', async () => {
    const client = fakeClient();
    const result = await executeTool(client, 'contact_get_detail', {});
    expect(result).toMatchObject({ ok: false, error: 'Missing required parameter: contact_id' });
    expect(client.get).not.toHaveBeenCalled();
  });

  it('runs utility tools against the client', async () => {
    const client = fakeClient();
    expect(await executeTool(client, 'utility_clear_cache', {})).toMatchObject({ ok: true, output: { cleared: 4 } });
    expect(await executeTool(client, 'utility_test_connection', {})).toMatchObject({
      ok: true,
      output: { connected: true },
    });
    expect(client.get).toHaveBeenCalledWith('config', 'banks');
  });

  it('reports unknown tools', async () => {
    expect(await executeTool(fakeClient(), 'nope', {})).toEqual({
      ok: false,
      tool: 'nope',
      error: 'Unknown tool: nope',
      durationMs: 0,
    });
  });

  it('turns API failures into error results', async () => {
    const client = fakeClient();
    vi.mocked(client.get).mockRejectedValueOnce(new Error('HTTP 500'));
    const result = await executeTool(client, 'financial_bank_balances', {});
    expect(result).toMatchObject({ ok: false, tool: 'financial_bank_balances', error: 'HTTP 500' });
  });
});
