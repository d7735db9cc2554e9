import { describe, expect, it } from 'vitest';
import { extractKeywords, scoreTool, toolNameParts } from '../src/core/routing/scorer.js';

describe('extractKeywords', () => {
  it('drops stop words and punctuation', () => {
    expect(extractKeywords('Show me the unpaid invoices, please!')).toEqual(new Set(['unpaid', 'invoices']));
  });

  it('drops Indonesian stop words', () => {
    expect(extractKeywords('Tampilkan faktur saya')).toEqual(new Set(['faktur']));
  });

  it('drops single characters', () => {
    expect(extractKeywords('x cd')).toEqual(new Set(['cd']));
  });

  it('keeps numbers', () => {
    expect(extractKeywords('30 hari')).toEqual(new Set(['30', 'hari']));
  });
});

describe('toolNameParts', () => {
  it('splits on underscores', () => {
    expect(toolNameParts('invoice_list_sales')).toEqual(['invoice', 'list', 'sales']);
  });
});

describe('scoreTool', () => {
  const contactKeywords = new Set(['customer', 'list', 'vendor', 'contact', 'search']);

  it('adds keyword overlap, name overlap and the action verb bonus', () => {
    // 2 overlaps + 0.5 for "list" in the name + 0.5 for the _list suffix
    expect(scoreTool(new Set(['list', 'customer']), 'contact_list', contactKeywords)).toBe(3);
  });

  it('applies the action verb bonus once', () => {
    expect(scoreTool(new Set(['list', 'show', 'daftar']), 'contact_list', new Set())).toBe(1);
  });

  it('takes custom weights', () => {
    const weights = { nameOverlapWeight: 0, actionVerbBonus: 0 };
    expect(scoreTool(new Set(['list', 'customer']), 'contact_list', contactKeywords, weights)).toBe(2);
  });

  it('scores unrelated keywords 0', () => {
    expect(scoreTool(new Set(['weather']), 'product_list', new Set(['product']))).toBe(0);
  });
});
