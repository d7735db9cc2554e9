import { describe, expect, it } from 'vitest';
import { fuzzyLookup, partialRatio, ratio, weightedRatio } from '../src/core/routing/fuzzy.js';

describe('weightedRatio', () => {
  it('scores identical strings 100', () => {
    expect(weightedRatio('invoice', 'Invoice')).toBe(100);
  });

  it('ignores word order at a small discount', () => {
    expect(weightedRatio('sales report', 'report sales')).toBeCloseTo(95);
  });

  it('scores an empty side 0', () => {
    expect(weightedRatio('', 'invoice')).toBe(0);
    expect(weightedRatio('!!', 'invoice')).toBe(0);
  });
});

describe('ratio', () => {
  it('charges a swapped letter pair two indels', () => {
    expect(ratio('invocie', 'invoice')).toBeCloseTo(85.71, 2);
  });

  it('scores disjoint strings 0', () => {
    expect(ratio('abc', 'xyz')).toBe(0);
  });
});

describe('partialRatio', () => {
  it('finds the shorter string inside the longer one', () => {
    expect(partialRatio('bank', 'bank balances')).toBe(100);
  });
});

describe('fuzzyLookup', () => {
  it('recovers a misspelled term', () => {
    expect(fuzzyLookup('custommer', ['customer', 'vendor'])).toBe('customer');
  });

  it('recovers transposed letters', () => {
    expect(fuzzyLookup('invocie')).toBe('invoice');
    expect(fuzzyLookup('prodcut')).toBe('product');
  });

  it('searches the synonym dictionary by default', () => {
    expect(fuzzyLookup('pelangan')).toBe('pelanggan');
  });

  it('ignores terms shorter than four characters', () => {
    expect(fuzzyLookup('bal')).toBeNull();
    expect(fuzzyLookup('')).toBeNull();
  });

  it('returns null without candidates', () => {
    expect(fuzzyLookup('invoice', [])).toBeNull();
  });

  it('returns null under the threshold', () => {
    expect(fuzzyLookup('zzzzzz')).toBeNull();
    expect(fuzzyLookup('custommer', ['customer'], 95)).toBeNull();
  });

  it('keeps the first candidate on a tie', () => {
    expect(fuzzyLookup('abcd', ['abce', 'abcf'], 70)).toBe('abce');
    expect(fuzzyLookup('abcd', ['abcf', 'abce'], 70)).toBe('abcf');
  });
});
