import { describe, expect, it } from 'vitest';
import { PATTERNS, matchPattern, validatePatternTable } from '../src/core/routing/patterns.js';
import type { PatternEntry } from '../src/core/routing/types.js';

const anyTool = () => true;

function entry(phrases: string[], tool: string): PatternEntry {
  return { phrases, tool, params: {}, confidence: 'definitive' };
}

describe('matchPattern', () => {
  it('routes every phrase to its own entry', () => {
    for (const pattern of PATTERNS) {
      for (const phrase of pattern.phrases) {
        expect(matchPattern(phrase)).toBe(pattern);
      }
    }
  });

  it('matches case-insensitively inside a longer query', () => {
    const match = matchPattern('Can you show UNPAID INVOICES for me');
    expect(match?.tool).toBe('invoice_list_sales');
    expect(match?.params).toEqual({ status_id: 2 });
  });

  it('prefers the purchase list over the sales list', () => {
    expect(matchPattern('purchase invoice mana yang belum lunas')?.tool).toBe('invoice_list_purchase');
  });

  it('returns null when nothing matches', () => {
    expect(matchPattern('what is the weather')).toBeNull();
  });
});

describe('validatePatternTable', () => {
  it('accepts the bundled table', () => {
    expect(validatePatternTable(PATTERNS)).toEqual([]);
  });

  it('reports a phrase shadowed by an earlier entry', () => {
    const problems = validatePatternTable([entry(['unpaid'], 'a'), entry(['unpaid invoices'], 'b')], anyTool);
    expect(problems).toEqual(['entry 1: phrase "unpaid invoices" is shadowed by "unpaid" in entry 0']);
  });

  it('reports duplicate phrases', () => {
    const problems = validatePatternTable([entry(['top sales'], 'a'), entry(['top sales'], 'b')], anyTool);
    expect(problems).toEqual(['entry 1: duplicate phrase "top sales" (first in entry 0)']);
  });

  it('reports upper-case phrases', () => {
    expect(validatePatternTable([entry(['Top Sales'], 'a')], anyTool)).toEqual([
      'entry 0: phrase "Top Sales" must be lower-case and trimmed',
    ]);
  });

  it('reports unknown tools', () => {
    const problems = validatePatternTable(
      [{ ...entry(['top sales'], 'a'), alternativeTool: 'b' }],
      (name) => name === 'a',
    );
    expect(problems).toEqual(['entry 0: unknown alternative tool b']);
  });
});
