import { describe, expect, it } from 'vitest';
import {
  SYNONYM_MAP,
  isCanonicalTerm,
  normalizeTerm,
  toolsForTerm,
} from '../src/core/routing/synonyms.js';

describe('normalizeTerm', () => {
  it('folds English and Indonesian terms onto canonical ones', () => {
    expect(normalizeTerm('pelanggan')).toBe('customer');
    expect(normalizeTerm('Clients')).toBe('customer');
    expect(normalizeTerm('PIUTANG')).toBe('receivable');
    expect(normalizeTerm('faktur')).toBe('invoice');
    expect(normalizeTerm('saldo')).toBe('balance');
  });

  it('maps canonical terms to themselves', () => {
    expect(normalizeTerm('sales')).toBe('sales');
  });

  it('returns unknown terms lower-cased', () => {
    expect(normalizeTerm('Widget')).toBe('widget');
  });
});

describe('term tables', () => {
  it('points every synonym at a canonical term', () => {
    for (const canonical of SYNONYM_MAP.values()) {
      expect(isCanonicalTerm(canonical)).toBe(true);
    }
  });

  it('lists candidate tools for a canonical term', () => {
    expect(toolsForTerm('balance')).toEqual(['financial_bank_balances']);
    expect(toolsForTerm('payable')).toContain('outstanding_by_vendor');
  });

  it('has no tools for unknown terms', () => {
    expect(toolsForTerm('weather')).toEqual([]);
  });
});
