/**
 * Bilingual synonym dictionary (English + Indonesian).
 *
 * SYNONYM_MAP folds alternate terms onto canonical terms; TERM_TO_TOOLS maps
 * each canonical term to the tools it hints at. Canonical terms map to
 * themselves so they are also fuzzy-match targets.
 */
import { z } from 'zod';
import { isKnownTool } from '../registry/lookup.js';
import { assertNoProblems, readJsonTable } from './tables.js';

const synonymSchema = z.record(z.string().min(1));
const termToolsSchema = z.record(z.array(z.string().min(1)).min(1));

function checkTables(
  synonyms: ReadonlyMap<string, string>,
  termTools: ReadonlyMap<string, readonly string[]>,
): string[] {
  const problems: string[] = [];
  for (const [term, canonical] of synonyms) {
    if (term !== term.toLowerCase()) problems.push(`synonym "${term}" is not lower-case`);
    if (!termTools.has(canonical)) problems.push(`synonym "${term}" → "${canonical}" has no term-to-tools entry`);
  }
  for (const [term, tools] of termTools) {
    for (const tool of tools) {
      if (!isKnownTool(tool)) problems.push(`term "${term}" references unknown tool ${tool}`);
    }
  }
  return problems;
}

export const SYNONYM_MAP: ReadonlyMap<string, string> = new Map(
  Object.entries(readJsonTable('synonyms.json', synonymSchema)),
);

export const TERM_TO_TOOLS: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(readJsonTable('term-to-tools.json', termToolsSchema)),
);

assertNoProblems('synonyms.json / term-to-tools.json', checkTables(SYNONYM_MAP, TERM_TO_TOOLS));

/** Synonym keys in dictionary order: the default fuzzy candidates. */
export const SYNONYM_TERMS: readonly string[] = [...SYNONYM_MAP.keys()];

/**
 * Normalize a term to its canonical form.
 * Unknown terms come back lower-cased, unchanged otherwise.
 */
export function normalizeTerm(term: string): string {
  const lower = term.toLowerCase();
  return SYNONYM_MAP.get(lower) ?? lower;
}

/** True for terms the term-to-tools table knows. */
export function isCanonicalTerm(term: string): boolean {
  return TERM_TO_TOOLS.has(term);
}

/** Candidate tools for a canonical term (unranked). */
export function toolsForTerm(term: string): readonly string[] {
  return TERM_TO_TOOLS.get(term) ?? [];
}
