/**
 * Idiomatic phrase library: whole business phrases mapped straight to a tool.
 *
 * Entries are checked in declaration order and the first phrase found in the
 * query wins, so more specific entries come first. A phrase that contains a
 * phrase from an earlier entry could never match and is rejected at load.
 */
import { z } from 'zod';
import { isKnownTool } from '../registry/lookup.js';
import { assertNoProblems, readJsonTable } from './tables.js';
import type { PatternEntry } from './types.js';
import { CONFIDENCE_LEVELS, DATE_TEMPLATES } from './types.js';

const paramValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const patternEntrySchema = z
  .object({
    phrases: z.array(z.string().min(1)).min(1),
    tool: z.string().min(1),
    params: z.union([z.record(paramValueSchema), z.enum(DATE_TEMPLATES)]),
    alternativeTool: z.string().min(1).optional(),
    confidence: z.enum(CONFIDENCE_LEVELS),
  })
  .strict();

const patternTableSchema = z.array(patternEntrySchema);

/**
 * Authoring problems in a pattern table, as messages. Empty when clean.
 */
export function validatePatternTable(
  entries: readonly PatternEntry[],
  isTool: (name: string) => boolean = isKnownTool,
): string[] {
  const problems: string[] = [];
  const seen = new Map<string, number>();

  entries.forEach((entry, index) => {
    if (!isTool(entry.tool)) problems.push(`entry ${index}: unknown tool ${entry.tool}`);
    if (entry.alternativeTool !== undefined && !isTool(entry.alternativeTool)) {
      problems.push(`entry ${index}: unknown alternative tool ${entry.alternativeTool}`);
    }

    for (const phrase of entry.phrases) {
      if (phrase !== phrase.toLowerCase().trim()) {
        problems.push(`entry ${index}: phrase "${phrase}" must be lower-case and trimmed`);
      }
      if (seen.has(phrase)) {
        problems.push(`entry ${index}: duplicate phrase "${phrase}" (first in entry ${seen.get(phrase)})`);
        continue;
      }
      for (const [earlier, earlierIndex] of seen) {
        if (earlierIndex < index && phrase.includes(earlier)) {
          problems.push(`entry ${index}: phrase "${phrase}" is shadowed by "${earlier}" in entry ${earlierIndex}`);
        }
      }
      seen.set(phrase, index);
    }
  });

  return problems;
}

function loadPatterns(): readonly PatternEntry[] {
  const entries: PatternEntry[] = readJsonTable('patterns.json', patternTableSchema);
  assertNoProblems('patterns.json', validatePatternTable(entries));
  return Object.freeze(entries.map((e) => Object.freeze(e)));
}

export const PATTERNS: readonly PatternEntry[] = loadPatterns();

/**
 * First pattern entry with a phrase contained in the query, or null.
 * Plain lower-case substring test: no normalization, no fuzziness.
 */
export function matchPattern(
  query: string,
  patterns: readonly PatternEntry[] = PATTERNS,
): PatternEntry | null {
  const q = query.toLowerCase();
  for (const entry of patterns) {
    for (const phrase of entry.phrases) {
      if (q.includes(phrase)) return entry;
    }
  }
  return null;
}
