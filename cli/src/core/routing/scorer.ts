/**
 * Keyword extraction and tool relevance scoring.
 */
import { z } from 'zod';
import type { RoutingSettings } from '../config.js';
import { ROUTING_DEFAULTS } from '../config.js';
import { readJsonTable } from './tables.js';

// ── Stop words (English + Indonesian) ────────────────────────────

const stopwordSchema = z.object({
  en: z.array(z.string().min(1)),
  id: z.array(z.string().min(1)),
});

const stopwordTable = readJsonTable('stopwords.json', stopwordSchema);

export const STOPWORDS: ReadonlySet<string> = new Set([...stopwordTable.en, ...stopwordTable.id]);

// ── Action verbs → tool name suffixes ────────────────────────────

export const ACTION_VERBS: ReadonlyMap<string, readonly string[]> = new Map([
  // list / show
  ['list', ['_list']], ['show', ['_list']], ['all', ['_list']], ['daftar', ['_list']],
  // search / find
  ['find', ['_search']], ['search', ['_search']], ['lookup', ['_search']], ['cari', ['_search']],
  // detail / get
  ['get', ['_detail', '_get']], ['detail', ['_detail', '_get']],
  ['info', ['_detail', '_get']], ['details', ['_detail', '_get']],
  // summary / report
  ['summary', ['_summary', '_totals']], ['report', ['_summary', '_totals']],
  ['total', ['_summary', '_totals']], ['totals', ['_summary', '_totals']],
  ['ringkasan', ['_summary', '_totals']], ['laporan', ['_summary', '_totals']],
]);

const MIN_KEYWORD_LENGTH = 2;
const WORD = /[\p{L}\p{N}_]+/gu;

/**
 * Lower-cased word tokens minus stop words and single characters.
 */
export function extractKeywords(text: string): Set<string> {
  const tokens = text.toLowerCase().match(WORD) ?? [];
  return new Set(tokens.filter((t) => t.length >= MIN_KEYWORD_LENGTH && !STOPWORDS.has(t)));
}

/** 'invoice_list_sales' → ['invoice', 'list', 'sales'] */
export function toolNameParts(toolName: string): string[] {
  return toolName.toLowerCase().split('_').filter(Boolean);
}

/** Tool name suffixes the query's action verbs point at. */
export function actionSuffixes(keywords: Iterable<string>): string[] {
  const suffixes: string[] = [];
  for (const keyword of keywords) {
    const mapped = ACTION_VERBS.get(keyword);
    if (mapped) suffixes.push(...mapped);
  }
  return suffixes;
}

export type ScoringWeights = Pick<RoutingSettings, 'nameOverlapWeight' | 'actionVerbBonus'>;

/**
 * Relevance of one tool to a set of query keywords.
 *
 *   1.0 per keyword in the tool's reference keywords
 * + nameOverlapWeight per keyword that is a part of the tool name
 * + actionVerbBonus once, if an action verb's suffix ends the tool name
 */
export function scoreTool(
  queryKeywords: ReadonlySet<string>,
  toolName: string,
  toolKeywords: ReadonlySet<string>,
  weights: ScoringWeights = ROUTING_DEFAULTS,
): number {
  let score = 0;
  for (const keyword of queryKeywords) {
    if (toolKeywords.has(keyword)) score += 1;
  }

  const nameParts = new Set(toolNameParts(toolName));
  for (const keyword of queryKeywords) {
    if (nameParts.has(keyword)) score += weights.nameOverlapWeight;
  }

  const name = toolName.toLowerCase();
  if (actionSuffixes(queryKeywords).some((suffix) => name.endsWith(suffix))) {
    score += weights.actionVerbBonus;
  }

  return score;
}
