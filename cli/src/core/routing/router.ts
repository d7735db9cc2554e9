/**
 * Natural-language query router.
 *
 * Pipeline, terminal at the first branch that applies:
 *   0. resolve any date expression in the query (always, before branching)
 *   1. idiomatic pattern → fixed suggestion (+ alternative), done
 *   2. keywords → synonyms, fuzzy fallback for misses
 *   3. candidate tools from the canonical terms
 *   4. nothing to go on → clarification request, done
 *   5. score the whole catalog, rank, keep the top N
 *   6. back-fill the date range into suggestions that take one
 *
 * Pure for a fixed (query, today, tables, keyword index): no state is written
 * per call, so identical inputs give identical results, order included.
 */
import type { RoutingSettings } from '../config.js';
import { ROUTING_DEFAULTS } from '../config.js';
import { log } from '../logger.js';
import type { ToolCatalogEntry, ToolParams } from '../registry/types.js';
import { TOOL_CATALOG } from '../registry/tools.js';
import { resolveQueryDateRange } from './dates.js';
import { fuzzyLookup } from './fuzzy.js';
import { getToolKeywordIndex } from './hints.js';
import { matchPattern } from './patterns.js';
import { extractKeywords, scoreTool } from './scorer.js';
import { isCanonicalTerm, normalizeTerm, toolsForTerm } from './synonyms.js';
import type {
  DateRange,
  PatternEntry,
  RoutingResult,
  ToolKeywordIndex,
  ToolSuggestion,
} from './types.js';

/** Pattern suggestions outrank anything keyword scoring produces. */
export const PATTERN_SCORE = 10;
export const ALTERNATIVE_SCORE = 9;

export const CLARIFICATION_PROMPT =
  'What would you like to know? For example: invoices, customers, sales, products...';

const DATE_FROM = 'date_from';
const DATE_TO = 'date_to';

const NO_KEYWORDS: ReadonlySet<string> = new Set();

export interface RouterOptions {
  /** Reference date for relative phrases. Defaults to now. */
  today?: Date;
  /** Keyword index to score against. Defaults to the bundled hints. */
  keywordIndex?: ToolKeywordIndex;
  /** Tools to score. Defaults to the full catalog. */
  catalog?: readonly ToolCatalogEntry[];
  settings?: Partial<RoutingSettings>;
}

/** Defaults under the overrides; an override left undefined keeps its default. */
export function resolveSettings(overrides: Partial<RoutingSettings> = {}): RoutingSettings {
  return {
    maxSuggestions: overrides.maxSuggestions ?? ROUTING_DEFAULTS.maxSuggestions,
    clarifyBelowKeywords: overrides.clarifyBelowKeywords ?? ROUTING_DEFAULTS.clarifyBelowKeywords,
    fuzzyThreshold: overrides.fuzzyThreshold ?? ROUTING_DEFAULTS.fuzzyThreshold,
    nameOverlapWeight: overrides.nameOverlapWeight ?? ROUTING_DEFAULTS.nameOverlapWeight,
    actionVerbBonus: overrides.actionVerbBonus ?? ROUTING_DEFAULTS.actionVerbBonus,
  };
}

function dateParams(range: DateRange): ToolParams {
  return { [DATE_FROM]: range.startDate, [DATE_TO]: range.endDate };
}

function describe(
  toolName: string,
  catalog: readonly ToolCatalogEntry[],
): Pick<ToolSuggestion, 'purpose' | 'keyParams'> {
  const entry = catalog.find((t) => t.name === toolName);
  return { purpose: entry?.purpose ?? '', keyParams: entry?.keyParams ?? [] };
}

/** Fixed params as-is; a date template becomes the resolved range, or nothing. */
function resolvePatternParams(entry: PatternEntry, range: DateRange | null): ToolParams {
  if (typeof entry.params !== 'string') return { ...entry.params };
  return range ? dateParams(range) : {};
}

function suggestFromPattern(
  entry: PatternEntry,
  range: DateRange | null,
  catalog: readonly ToolCatalogEntry[],
): ToolSuggestion[] {
  const suggestedParams = resolvePatternParams(entry, range);
  const suggestions: ToolSuggestion[] = [{
    toolName: entry.tool,
    ...describe(entry.tool, catalog),
    suggestedParams,
    score: PATTERN_SCORE,
    confidence: entry.confidence,
  }];

  if (entry.alternativeTool) {
    suggestions.push({
      toolName: entry.alternativeTool,
      ...describe(entry.alternativeTool, catalog),
      suggestedParams: { ...suggestedParams },
      score: ALTERNATIVE_SCORE,
      confidence: 'context-dependent',
    });
  }
  return suggestions;
}

/**
 * Canonicalize keywords: synonym first; when the synonym table leaves a
 * keyword unchanged, try a fuzzy match and canonicalize that instead.
 */
export function normalizeKeywords(keywords: Iterable<string>, fuzzyThreshold: number): Set<string> {
  const normalized = new Set<string>();
  for (const keyword of keywords) {
    const canonical = normalizeTerm(keyword);
    if (canonical !== keyword) {
      normalized.add(canonical);
      continue;
    }
    const corrected = fuzzyLookup(keyword, undefined, fuzzyThreshold);
    normalized.add(corrected ? normalizeTerm(corrected) : keyword);
  }
  return normalized;
}

/** Union of the tools each canonical term points at. */
export function candidateTools(terms: Iterable<string>): Set<string> {
  const tools = new Set<string>();
  for (const term of terms) {
    for (const tool of toolsForTerm(term)) tools.add(tool);
  }
  return tools;
}

/** Keywords the routing vocabulary knows: canonical terms or any tool's reference keywords. */
function recognizedKeywords(keywords: ReadonlySet<string>, index: ToolKeywordIndex): string[] {
  const known = [...index.values()];
  return [...keywords].filter((k) => isCanonicalTerm(k) || known.some((set) => set.has(k)));
}

function byScoreThenName(a: ToolSuggestion, b: ToolSuggestion): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.toolName === b.toolName) return 0;
  return a.toolName < b.toolName ? -1 : 1;
}

function withDateRange(suggestion: ToolSuggestion, range: DateRange): ToolSuggestion {
  if (!suggestion.keyParams.includes(DATE_FROM)) return suggestion;
  return { ...suggestion, suggestedParams: { ...suggestion.suggestedParams, ...dateParams(range) } };
}

/**
 * Route a free-text query to ranked tool suggestions or a clarification.
 * Never throws for unusual input; "nothing matched" is a normal result.
 */
export function routeQuery(query: string, options: RouterOptions = {}): RoutingResult {
  const settings = resolveSettings(options.settings);
  const catalog = options.catalog ?? TOOL_CATALOG;
  const dateRange = resolveQueryDateRange(query, options.today ?? new Date());

  // ── 1. Pattern ────────────────────────────────────────────────
  const pattern = matchPattern(query);
  if (pattern) {
    log.debug({ tool: pattern.tool, alternative: pattern.alternativeTool }, 'Routed by pattern');
    return {
      query,
      outcome: 'pattern',
      matchedTools: suggestFromPattern(pattern, dateRange, catalog),
      clarificationNeeded: null,
      dateRange,
    };
  }

  // ── 2-3. Keywords and candidates ──────────────────────────────
  const index = options.keywordIndex ?? getToolKeywordIndex();
  const keywords = normalizeKeywords(extractKeywords(query), settings.fuzzyThreshold);
  const candidates = candidateTools(keywords);

  // ── 4. Clarify ────────────────────────────────────────────────
  if (candidates.size === 0 && recognizedKeywords(keywords, index).length < settings.clarifyBelowKeywords) {
    log.debug({ keywords: [...keywords] }, 'Clarification needed');
    return {
      query,
      outcome: 'clarify',
      matchedTools: [],
      clarificationNeeded: CLARIFICATION_PROMPT,
      dateRange,
    };
  }

  // ── 5. Score everything; candidates are a hint, not a filter ──
  const ranked = catalog
    .map((tool): ToolSuggestion => ({
      toolName: tool.name,
      purpose: tool.purpose,
      keyParams: tool.keyParams,
      suggestedParams: {},
      score: scoreTool(keywords, tool.name, index.get(tool.name) ?? NO_KEYWORDS, settings),
      confidence: 'context-dependent',
    }))
    .filter((s) => s.score > 0)
    .sort(byScoreThenName)
    .slice(0, settings.maxSuggestions);

  // ── 6. Date back-fill ─────────────────────────────────────────
  const matchedTools = dateRange ? ranked.map((s) => withDateRange(s, dateRange)) : ranked;

  log.debug(
    { keywords: [...keywords], candidates: [...candidates], top: matchedTools[0]?.toolName },
    'Routed by keywords',
  );

  return { query, outcome: 'keyword', matchedTools, clarificationNeeded: null, dateRange };
}
