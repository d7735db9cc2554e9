/**
 * Natural-language routing: query → ranked tool suggestions.
 */
export type {
  Confidence,
  DateRange,
  DateTemplate,
  PatternEntry,
  RoutingOutcome,
  RoutingResult,
  ToolKeywordIndex,
  ToolSuggestion,
} from './types.js';
export type { RouterOptions } from './router.js';
export type { ScoringWeights } from './scorer.js';
export {
  routeQuery,
  resolveSettings,
  normalizeKeywords,
  candidateTools,
  PATTERN_SCORE,
  ALTERNATIVE_SCORE,
  CLARIFICATION_PROMPT,
} from './router.js';
export { matchPattern, validatePatternTable, PATTERNS } from './patterns.js';
export { parseNaturalDate, extractDateExpression, resolveQueryDateRange, toIsoDate } from './dates.js';
export { normalizeTerm, toolsForTerm, isCanonicalTerm, SYNONYM_MAP, SYNONYM_TERMS, TERM_TO_TOOLS } from './synonyms.js';
export { fuzzyLookup, weightedRatio, MIN_FUZZY_TERM_LENGTH } from './fuzzy.js';
export { extractKeywords, scoreTool, toolNameParts, actionSuffixes, STOPWORDS, ACTION_VERBS } from './scorer.js';
export { parseToolHints, validateKeywordIndex, loadToolKeywordIndex, getToolKeywordIndex } from './hints.js';
export { RoutingTableError } from './tables.js';
