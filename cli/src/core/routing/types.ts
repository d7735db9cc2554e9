/**
 * Natural-language routing types.
 */
import type { ToolParams } from '../registry/types.js';

/** `definitive` for pattern-backed suggestions, `context-dependent` when ranking decided. */
export type Confidence = 'definitive' | 'context-dependent';

export const CONFIDENCE_LEVELS = ['definitive', 'context-dependent'] as const satisfies readonly Confidence[];

/**
 * How a query was resolved:
 *   - 'pattern': an idiomatic phrase matched; suggestions are fixed
 *   - 'keyword': keyword scoring ran; suggestions may be empty (no match)
 *   - 'clarify': too little to go on; ask the user
 */
export type RoutingOutcome = 'pattern' | 'keyword' | 'clarify';

/** Inclusive date range, YYYY-MM-DD. */
export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface ToolSuggestion {
  readonly toolName: string;
  readonly purpose: string;
  readonly keyParams: readonly string[];
  readonly suggestedParams: Readonly<ToolParams>;
  readonly score: number;
  readonly confidence: Confidence;
}

export interface RoutingResult {
  readonly query: string;
  readonly outcome: RoutingOutcome;
  /** Rank order. Empty for 'clarify', possibly empty for 'keyword'. */
  readonly matchedTools: readonly ToolSuggestion[];
  readonly clarificationNeeded: string | null;
  readonly dateRange: DateRange | null;
}

/** Param templates filled from the query's date expression at routing time. */
export const DATE_TEMPLATES = ['auto_date_this_month'] as const;
export type DateTemplate = (typeof DATE_TEMPLATES)[number];

export interface PatternEntry {
  /** Lower-case surface forms, English and Indonesian. */
  readonly phrases: readonly string[];
  readonly tool: string;
  readonly params: Readonly<ToolParams> | DateTemplate;
  readonly alternativeTool?: string;
  readonly confidence: Confidence;
}

/** tool name → reference keywords. */
export type ToolKeywordIndex = ReadonlyMap<string, ReadonlySet<string>>;
