/**
 * Tool keyword index, parsed from the tool hints document.
 *
 * Each tool line reads
 *   - [tool_name](path): Description. Use for: "hint, hint, hint".
 * and contributes the hint keywords plus the parts of the tool name.
 *
 * The default index is parsed on first use and kept for the life of the
 * process.
 */
import type { ToolCatalogEntry } from '../registry/types.js';
import { TOOL_CATALOG } from '../registry/tools.js';
import { extractKeywords, toolNameParts } from './scorer.js';
import { RoutingTableError, assertNoProblems, readTextTable } from './tables.js';
import type { ToolKeywordIndex } from './types.js';

export const TOOL_HINTS_FILE = 'tool-hints.md';

const TOOL_LINE = /^- \[([^\]]+)\]\([^)]+\): [^.]+\. Use for: "([^"]+)"/;

/**
 * Parse a hints document. Lines that start like a tool entry but do not
 * match the format, and tools listed twice, are errors.
 */
export function parseToolHints(content: string): ToolKeywordIndex {
  const index = new Map<string, ReadonlySet<string>>();

  content.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed.startsWith('- [')) return;

    const match = TOOL_LINE.exec(trimmed);
    if (!match) {
      throw new RoutingTableError(`Malformed tool hint on line ${i + 1}: ${trimmed}`);
    }

    const [, toolName, hints] = match;
    if (index.has(toolName)) {
      throw new RoutingTableError(`Tool ${toolName} is listed twice (line ${i + 1})`);
    }

    const keywords = extractKeywords(hints);
    for (const part of toolNameParts(toolName)) keywords.add(part);
    index.set(toolName, keywords);
  });

  return index;
}

/** Tools the index and catalog disagree on, as messages. */
export function validateKeywordIndex(
  index: ToolKeywordIndex,
  catalog: readonly ToolCatalogEntry[] = TOOL_CATALOG,
): string[] {
  const names = new Set(catalog.map((t) => t.name));
  const problems: string[] = [];
  for (const tool of index.keys()) {
    if (!names.has(tool)) problems.push(`hints for unknown tool ${tool}`);
  }
  for (const tool of names) {
    if (!index.has(tool)) problems.push(`no hints for tool ${tool}`);
  }
  return problems;
}

/** Read, parse and check the bundled hints document. */
export function loadToolKeywordIndex(): ToolKeywordIndex {
  const index = parseToolHints(readTextTable(TOOL_HINTS_FILE));
  assertNoProblems(TOOL_HINTS_FILE, validateKeywordIndex(index));
  return index;
}

let keywordIndex: ToolKeywordIndex | null = null;

/** The bundled keyword index, parsed on first call and then reused. */
export function getToolKeywordIndex(): ToolKeywordIndex {
  if (!keywordIndex) keywordIndex = loadToolKeywordIndex();
  return keywordIndex;
}
