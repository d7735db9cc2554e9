/**
 * O(1) catalog lookup via Map.
 * Lazy-initialized on first access.
 */
import type { ToolCatalogEntry, ToolGroup } from './types.js';
import { TOOL_CATALOG } from './tools.js';

let toolMap: Map<string, ToolCatalogEntry> | null = null;

function ensureMap(): Map<string, ToolCatalogEntry> {
  if (!toolMap) {
    const map = new Map<string, ToolCatalogEntry>();
    for (const tool of TOOL_CATALOG) {
      map.set(tool.name, tool);
    }
    toolMap = map;
  }
  return toolMap;
}

/** Get a single catalog entry by name. O(1). */
export function getToolByName(name: string): ToolCatalogEntry | undefined {
  return ensureMap().get(name);
}

/** True when the name is a catalog tool. */
export function isKnownTool(name: string): boolean {
  return ensureMap().has(name);
}

/** Get all catalog entries, in catalog order. */
export function getAllTools(): readonly ToolCatalogEntry[] {
  return TOOL_CATALOG;
}

/** Get catalog entries for one domain. */
export function getToolsByGroup(group: ToolGroup): ToolCatalogEntry[] {
  return TOOL_CATALOG.filter((t) => t.group === group);
}

/** Get read-only tools. */
export function getReadOnlyTools(): ToolCatalogEntry[] {
  return TOOL_CATALOG.filter((t) => t.readOnly);
}

/** Get tool count. */
export function getToolCount(): number {
  return TOOL_CATALOG.length;
}
