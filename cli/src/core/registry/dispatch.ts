/**
 * Tool dispatcher: maps tool name → domain handler.
 *
 * Built once from the handler list and checked against the catalog in both
 * directions, so a tool without a handler (or a handler for a tool the
 * catalog does not list) fails at startup instead of at call time.
 */
import type { ToolCatalogEntry } from './types.js';
import type { ToolDomainHandler } from './handlers.js';
import { DOMAIN_HANDLERS } from './handlers.js';
import { TOOL_CATALOG } from './tools.js';

export type ToolRegistry = ReadonlyMap<string, ToolDomainHandler>;

export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolRegistryError';
  }
}

export function buildToolRegistry(
  handlers: readonly ToolDomainHandler[] = DOMAIN_HANDLERS,
  catalog: readonly ToolCatalogEntry[] = TOOL_CATALOG,
): ToolRegistry {
  const byName = new Map(catalog.map((t) => [t.name, t]));
  const registry = new Map<string, ToolDomainHandler>();
  const problems: string[] = [];

  for (const handler of handlers) {
    for (const tool of handler.tools) {
      const entry = byName.get(tool);
      if (!entry) {
        problems.push(`${handler.group} handler serves unknown tool ${tool}`);
        continue;
      }
      if (entry.group !== handler.group) {
        problems.push(`${tool} is in group ${entry.group} but served by the ${handler.group} handler`);
      }
      if (registry.has(tool)) {
        problems.push(`${tool} is served by more than one handler`);
      }
      registry.set(tool, handler);
    }
  }

  for (const entry of catalog) {
    if (!registry.has(entry.name)) problems.push(`${entry.name} has no handler`);
  }

  if (problems.length > 0) {
    throw new ToolRegistryError(`Tool registry is inconsistent:\n  ${problems.join('\n  ')}`);
  }
  return registry;
}

let defaultRegistry: ToolRegistry | null = null;

/** The registry over the built-in handlers and catalog, built on first use. */
export function getToolRegistry(): ToolRegistry {
  if (!defaultRegistry) defaultRegistry = buildToolRegistry();
  return defaultRegistry;
}
