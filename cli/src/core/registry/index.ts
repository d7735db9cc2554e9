/**
 * Tool registry: catalog, lookups, domain handlers and the executor.
 */
export type { ToolCatalogEntry, ToolGroup, ParamValue, ToolParams } from './types.js';
export type { AccountingClient, EndpointRequest, ToolDomainHandler, ToolInput } from './handlers.js';
export type { ToolRegistry } from './dispatch.js';
export type { ToolExecutionResult } from './executor.js';
export { TOOL_GROUPS } from './types.js';
export { TOOL_CATALOG } from './tools.js';
export {
  getToolByName,
  isKnownTool,
  getAllTools,
  getToolsByGroup,
  getReadOnlyTools,
  getToolCount,
} from './lookup.js';
export { DOMAIN_HANDLERS, ToolInputError, pickParams } from './handlers.js';
export { buildToolRegistry, getToolRegistry, ToolRegistryError } from './dispatch.js';
export { executeTool } from './executor.js';
