/**
 * Tool executor: wraps handler dispatch with logging and error handling.
 *
 * Never throws. Failures come back as { ok: false } results so the caller
 * (an MCP dispatcher) can hand the message to the model for self-correction.
 */
import type { AccountingClient, ToolInput } from './handlers.js';
import type { ToolRegistry } from './dispatch.js';
import { getToolRegistry } from './dispatch.js';
import { log } from '../logger.js';

export type ToolExecutionResult =
  | { ok: true; tool: string; output: unknown; durationMs: number }
  | { ok: false; tool: string; error: string; durationMs: number };

/**
 * Execute a tool by name against the accounting API.
 */
export async function executeTool(
  client: AccountingClient,
  toolName: string,
  input: ToolInput,
  registry: ToolRegistry = getToolRegistry(),
): Promise<ToolExecutionResult> {
  const startTime = Date.now();
  const handler = registry.get(toolName);

  if (!handler) {
    const error = `Unknown tool: ${toolName}`;
    log.warn({ tool: toolName }, error);
    return { ok: false, tool: toolName, error, durationMs: 0 };
  }

  try {
    const output = await handler.execute(client, toolName, input);
    const durationMs = Date.now() - startTime;
    log.info({ tool: toolName, group: handler.group, durationMs }, 'Tool executed');
    return { ok: true, tool: toolName, output, durationMs };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    const durationMs = Date.now() - startTime;
    log.warn({ tool: toolName, error, durationMs }, 'Tool failed');
    return { ok: false, tool: toolName, error, durationMs };
  }
}
