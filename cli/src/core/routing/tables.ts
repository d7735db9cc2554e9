/**
 * Static routing tables: location and validated loading.
 *
 * Tables are data files under cli/assets/routing/. They are read once, when
 * the module that owns them first loads; any defect raises RoutingTableError
 * then, never while a query is being routed.
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

export class RoutingTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingTableError';
  }
}

let tablesDir: string | null = null;

function resolveTablesDir(): string {
  if (tablesDir) return tablesDir;

  const __dir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    // Sources (cli/src/core/routing/)
    join(__dir, '..', '..', '..', 'assets', 'routing'),
    // Build output (dist/cli/src/core/routing/)
    join(__dir, '..', '..', '..', '..', '..', 'cli', 'assets', 'routing'),
  ];

  const found = candidates.find((p) => existsSync(join(p, 'patterns.json')));
  if (!found) {
    throw new RoutingTableError(`Routing tables not found. Looked in: ${candidates.join(', ')}`);
  }
  tablesDir = found;
  return found;
}

/** Absolute path of a routing table file. */
export function routingTablePath(file: string): string {
  return join(resolveTablesDir(), file);
}

/** Read a text table. */
export function readTextTable(file: string): string {
  return readFileSync(routingTablePath(file), 'utf-8');
}

/** Read and schema-check a JSON table. */
export function readJsonTable<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readTextTable(file));
  } catch (err) {
    throw new RoutingTableError(`${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RoutingTableError(`${file} is malformed:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

/** Throw one RoutingTableError listing every problem, if there are any. */
export function assertNoProblems(table: string, problems: readonly string[]): void {
  if (problems.length > 0) {
    throw new RoutingTableError(`${table} has authoring errors:\n  ${problems.join('\n  ')}`);
  }
}
