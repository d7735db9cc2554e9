/**
 * Tool catalog types.
 * The catalog is the router's view of the invocable tools; handlers are the
 * dispatcher's view. Both are keyed by tool name.
 */

/** Tool domains, in catalog order. One handler per domain. */
export const TOOL_GROUPS = [
  'invoices',
  'contacts',
  'products',
  'orders',
  'deliveries',
  'financial',
  'outstanding',
  'utilities',
] as const;

export type ToolGroup = (typeof TOOL_GROUPS)[number];

export interface ToolCatalogEntry {
  /** Unique tool name (e.g., 'invoice_list_sales'). */
  readonly name: string;

  /** One-line purpose shown alongside routing suggestions. */
  readonly purpose: string;

  /** Parameters worth pre-filling, in display order. */
  readonly keyParams: readonly string[];

  readonly group: ToolGroup;

  /** True for tools that only read data. */
  readonly readOnly: boolean;
}

/** Scalar tool parameter value. */
export type ParamValue = string | number | boolean;

export type ToolParams = Record<string, ParamValue>;
