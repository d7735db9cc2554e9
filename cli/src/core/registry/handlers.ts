/**
 * Domain handlers: one implementation per tool domain.
 *
 * A handler turns a tool invocation into calls on the AccountingClient
 * collaborator. Transport, auth and response caching live behind that
 * interface, not here.
 */
import type { ParamValue, ToolGroup, ToolParams } from './types.js';

export interface EndpointRequest {
  params?: ToolParams;
  pathParams?: ToolParams;
}

/** The accounting API as seen by tool handlers. */
export interface AccountingClient {
  get(category: string, name: string, request?: EndpointRequest): Promise<unknown>;
  clearCache(): Promise<number>;
  cacheStats(): Promise<Record<string, number>>;
}

export type ToolInput = Record<string, unknown>;

export interface ToolDomainHandler {
  readonly group: ToolGroup;
  /** Tool names this handler executes. */
  readonly tools: readonly string[];
  execute(client: AccountingClient, toolName: string, input: ToolInput): Promise<unknown>;
}

export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInputError';
  }
}

/** A tool backed by a single GET endpoint. */
interface EndpointRoute {
  category: string;
  name: string;
  /** Input keys forwarded as query parameters. */
  params?: readonly string[];
  /** Input key substituted into the endpoint path; required. */
  pathParam?: string;
  /** Query parameters applied under the forwarded ones. */
  defaults?: ToolParams;
}

function isParamValue(value: unknown): value is ParamValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Copy scalar values for the listed keys; anything else is dropped. */
export function pickParams(input: ToolInput, keys: readonly string[]): ToolParams {
  const out: ToolParams = {};
  for (const key of keys) {
    const value = input[key];
    if (isParamValue(value)) out[key] = value;
  }
  return out;
}

function endpointHandler(group: ToolGroup, routes: Record<string, EndpointRoute>): ToolDomainHandler {
  const table = new Map(Object.entries(routes));
  return {
    group,
    tools: [...table.keys()],
    async execute(client, toolName, input) {
      const route = table.get(toolName);
      if (!route) {
        throw new ToolInputError(`The ${group} handler does not serve ${toolName}`);
      }

      const request: EndpointRequest = {
        params: { ...route.defaults, ...pickParams(input, route.params ?? []) },
      };

      if (route.pathParam) {
        const id = input[route.pathParam];
        if (!isParamValue(id) || id === '') {
          throw new ToolInputError(`Missing required parameter: ${route.pathParam}`);
        }
        request.pathParams = { [route.pathParam]: id };
      }

      return client.get(route.category, route.name, request);
    },
  };
}

// ── Shared param lists ───────────────────────────────────────────

const DATE_RANGE = ['date_from', 'date_to'];
const LIST_FILTERS = ['search', 'contact_id', 'status_id', ...DATE_RANGE, 'per_page', 'page'];

// ── Domain handlers ──────────────────────────────────────────────

export const invoiceHandler = endpointHandler('invoices', {
  invoice_list_sales: { category: 'invoices', name: 'list', params: LIST_FILTERS },
  invoice_get_detail: { category: 'invoices', name: 'detail', pathParam: 'invoice_id' },
  invoice_get_totals: { category: 'invoices', name: 'totals', params: DATE_RANGE },
  invoice_list_purchase: { category: 'purchase_invoices', name: 'list', params: LIST_FILTERS },
});

export const contactHandler = endpointHandler('contacts', {
  contact_list: { category: 'contacts', name: 'list', params: ['search', 'type_id', 'per_page', 'page'] },
  contact_get_detail: { category: 'contacts', name: 'detail', pathParam: 'contact_id' },
  contact_get_transactions: { category: 'contacts', name: 'transactions', pathParam: 'contact_id' },
});

export const productHandler = endpointHandler('products', {
  product_list: { category: 'products', name: 'list', params: ['search', 'include_inventory', 'per_page', 'page'] },
  product_get_detail: { category: 'products', name: 'detail', pathParam: 'product_id' },
  product_search_by_sku: { category: 'products', name: 'search_by_sku', params: ['sku'] },
});

export const orderHandler = endpointHandler('orders', {
  order_list_sales: { category: 'sales_orders', name: 'list', params: LIST_FILTERS },
  order_get_detail: { category: 'sales_orders', name: 'detail', pathParam: 'order_id' },
  order_list_purchase: { category: 'purchase_orders', name: 'list', params: LIST_FILTERS },
});

export const deliveryHandler = endpointHandler('deliveries', {
  delivery_list: { category: 'deliveries', name: 'list', params: LIST_FILTERS },
  delivery_get_detail: { category: 'deliveries', name: 'detail', pathParam: 'delivery_id' },
  delivery_get_pending: { category: 'deliveries', name: 'pending' },
});

export const financialHandler = endpointHandler('financial', {
  financial_activity_team_report: { category: 'reports', name: 'activity_team', params: DATE_RANGE },
  financial_sales_summary: { category: 'reports', name: 'sales_by_contact', params: [...DATE_RANGE, 'contact_id'] },
  financial_purchase_summary: { category: 'reports', name: 'purchase_by_contact', params: [...DATE_RANGE, 'contact_id'] },
  financial_bank_balances: { category: 'bank', name: 'balances' },
  financial_sales_by_person: { category: 'reports', name: 'sales_by_person', params: DATE_RANGE },
});

export const outstandingHandler = endpointHandler('outstanding', {
  outstanding_by_customer: {
    category: 'reports', name: 'outstanding_by_contact', params: ['limit'], defaults: { contact_type: 'customer' },
  },
  outstanding_by_vendor: {
    category: 'reports', name: 'outstanding_by_contact', params: ['limit'], defaults: { contact_type: 'vendor' },
  },
});

export const utilityHandler: ToolDomainHandler = {
  group: 'utilities',
  tools: ['utility_clear_cache', 'utility_get_cache_stats', 'utility_test_connection'],
  async execute(client, toolName) {
    switch (toolName) {
      case 'utility_clear_cache':
        return { cleared: await client.clearCache() };
      case 'utility_get_cache_stats':
        return client.cacheStats();
      case 'utility_test_connection':
        await client.get('config', 'banks');
        return { connected: true };
      default:
        throw new ToolInputError(`The utilities handler does not serve ${toolName}`);
    }
  },
};

export const DOMAIN_HANDLERS: readonly ToolDomainHandler[] = [
  invoiceHandler,
  contactHandler,
  productHandler,
  orderHandler,
  deliveryHandler,
  financialHandler,
  outstandingHandler,
  utilityHandler,
];
