/**
 * THE tool catalog: every tool the server exposes.
 *
 * Routing tables (patterns, term-to-tools, hints) may only reference names
 * listed here; they are checked against this list when they load.
 */
import type { ToolCatalogEntry } from './types.js';

// ── Shared param snippets ────────────────────────────────────────

const DATE_RANGE = ['date_from', 'date_to'] as const;
const LIST_FILTERS = ['search', 'contact_id', 'status_id', ...DATE_RANGE] as const;

export const TOOL_CATALOG: readonly ToolCatalogEntry[] = [
  // ── Invoices ──────────────────────────────────────────────────
  {
    name: 'invoice_list_sales',
    purpose: 'List sales invoices',
    keyParams: LIST_FILTERS,
    group: 'invoices',
    readOnly: true,
  },
  {
    name: 'invoice_get_detail',
    purpose: 'Get invoice details with line items',
    keyParams: ['invoice_id'],
    group: 'invoices',
    readOnly: true,
  },
  {
    name: 'invoice_get_totals',
    purpose: 'Get invoice summary totals',
    keyParams: DATE_RANGE,
    group: 'invoices',
    readOnly: true,
  },
  {
    name: 'invoice_list_purchase',
    purpose: 'List purchase invoices (vendor bills)',
    keyParams: LIST_FILTERS,
    group: 'invoices',
    readOnly: true,
  },

  // ── Contacts ──────────────────────────────────────────────────
  {
    name: 'contact_list',
    purpose: 'List customers and vendors',
    keyParams: ['search', 'type_id'],
    group: 'contacts',
    readOnly: true,
  },
  {
    name: 'contact_get_detail',
    purpose: 'Get contact details',
    keyParams: ['contact_id'],
    group: 'contacts',
    readOnly: true,
  },
  {
    name: 'contact_get_transactions',
    purpose: 'Get contact transaction history',
    keyParams: ['contact_id'],
    group: 'contacts',
    readOnly: true,
  },

  // ── Products ──────────────────────────────────────────────────
  {
    name: 'product_list',
    purpose: 'List products with prices',
    keyParams: ['search', 'include_inventory'],
    group: 'products',
    readOnly: true,
  },
  {
    name: 'product_get_detail',
    purpose: 'Get product details',
    keyParams: ['product_id'],
    group: 'products',
    readOnly: true,
  },
  {
    name: 'product_search_by_sku',
    purpose: 'Find product by SKU',
    keyParams: ['sku'],
    group: 'products',
    readOnly: true,
  },

  // ── Orders ────────────────────────────────────────────────────
  {
    name: 'order_list_sales',
    purpose: 'List sales orders',
    keyParams: LIST_FILTERS,
    group: 'orders',
    readOnly: true,
  },
  {
    name: 'order_get_detail',
    purpose: 'Get order details',
    keyParams: ['order_id'],
    group: 'orders',
    readOnly: true,
  },
  {
    name: 'order_list_purchase',
    purpose: 'List purchase orders',
    keyParams: ['search', 'contact_id', ...DATE_RANGE],
    group: 'orders',
    readOnly: true,
  },

  // ── Deliveries ────────────────────────────────────────────────
  {
    name: 'delivery_list',
    purpose: 'List deliveries',
    keyParams: ['search', ...DATE_RANGE, 'status_id'],
    group: 'deliveries',
    readOnly: true,
  },
  {
    name: 'delivery_get_detail',
    purpose: 'Get delivery details',
    keyParams: ['delivery_id'],
    group: 'deliveries',
    readOnly: true,
  },
  {
    name: 'delivery_get_pending',
    purpose: 'Get pending deliveries',
    keyParams: [],
    group: 'deliveries',
    readOnly: true,
  },

  // ── Financial reports ─────────────────────────────────────────
  {
    name: 'financial_activity_team_report',
    purpose: 'Team activity report',
    keyParams: DATE_RANGE,
    group: 'financial',
    readOnly: true,
  },
  {
    name: 'financial_sales_summary',
    purpose: 'Sales by customer',
    keyParams: [...DATE_RANGE, 'contact_id'],
    group: 'financial',
    readOnly: true,
  },
  {
    name: 'financial_purchase_summary',
    purpose: 'Purchases by vendor',
    keyParams: [...DATE_RANGE, 'contact_id'],
    group: 'financial',
    readOnly: true,
  },
  {
    name: 'financial_bank_balances',
    purpose: 'Bank account balances',
    keyParams: [],
    group: 'financial',
    readOnly: true,
  },
  {
    name: 'financial_sales_by_person',
    purpose: 'Sales grouped by salesperson',
    keyParams: DATE_RANGE,
    group: 'financial',
    readOnly: true,
  },

  // ── Outstanding balances ──────────────────────────────────────
  {
    name: 'outstanding_by_customer',
    purpose: 'Outstanding receivables grouped by customer',
    keyParams: ['limit'],
    group: 'outstanding',
    readOnly: true,
  },
  {
    name: 'outstanding_by_vendor',
    purpose: 'Outstanding payables grouped by vendor',
    keyParams: ['limit'],
    group: 'outstanding',
    readOnly: true,
  },

  // ── Utilities ─────────────────────────────────────────────────
  {
    name: 'utility_clear_cache',
    purpose: 'Clear cached data',
    keyParams: [],
    group: 'utilities',
    readOnly: false,
  },
  {
    name: 'utility_get_cache_stats',
    purpose: 'Cache performance metrics',
    keyParams: [],
    group: 'utilities',
    readOnly: true,
  },
  {
    name: 'utility_test_connection',
    purpose: 'Test API connection',
    keyParams: [],
    group: 'utilities',
    readOnly: true,
  },
];
