/**
 * Monthly Report Cycle
 *
 * Closes the previous calendar month:
 * - marker already present: nothing to do
 * - no unreported invoices: write the marker only
 * - otherwise: total the month per supplier and currency, log the totals,
 *   then mark the invoices reported and write the marker in one transaction
 *
 * Rendering and delivering a report document is not part of this cycle.
 */

import type { DedupStore, InvoiceRecord } from '../store/index.js';
import type { StoragePeriod } from '../filing/index.js';
import { reportingConfig } from './config.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SupplierTotal {
  supplier: string;
  currency: string;
  count: number;
  /** null when no invoice of the group carried that amount */
  pretax: number | null;
  tax: number | null;
  total: number | null;
}

export type MonthlyReportResult =
  | { status: 'already-reported'; period: StoragePeriod }
  | { status: 'empty'; period: StoragePeriod }
  | { status: 'reported'; period: StoragePeriod; invoiceCount: number; suppliers: SupplierTotal[] };

export type ReportStore = Pick<
  DedupStore,
  'hasMonthlyReportBeenSent' | 'getUnreportedInvoices' | 'saveMonthlyReport' | 'completeMonthlyReport'
>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** The calendar month before `now` (UTC) */
export function previousPeriod(now: Date): StoragePeriod {
  const month = now.getUTCMonth() + 1;
  if (month === 1) return { year: now.getUTCFullYear() - 1, month: 12 };
  return { year: now.getUTCFullYear(), month: month - 1 };
}

function addAmount(sum: number | null, amount: number | null): number | null {
  if (amount === null) return sum;
  return Math.round(((sum ?? 0) + amount) * 100) / 100;
}

/** Totals per (supplier, currency), sorted by supplier then currency */
export function buildSupplierTotals(
  invoices: readonly InvoiceRecord[],
  homeCurrency: string = reportingConfig.homeCurrency,
): SupplierTotal[] {
  const groups = new Map<string, SupplierTotal>();

  for (const invoice of invoices) {
    const supplier = invoice.supplier ?? invoice.sender;
    const currency = invoice.currency ?? homeCurrency;
    const key = `${supplier}\u0000${currency}`;

    let group = groups.get(key);
    if (!group) {
      group = { supplier, currency, count: 0, pretax: null, tax: null, total: null };
      groups.set(key, group);
    }

    group.count++;
    group.pretax = addAmount(group.pretax, invoice.amountPretax);
    group.tax = addAmount(group.tax, invoice.amountTax);
    group.total = addAmount(group.total, invoice.amountTotal);
  }

  return [...groups.values()].sort(
    (a, b) => a.supplier.localeCompare(b.supplier) || a.currency.localeCompare(b.currency),
  );
}

// ---------------------------------------------------------------------------
// Cycle
// ---------------------------------------------------------------------------

export function runMonthlyReportCycle(store: ReportStore, now: Date = new Date()): MonthlyReportResult {
  const period = previousPeriod(now);
  console.log('[report] Monthly report triggered', period);

  if (store.hasMonthlyReportBeenSent(period.year, period.month)) {
    console.log('[report] Already reported, skipping', period);
    return { status: 'already-reported', period };
  }

  const invoices = store.getUnreportedInvoices(period.year, period.month);
  if (invoices.length === 0) {
    console.log('[report] No invoices for period, recording marker only', period);
    store.saveMonthlyReport(period.year, period.month, now);
    return { status: 'empty', period };
  }

  const suppliers = buildSupplierTotals(invoices);
  for (const line of suppliers) {
    console.log('[report] Supplier total', { ...period, ...line });
  }

  store.completeMonthlyReport(
    period.year,
    period.month,
    invoices.map((invoice) => invoice.id),
    now,
  );

  console.log('[report] Monthly report complete', {
    ...period,
    invoices: invoices.length,
    suppliers: suppliers.length,
  });
  return { status: 'reported', period, invoiceCount: invoices.length, suppliers };
}
