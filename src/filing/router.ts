/**
 * Storage period and folder routing.
 *
 * Invoices land in   <root>/<YYYY>/<MM>/<company-label>/
 * everything else in <root>/<YYYY>/<MM>/<review-folder>/
 *
 * The period comes from the invoice date when the classifier returned a real
 * calendar date, else from the message's received date. A late-processed
 * December invoice still lands under December.
 */

import type { Decision } from '../classification/index.js';
import type { StoragePeriod } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses YYYY-MM-DD, rejecting dates that do not exist (2025-02-30) */
export function parseCalendarDate(value: string): StoragePeriod & { day: number } | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

/** The invoice date when it is a real calendar date, else null */
export function usableInvoiceDate(invoiceDate: string | null): string | null {
  if (invoiceDate === null) return null;
  return parseCalendarDate(invoiceDate) ? invoiceDate : null;
}

export function resolveStoragePeriod(invoiceDate: string | null, receivedAt: string): StoragePeriod {
  const fromInvoice = invoiceDate ? parseCalendarDate(invoiceDate) : null;
  if (fromInvoice) {
    return { year: fromInvoice.year, month: fromInvoice.month };
  }

  const received = new Date(receivedAt);
  if (Number.isNaN(received.getTime())) {
    // Received dates come from the mail API; fall back to the processing month
    const now = new Date();
    return { year: now.getUTCFullYear(), month: now.getUTCMonth() + 1 };
  }
  return { year: received.getUTCFullYear(), month: received.getUTCMonth() + 1 };
}

export function formatMonth(month: number): string {
  return String(month).padStart(2, '0');
}

export interface FolderRoute {
  rootFolderName: string;
  reviewFolderName: string;
}

/** Folder segments below the store root for a document */
export function targetFolderPath(
  route: FolderRoute,
  period: StoragePeriod,
  decision: Decision,
  label: string,
): string[] {
  const leaf = decision === 'invoice' ? label : route.reviewFolderName;
  return [route.rootFolderName, String(period.year), formatMonth(period.month), leaf];
}
