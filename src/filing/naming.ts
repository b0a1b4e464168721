/**
 * File Naming Module
 *
 * Builds deterministic, sortable filenames for filed documents:
 *   "{YYYY-MM-DD}_{company-label}_{original-name}"
 *
 * Examples:
 *   - "2025-06-20_shop_order-1042.pdf"           (sender noreply@shop.com)
 *   - "2025-05-31_edf-electricite-de-france_facture.pdf" (supplier from the document)
 *   - "2025-03-02_company_invoice.pdf"           (sender billing@company.co.uk)
 *
 * Pure functions, no I/O.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Used when neither an invoice date nor a received date can be read */
export const DATE_SENTINEL = '0000-00-00';

export const UNKNOWN_LABEL = 'unknown';

const MAX_LABEL_LENGTH = 40;

/** Two-label public suffixes; the company is the label before them */
const COMPOUND_TLDS: ReadonlySet<string> = new Set([
  'co.uk', 'co.jp', 'co.nz', 'co.za', 'co.in', 'co.kr',
  'com.au', 'com.br', 'com.fr', 'com.mx', 'com.ar',
  'org.uk', 'net.au', 'gov.uk',
]);

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

/** Replaces path separators, reserved characters and control characters with "_" */
export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_');
}

/**
 * Accent-stripped, lowercase, hyphenated slug capped at 40 characters.
 *
 *   "EDF Électricité de France" -> "edf-electricite-de-france"
 *   "Orange S.A."               -> "orange-s-a"
 */
export function supplierToLabel(supplier: string): string {
  const ascii = supplier
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '');

  return ascii
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_LABEL_LENGTH);
}

/**
 * Second-level domain of the sender address.
 *
 *   billing@notifications.amazon.fr -> "amazon"
 *   support@company.co.uk           -> "company"
 */
export function senderToLabel(sender: string): string {
  const at = sender.lastIndexOf('@');
  const domain = (at >= 0 ? sender.slice(at + 1) : sender).trim().toLowerCase();
  const parts = domain.split('.').filter((part) => part.length > 0);

  let company: string | undefined;
  if (parts.length >= 3 && COMPOUND_TLDS.has(parts.slice(-2).join('.'))) {
    company = parts[parts.length - 3];
  } else if (parts.length >= 2) {
    company = parts[parts.length - 2];
  } else {
    company = parts[0];
  }

  if (!company) return UNKNOWN_LABEL;
  return sanitizeFilename(company);
}

/** Supplier slug when one survives slugification, else the sender label */
export function companyLabel(sender: string, supplierName: string | null): string {
  if (supplierName) {
    const slug = supplierToLabel(supplierName);
    if (slug) return slug;
  }
  return senderToLabel(sender);
}

// ---------------------------------------------------------------------------
// Filename
// ---------------------------------------------------------------------------

/** UTC calendar date of an ISO timestamp, or the sentinel when it does not parse */
export function receivedDatePrefix(receivedAt: string): string {
  const parsed = new Date(receivedAt);
  if (Number.isNaN(parsed.getTime())) return DATE_SENTINEL;
  return parsed.toISOString().slice(0, 10);
}

export interface FilenameParts {
  receivedAt: string;
  sender: string;
  originalName: string;
  /** Already validated YYYY-MM-DD, or null */
  invoiceDate: string | null;
  supplierName: string | null;
}

export function buildFilename(parts: FilenameParts): string {
  const date = parts.invoiceDate ?? receivedDatePrefix(parts.receivedAt);
  const label = companyLabel(parts.sender, parts.supplierName);
  return `${date}_${label}_${sanitizeFilename(parts.originalName)}`;
}
