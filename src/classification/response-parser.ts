/**
 * Model Response Parser
 *
 * Turns the model's text blob into a ClassificationVerdict. The blob is
 * expected to hold one JSON object, possibly wrapped in markdown fences.
 * Every extracted field is sanitized on its own; only a missing or mistyped
 * is_invoice / confidence makes the whole response unreadable, which maps
 * to review with confidence 0.
 *
 * The decision collapse is the one policy point:
 *   invoice  = model says invoice     and confidence >= threshold
 *   rejected = model says not invoice and confidence >= threshold
 *   review   = everything else
 */

import { ModelResponseSchema } from './types.js';
import type { ClassificationVerdict, Decision } from './types.js';

export interface ParserOptions {
  threshold: number;
  ownerBusinessNames: readonly string[];
  maxSupplierLength?: number;
  maxCurrencyLength?: number;
}

const NULL_MARKERS = new Set(['', 'null', 'none', 'n/a', 'na', 'undefined', 'unknown']);
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const NUMERIC = /^[+-]?\d+(?:\.\d+)?$/;

// ---------------------------------------------------------------------------
// Field sanitizers
// ---------------------------------------------------------------------------

function isNullMarker(value: string): boolean {
  return NULL_MARKERS.has(value.trim().toLowerCase());
}

export function sanitizeSupplier(
  value: unknown,
  ownerBusinessNames: readonly string[],
  maxLength = 80,
): string | null {
  if (typeof value !== 'string' || isNullMarker(value)) return null;

  const supplier = value.trim().slice(0, maxLength);
  const lower = supplier.toLowerCase();
  if (ownerBusinessNames.some((owner) => owner.trim() && lower.includes(owner.trim().toLowerCase()))) {
    return null;
  }
  return supplier;
}

export function sanitizeDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return ISO_DATE.test(trimmed) ? trimmed : null;
}

/** Finite numbers only. Numeric strings are accepted, with a decimal comma. */
export function sanitizeAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const compact = value.replace(/[\s\u00a0]/g, '');
  const normalized = compact.includes('.') ? compact : compact.replace(',', '.');
  if (!NUMERIC.test(normalized)) return null;

  const amount = Number(normalized);
  return Number.isFinite(amount) ? amount : null;
}

/** Free text; a non-string scalar is kept as its string form, anything else is dropped */
export function sanitizeReason(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

export function sanitizeCurrency(value: unknown, maxLength = 8): string | null {
  if (typeof value !== 'string' || isNullMarker(value)) return null;
  return value.trim().toUpperCase().slice(0, maxLength);
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

export function decide(isInvoice: boolean, confidence: number, threshold: number): Decision {
  if (confidence < threshold) return 'review';
  return isInvoice ? 'invoice' : 'rejected';
}

export function reviewVerdict(reason: string): ClassificationVerdict {
  return {
    decision: 'review',
    confidence: 0,
    reason,
    invoiceDate: null,
    supplierName: null,
    amountPretax: null,
    amountTax: null,
    amountTotal: null,
    currency: null,
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Removes ``` / ```json fences and any prose around the outermost object */
export function extractJsonObject(raw: string): string {
  let text = raw.trim();

  const fenced = text.match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
  if (fenced) text = fenced[1].trim();

  if (!text.startsWith('{')) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) text = text.slice(start, end + 1);
  }
  return text;
}

/**
 * Interprets a raw model response. Never throws: unreadable responses
 * become review verdicts with confidence 0.
 */
export function interpretModelResponse(raw: string, options: ParserOptions): ClassificationVerdict {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(raw));
  } catch (err) {
    return reviewVerdict(`unparseable model response: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ModelResponseSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    return reviewVerdict(`malformed model response: ${fields}`);
  }

  const response = result.data;
  const confidence = Math.min(1, Math.max(0, response.confidence));

  return {
    decision: decide(response.is_invoice, confidence, options.threshold),
    confidence,
    reason: sanitizeReason(response.reason),
    invoiceDate: sanitizeDate(response.invoice_date),
    supplierName: sanitizeSupplier(response.supplier, options.ownerBusinessNames, options.maxSupplierLength),
    amountPretax: sanitizeAmount(response.amount_pretax),
    amountTax: sanitizeAmount(response.amount_tax),
    amountTotal: sanitizeAmount(response.amount_total),
    currency: sanitizeCurrency(response.currency, options.maxCurrencyLength),
  };
}
