/**
 * Classification Type Definitions
 *
 * - Decision / ClassificationVerdict: the classifier's single result value
 * - ModelResponseSchema: zod schema for the JSON object the model returns.
 *   Only is_invoice and confidence are required; every extracted field is
 *   sanitized separately and may be anything on the wire.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

export const DECISIONS = ['invoice', 'rejected', 'review'] as const;

export type Decision = (typeof DECISIONS)[number];

export interface ClassificationVerdict {
  decision: Decision;
  /** 0..1; 0 when the response could not be read */
  confidence: number;
  /** Short explanation from the model, or why the verdict defaulted to review */
  reason: string;
  /** YYYY-MM-DD */
  invoiceDate: string | null;
  supplierName: string | null;
  amountPretax: number | null;
  amountTax: number | null;
  amountTotal: number | null;
  currency: string | null;
}

/** Every verdict field except the decision, as persisted on an invoice record */
export type ExtractedInvoiceFields = Omit<ClassificationVerdict, 'decision' | 'reason'>;

// ---------------------------------------------------------------------------
// Model response
// ---------------------------------------------------------------------------

export const ModelResponseSchema = z.object({
  is_invoice: z.boolean(),
  confidence: z.number().finite(),
  reason: z.unknown().optional(),
  invoice_date: z.unknown().optional(),
  supplier: z.unknown().optional(),
  amount_pretax: z.unknown().optional(),
  amount_tax: z.unknown().optional(),
  amount_total: z.unknown().optional(),
  currency: z.unknown().optional(),
});

export type ModelResponse = z.infer<typeof ModelResponseSchema>;
