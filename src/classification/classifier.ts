/**
 * Document Classifier — Google Gemini with Structured Output
 *
 * Decides whether a document is a supplier invoice (or credit note) and
 * extracts its date, supplier, amounts and currency.
 *
 * - PDFs and spreadsheets: text extracted locally, sent as a text prompt
 * - Images: sent as inline data with the same prompt
 * - Anything else: review without a model call
 *
 * Both paths share the response parser. A failure anywhere (extraction,
 * model call, parsing) yields a review verdict; this function never throws.
 * It holds no per-call state, so independent documents can be classified
 * concurrently.
 */

import { GoogleGenerativeAI, SchemaType, type Part, type ResponseSchema } from '@google/generative-ai';

import { documentKindOf } from '../intake/index.js';
import type { CandidateDocument, DocumentKind } from '../intake/index.js';
import { classificationConfig } from './config.js';
import { interpretModelResponse, reviewVerdict } from './response-parser.js';
import { capText, extractPdfText, extractSpreadsheetText } from './text-extractor.js';
import type { ClassificationVerdict } from './types.js';

// ---------------------------------------------------------------------------
// Gemini Client (lazy singleton)
// ---------------------------------------------------------------------------

let _genAI: GoogleGenerativeAI | null = null;

function getGenAI(): GoogleGenerativeAI {
  if (_genAI) return _genAI;
  _genAI = new GoogleGenerativeAI(classificationConfig.geminiApiKey);
  return _genAI;
}

// ---------------------------------------------------------------------------
// Gemini Response Schema
// ---------------------------------------------------------------------------

const classificationResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    is_invoice: {
      type: SchemaType.BOOLEAN,
      description: 'True if the document is an invoice or a credit note addressed to us',
    },
    confidence: {
      type: SchemaType.NUMBER,
      description: 'Confidence score between 0.0 and 1.0',
    },
    reason: {
      type: SchemaType.STRING,
      description: 'One short sentence explaining the decision',
    },
    invoice_date: {
      type: SchemaType.STRING,
      description: 'Invoice issue date as YYYY-MM-DD',
      nullable: true,
    },
    supplier: {
      type: SchemaType.STRING,
      description: 'Name of the company that issued the invoice',
      nullable: true,
    },
    amount_pretax: {
      type: SchemaType.NUMBER,
      description: 'Total before tax; negative for credit notes',
      nullable: true,
    },
    amount_tax: {
      type: SchemaType.NUMBER,
      description: 'Total tax (VAT); negative for credit notes',
      nullable: true,
    },
    amount_total: {
      type: SchemaType.NUMBER,
      description: 'Total including tax; negative for credit notes',
      nullable: true,
    },
    currency: {
      type: SchemaType.STRING,
      description: 'ISO 4217 currency code, e.g. EUR',
      nullable: true,
    },
  },
  required: ['is_invoice', 'confidence', 'reason'],
};

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

const SYSTEM_INSTRUCTION = `You sort documents received in a company's accounts-payable mailbox.
Decide whether each document is a supplier invoice, receipt or credit note that the company has to pay or book.
Quotes, order confirmations, delivery notes, payment reminders without the invoice, statements, newsletters and contracts are not invoices.
Answer with a single JSON object and nothing else.`;

export function classificationPrompt(supplierHint?: string | null, documentText?: string): string {
  const hintSection = supplierHint
    ? `\n\nThe sender is usually associated with the supplier "${supplierHint}". Confirm it from the document, or correct it if the document shows a different issuer.`
    : '';

  const textSection = documentText !== undefined ? `\n\nDocument text:\n"""\n${documentText}\n"""` : '';

  return `Classify this document.

Instructions:
- Set is_invoice to true for an invoice, receipt or credit note, false otherwise.
- Set confidence between 0.0 and 1.0. If you are uncertain, set it below 0.5.
- Set reason to one short sentence.
- If it is an invoice or credit note, extract:
  - invoice_date as YYYY-MM-DD
  - supplier: the issuing company, never the customer the invoice is addressed to
  - amount_pretax, amount_tax and amount_total as plain numbers; use negative amounts for credit notes
  - currency as an ISO 4217 code
- Use null for anything not visible on the document.${hintSection}${textSection}`;
}

// ---------------------------------------------------------------------------
// Model input
// ---------------------------------------------------------------------------

async function extractText(document: CandidateDocument, kind: DocumentKind): Promise<string> {
  const raw =
    kind === 'pdf'
      ? await extractPdfText(document.bytes, classificationConfig.maxPages)
      : extractSpreadsheetText(document.bytes, classificationConfig.maxRows);
  return capText(raw, classificationConfig.maxTextChars);
}

async function generate(parts: Part[]): Promise<string> {
  const model = getGenAI().getGenerativeModel({
    model: classificationConfig.model,
    systemInstruction: SYSTEM_INSTRUCTION,
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: classificationResponseSchema,
      temperature: 0,
    },
  });

  const result = await model.generateContent(parts);
  return result.response.text();
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Classify one (non-archive) document.
 *
 * @param supplierHint - Supplier usually behind this sender, from the routing rules
 */
export async function classifyDocument(
  document: CandidateDocument,
  supplierHint?: string | null,
): Promise<ClassificationVerdict> {
  const kind = documentKindOf(document.mediaType);
  if (kind === 'unsupported' || kind === 'archive') {
    console.log('[classifier] Unsupported document, sending to review', {
      name: document.name,
      mediaType: document.mediaType,
    });
    return reviewVerdict(`unsupported media type ${document.mediaType}`);
  }

  try {
    let raw: string;

    if (kind === 'image') {
      raw = await generate([
        { inlineData: { mimeType: document.mediaType, data: document.bytes.toString('base64') } },
        { text: classificationPrompt(supplierHint) },
      ]);
    } else {
      const text = await extractText(document, kind);
      if (!text) {
        console.warn('[classifier] No text extracted, sending to review', { name: document.name });
        return reviewVerdict('no text extracted');
      }
      raw = await generate([{ text: classificationPrompt(supplierHint, text) }]);
    }

    const verdict = interpretModelResponse(raw, {
      threshold: classificationConfig.confidenceThreshold,
      ownerBusinessNames: classificationConfig.ownerBusinessNames,
      maxSupplierLength: classificationConfig.maxSupplierLength,
      maxCurrencyLength: classificationConfig.maxCurrencyLength,
    });

    console.log('[classifier] Classified', {
      name: document.name,
      decision: verdict.decision,
      confidence: verdict.confidence,
      reason: verdict.reason,
    });
    return verdict;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[classifier] Classification failed, sending to review', { name: document.name, error: message });
    return reviewVerdict(`classification failed: ${message}`);
  }
}
