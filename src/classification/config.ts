/**
 * Classification Configuration
 *
 * Environment variables:
 * - GEMINI_API_KEY: Required Google AI Studio API key
 * - GEMINI_MODEL: Gemini model ID (default: gemini-2.0-flash)
 * - CLASSIFICATION_THRESHOLD: Min confidence for an invoice/rejected decision (default: 0.5)
 * - CLASSIFICATION_MAX_PAGES: PDF pages read for text (default: 2)
 * - CLASSIFICATION_MAX_ROWS: Spreadsheet rows read for text (default: 100)
 * - CLASSIFICATION_MAX_CHARS: Character budget for extracted text (default: 3000)
 *
 * Owner business names come from the routing rules file.
 */

import { floatEnv, intEnv, optionalEnv, requiredEnv } from '../config.js';
import { routingRules } from '../rules.js';

export interface ClassificationConfig {
  geminiApiKey: string;
  model: string;
  /** Confidence at or above which the model's yes/no is trusted (default: 0.5) */
  confidenceThreshold: number;
  maxPages: number;
  maxRows: number;
  maxTextChars: number;
  maxSupplierLength: number;
  maxCurrencyLength: number;
  /** Our own company names; a supplier containing one of these is discarded */
  ownerBusinessNames: string[];
}

export const classificationConfig: ClassificationConfig = {
  geminiApiKey: requiredEnv('GEMINI_API_KEY'),
  model: optionalEnv('GEMINI_MODEL', 'gemini-2.0-flash'),
  confidenceThreshold: floatEnv('CLASSIFICATION_THRESHOLD', 0.5),
  maxPages: intEnv('CLASSIFICATION_MAX_PAGES', 2),
  maxRows: intEnv('CLASSIFICATION_MAX_ROWS', 100),
  maxTextChars: intEnv('CLASSIFICATION_MAX_CHARS', 3000),
  maxSupplierLength: 80,
  maxCurrencyLength: 8,
  ownerBusinessNames: routingRules.ownerBusinessNames,
};
