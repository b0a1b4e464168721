// ============================================================================
// Classification Module — Barrel Export
// ============================================================================
//
// Public API for document classification. Text extraction, the Gemini call
// and response interpretation stay internal to the module.

export type { Decision, ClassificationVerdict } from './types.js';
export { classifyDocument } from './classifier.js';
