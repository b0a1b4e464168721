/**
 * Local text extraction for text-bearing documents
 *
 * - PDF: truncated to the first N pages with pdf-lib, text read with unpdf
 * - Spreadsheets (xlsx / xls): first sheet, first M non-blank rows, cells joined by " | "
 *
 * Output is capped at the character budget. Images are not handled here;
 * they go to the model as inline data.
 */

import { PDFDocument } from 'pdf-lib';
import { extractText } from 'unpdf';
import * as XLSX from 'xlsx';

// ---------------------------------------------------------------------------
// PDF Truncation
// ---------------------------------------------------------------------------

/**
 * Truncate a PDF to the first `maxPages` pages.
 * Returns the original buffer if the PDF has fewer pages than the limit,
 * or if pdf-lib cannot load it.
 */
export async function truncatePdf(pdfBuffer: Buffer, maxPages: number): Promise<Buffer> {
  try {
    const srcDoc = await PDFDocument.load(new Uint8Array(pdfBuffer), {
      ignoreEncryption: true,
    });

    if (srcDoc.getPageCount() <= maxPages) {
      return pdfBuffer;
    }

    const newDoc = await PDFDocument.create();
    const indices = Array.from({ length: maxPages }, (_, i) => i);
    const copiedPages = await newDoc.copyPages(srcDoc, indices);

    for (const page of copiedPages) {
      newDoc.addPage(page);
    }

    return Buffer.from(await newDoc.save());
  } catch (err) {
    console.warn('[text-extractor] PDF truncation skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
    return pdfBuffer;
  }
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function capText(text: string, maxChars: number): string {
  return text.trim().slice(0, maxChars);
}

export async function extractPdfText(pdfBuffer: Buffer, maxPages: number): Promise<string> {
  const truncated = await truncatePdf(pdfBuffer, maxPages);
  const { text } = await extractText(new Uint8Array(truncated));
  const pages = Array.isArray(text) ? text : [text];
  return pages.slice(0, maxPages).join('\n');
}

export function extractSpreadsheetText(buffer: Buffer, maxRows: number): string {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const firstSheet = workbook.SheetNames[0];
  if (!firstSheet) return '';

  const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[firstSheet], {
    header: 1,
    blankrows: false,
    defval: '',
  });

  return rows
    .slice(0, maxRows)
    .map((row) =>
      row
        .map((cell) => (cell === null || cell === undefined ? '' : String(cell).trim()))
        .filter((cell) => cell !== '')
        .join(' | '),
    )
    .filter((line) => line !== '')
    .join('\n');
}
