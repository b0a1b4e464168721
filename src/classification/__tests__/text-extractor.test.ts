/**
 * Tests for local text extraction
 *
 * Tests cover:
 * - truncatePdf: keeps the first N pages, passes short and unreadable PDFs through
 * - extractPdfText: page limit applied to the extracted text
 * - extractSpreadsheetText: first sheet, blank rows dropped, row limit
 *
 * pdf-lib and xlsx build real documents in memory; unpdf is mocked.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import * as XLSX from 'xlsx';

const mocks = vi.hoisted(() => ({
  extractText: vi.fn(),
}));

vi.mock('unpdf', () => ({
  extractText: mocks.extractText,
}));

import { capText, extractPdfText, extractSpreadsheetText, truncatePdf } from '../text-extractor.js';

async function pdfWithPages(count: number): Promise<Buffer> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < count; i++) doc.addPage();
  return Buffer.from(await doc.save());
}

function workbookBuffer(sheets: Record<string, unknown[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

describe('truncatePdf', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('keeps only the first N pages', async () => {
    const truncated = await truncatePdf(await pdfWithPages(5), 2);

    const reloaded = await PDFDocument.load(new Uint8Array(truncated));
    expect(reloaded.getPageCount()).toBe(2);
  });

  it('returns the original buffer when already short enough', async () => {
    const original = await pdfWithPages(1);

    expect(await truncatePdf(original, 2)).toBe(original);
  });

  it('returns the original buffer when the PDF cannot be loaded', async () => {
    const garbage = Buffer.from('not a pdf');

    expect(await truncatePdf(garbage, 2)).toBe(garbage);
  });
});

describe('extractPdfText', () => {
  it('joins the text of the first pages only', async () => {
    mocks.extractText.mockResolvedValueOnce({ totalPages: 3, text: ['page one', 'page two', 'page three'] });

    expect(await extractPdfText(await pdfWithPages(3), 2)).toBe('page one\npage two');
  });
});

describe('extractSpreadsheetText', () => {
  const buffer = workbookBuffer({
    Invoice: [['Invoice', 'INV-9'], [], ['Supplier', 'Acme'], ['Total', 120]],
    Other: [['ignored']],
  });

  it('reads the first sheet and drops blank rows', () => {
    expect(extractSpreadsheetText(buffer, 100)).toBe('Invoice | INV-9\nSupplier | Acme\nTotal | 120');
  });

  it('stops at the row limit', () => {
    expect(extractSpreadsheetText(buffer, 2)).toBe('Invoice | INV-9\nSupplier | Acme');
  });
});

describe('capText', () => {
  it('trims and caps', () => {
    expect(capText('  abcdef  ', 3)).toBe('abc');
  });
});
