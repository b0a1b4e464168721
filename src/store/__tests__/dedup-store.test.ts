/**
 * Tests for the SQLite Dedup Store
 *
 * Uses an in-memory database per test, and a temp file for the migration
 * of a database created before the additive invoice columns existed.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DedupStore } from '../dedup-store.js';
import type { InvoiceRecordInput } from '../types.js';

function invoice(overrides: Partial<InvoiceRecordInput> = {}): InvoiceRecordInput {
  return {
    emailId: 'msg-1',
    filename: '2025-06-20_shop_invoice.pdf',
    driveFileId: 'file-1',
    driveWebLink: 'https://drive.google.com/file/d/file-1/view',
    sender: 'billing@shop.com',
    receivedAt: '2025-06-20T14:30:00.000Z',
    year: 2025,
    month: 6,
    invoiceDate: null,
    supplier: 'Shop',
    amountPretax: 100,
    amountTax: 20,
    amountTotal: 120,
    currency: 'EUR',
    confidence: 0.9,
    ...overrides,
  };
}

describe('DedupStore', () => {
  let store: DedupStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = new DedupStore(':memory:');
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  describe('processed emails', () => {
    it('reports a message as processed only after it is marked', () => {
      expect(store.isEmailProcessed('msg-1')).toBe(false);

      store.markEmailProcessed({
        messageId: 'msg-1',
        sender: 'billing@shop.com',
        subject: 'Your invoice',
        receivedAt: '2025-06-20T14:30:00.000Z',
      });

      expect(store.isEmailProcessed('msg-1')).toBe(true);
      expect(store.isEmailProcessed('msg-2')).toBe(false);
    });

    it('ignores a second mark for the same message', () => {
      const email = { messageId: 'msg-1', sender: 'a@b.com', subject: 's', receivedAt: '2025-01-01T00:00:00.000Z' };
      store.markEmailProcessed(email, new Date('2025-01-02T00:00:00.000Z'));
      store.markEmailProcessed(email, new Date('2025-03-01T00:00:00.000Z'));

      expect(store.getLastProcessedAt()?.toISOString()).toBe('2025-01-02T00:00:00.000Z');
    });

    it('returns the latest processed time, or null when empty', () => {
      expect(store.getLastProcessedAt()).toBeNull();

      const base = { sender: 'a@b.com', subject: 's', receivedAt: '2025-01-01T00:00:00.000Z' };
      store.markEmailProcessed({ ...base, messageId: 'm1' }, new Date('2025-05-01T10:00:00.000Z'));
      store.markEmailProcessed({ ...base, messageId: 'm2' }, new Date('2025-05-03T10:00:00.000Z'));
      store.markEmailProcessed({ ...base, messageId: 'm3' }, new Date('2025-05-02T10:00:00.000Z'));

      expect(store.getLastProcessedAt()?.toISOString()).toBe('2025-05-03T10:00:00.000Z');
    });
  });

  describe('scan runs', () => {
    it('returns the latest complete scan start, or null when none was recorded', () => {
      expect(store.getLastCompleteScanStart()).toBeNull();

      store.recordCompleteScan(new Date('2025-06-10T00:00:00.000Z'), new Date('2025-06-10T00:02:00.000Z'));
      store.recordCompleteScan(new Date('2025-06-11T00:00:00.000Z'), new Date('2025-06-11T00:03:00.000Z'));

      expect(store.getLastCompleteScanStart()?.toISOString()).toBe('2025-06-11T00:00:00.000Z');
    });

    it('does not treat processed messages as a complete scan', () => {
      store.markEmailProcessed(
        { messageId: 'm1', sender: 'a@b.com', subject: 's', receivedAt: '2025-06-11T00:00:00.000Z' },
        new Date('2025-06-12T00:00:00.000Z'),
      );

      expect(store.getLastCompleteScanStart()).toBeNull();
    });
  });

  describe('invoices', () => {
    it('saves an invoice and reads it back as unreported', () => {
      const id = store.saveInvoice(invoice({ invoiceDate: '2025-06-18' }));

      const rows = store.getUnreportedInvoices(2025, 6);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toEqual({ ...invoice({ invoiceDate: '2025-06-18' }), id, reported: false });
    });

    it('returns the existing id for a repeated (email, filename) pair', () => {
      const first = store.saveInvoice(invoice());
      const second = store.saveInvoice(invoice({ amountTotal: 999 }));

      expect(second).toBe(first);
      const rows = store.getUnreportedInvoices(2025, 6);
      expect(rows).toHaveLength(1);
      expect(rows[0].amountTotal).toBe(120);
    });

    it('keeps distinct filenames of the same message as separate rows', () => {
      store.saveInvoice(invoice({ filename: 'a.pdf' }));
      store.saveInvoice(invoice({ filename: 'b.pdf' }));

      expect(store.getUnreportedInvoices(2025, 6)).toHaveLength(2);
    });

    it('orders by invoice date, falling back to received date', () => {
      store.saveInvoice(invoice({ filename: 'late.pdf', invoiceDate: '2025-06-25' }));
      store.saveInvoice(invoice({ filename: 'received.pdf', invoiceDate: null, receivedAt: '2025-06-10T08:00:00.000Z' }));
      store.saveInvoice(invoice({ filename: 'early.pdf', invoiceDate: '2025-06-02' }));

      const names = store.getUnreportedInvoices(2025, 6).map((row) => row.filename);
      expect(names).toEqual(['early.pdf', 'received.pdf', 'late.pdf']);
    });

    it('filters by period and excludes reported invoices', () => {
      const june = store.saveInvoice(invoice({ filename: 'june.pdf' }));
      store.saveInvoice(invoice({ filename: 'july.pdf', month: 7 }));
      store.saveInvoice(invoice({ filename: 'june-2.pdf' }));

      store.markInvoicesReported([june]);

      expect(store.getUnreportedInvoices(2025, 6).map((row) => row.filename)).toEqual(['june-2.pdf']);
      expect(store.getUnreportedInvoices(2025, 7).map((row) => row.filename)).toEqual(['july.pdf']);
    });
  });

  describe('monthly reports', () => {
    it('records a marker once per period', () => {
      expect(store.hasMonthlyReportBeenSent(2025, 6)).toBe(false);

      store.saveMonthlyReport(2025, 6);
      store.saveMonthlyReport(2025, 6);

      expect(store.hasMonthlyReportBeenSent(2025, 6)).toBe(true);
      expect(store.hasMonthlyReportBeenSent(2025, 7)).toBe(false);
    });

    it('marks invoices and writes the marker together', () => {
      const a = store.saveInvoice(invoice({ filename: 'a.pdf' }));
      const b = store.saveInvoice(invoice({ filename: 'b.pdf' }));

      store.completeMonthlyReport(2025, 6, [a, b]);

      expect(store.getUnreportedInvoices(2025, 6)).toEqual([]);
      expect(store.hasMonthlyReportBeenSent(2025, 6)).toBe(true);
    });
  });
});

describe('DedupStore migrations', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'dedup-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('adds the additive invoice columns to an older database and keeps its rows', () => {
    const dbPath = join(dir, 'invoices.db');
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE invoices (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        email_id TEXT NOT NULL,
        filename TEXT NOT NULL,
        drive_file_id TEXT,
        drive_web_link TEXT,
        sender TEXT NOT NULL,
        received_at TEXT NOT NULL,
        year INTEGER NOT NULL,
        month INTEGER NOT NULL,
        reported INTEGER NOT NULL DEFAULT 0
      );
      INSERT INTO invoices (email_id, filename, drive_file_id, drive_web_link, sender, received_at, year, month)
      VALUES ('old-msg', 'old.pdf', 'f-old', 'link-old', 'a@b.com', '2024-12-05T00:00:00.000Z', 2024, 12);
    `);
    legacy.close();

    const store = new DedupStore(dbPath);
    const rows = store.getUnreportedInvoices(2024, 12);
    store.close();

    expect(rows).toHaveLength(1);
    expect(rows[0].filename).toBe('old.pdf');
    expect(rows[0].supplier).toBeNull();
    expect(rows[0].confidence).toBeNull();

    const check = new Database(dbPath);
    const columns = check
      .prepare<[], { name: string }>('PRAGMA table_info(invoices)')
      .all()
      .map((column) => column.name);
    check.close();

    expect(columns).toEqual(
      expect.arrayContaining(['invoice_date', 'supplier', 'amount_pretax', 'amount_tax', 'amount_total', 'currency', 'confidence']),
    );
  });
});
