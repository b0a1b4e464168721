/**
 * Dedup Store
 *
 * SQLite record of processed mail messages, filed invoices and completed
 * monthly report cycles.
 *
 * - processed_emails: one row per mail message id, written after every
 *   document of the message has been attempted
 * - invoices: one row per filed invoice, unique on (email_id, filename)
 * - monthly_reports: one marker per (year, month) report cycle
 * - scan_runs: start of every scheduled poll that left no message unprocessed
 *
 * Columns added after the first release are created on open when missing.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { appConfig } from '../config.js';
import type { InvoiceRecord, InvoiceRecordInput, ProcessedEmailInput } from './types.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS processed_emails (
    message_id    TEXT PRIMARY KEY,
    processed_at  TEXT NOT NULL,
    sender        TEXT NOT NULL,
    subject       TEXT,
    received_at   TEXT
  );

  CREATE TABLE IF NOT EXISTS invoices (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    email_id        TEXT NOT NULL,
    filename        TEXT NOT NULL,
    drive_file_id   TEXT,
    drive_web_link  TEXT,
    sender          TEXT NOT NULL,
    received_at     TEXT NOT NULL,
    year            INTEGER NOT NULL,
    month           INTEGER NOT NULL,
    reported        INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS monthly_reports (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    year     INTEGER NOT NULL,
    month    INTEGER NOT NULL,
    sent_at  TEXT NOT NULL,
    UNIQUE(year, month)
  );

  CREATE TABLE IF NOT EXISTS scan_runs (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    started_at    TEXT NOT NULL,
    completed_at  TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_invoices_period ON invoices(year, month, reported);
`;

/** Additive columns on invoices, in the order they were introduced */
const INVOICE_COLUMN_MIGRATIONS: ReadonlyArray<readonly [name: string, type: string]> = [
  ['invoice_date', 'TEXT'],
  ['supplier', 'TEXT'],
  ['amount_pretax', 'REAL'],
  ['amount_tax', 'REAL'],
  ['amount_total', 'REAL'],
  ['currency', 'TEXT'],
  ['confidence', 'REAL'],
];

interface InvoiceRow {
  id: number;
  email_id: string;
  filename: string;
  drive_file_id: string | null;
  drive_web_link: string | null;
  sender: string;
  received_at: string;
  year: number;
  month: number;
  reported: number;
  invoice_date: string | null;
  supplier: string | null;
  amount_pretax: number | null;
  amount_tax: number | null;
  amount_total: number | null;
  currency: string | null;
  confidence: number | null;
}

function toInvoiceRecord(row: InvoiceRow): InvoiceRecord {
  return {
    id: row.id,
    emailId: row.email_id,
    filename: row.filename,
    driveFileId: row.drive_file_id ?? '',
    driveWebLink: row.drive_web_link ?? '',
    sender: row.sender,
    receivedAt: row.received_at,
    year: row.year,
    month: row.month,
    reported: row.reported === 1,
    invoiceDate: row.invoice_date,
    supplier: row.supplier,
    amountPretax: row.amount_pretax,
    amountTax: row.amount_tax,
    amountTotal: row.amount_total,
    currency: row.currency,
    confidence: row.confidence,
  };
}

// ---------------------------------------------------------------------------
// DedupStore
// ---------------------------------------------------------------------------

export class DedupStore {
  private readonly db: Database.Database;

  /** Opens (and migrates) the database at `dbPath`; ":memory:" for an ephemeral store */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
    this.migrate();
  }

  private migrate(): void {
    const columns = this.db
      .prepare<[], { name: string }>('PRAGMA table_info(invoices)')
      .all()
      .map((column) => column.name);

    for (const [name, type] of INVOICE_COLUMN_MIGRATIONS) {
      if (columns.includes(name)) continue;
      this.db.exec(`ALTER TABLE invoices ADD COLUMN ${name} ${type}`);
      console.log('[dedup-store] Migration: added column', { table: 'invoices', column: name });
    }

    this.db.exec(
      'CREATE UNIQUE INDEX IF NOT EXISTS idx_invoices_email_filename ON invoices(email_id, filename)',
    );
  }

  // -------------------------------------------------------------------------
  // Processed emails
  // -------------------------------------------------------------------------

  isEmailProcessed(messageId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM processed_emails WHERE message_id = ?')
      .get(messageId);
    return row !== undefined;
  }

  markEmailProcessed(email: ProcessedEmailInput, processedAt: Date = new Date()): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO processed_emails (message_id, processed_at, sender, subject, received_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(email.messageId, processedAt.toISOString(), email.sender, email.subject, email.receivedAt);
  }

  /** When the most recent message was marked processed, or null on an empty store */
  getLastProcessedAt(): Date | null {
    const row = this.db
      .prepare<[], { last: string | null }>('SELECT MAX(processed_at) AS last FROM processed_emails')
      .get();
    if (!row?.last) return null;
    const parsed = new Date(row.last);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  // -------------------------------------------------------------------------
  // Scan runs
  // -------------------------------------------------------------------------

  /** Records a poll that listed its whole window and left nothing unprocessed */
  recordCompleteScan(startedAt: Date, completedAt: Date = new Date()): void {
    this.db
      .prepare('INSERT INTO scan_runs (started_at, completed_at) VALUES (?, ?)')
      .run(startedAt.toISOString(), completedAt.toISOString());
  }

  /** Start time of the latest complete poll, or null when none has finished yet */
  getLastCompleteScanStart(): Date | null {
    const row = this.db
      .prepare<[], { last: string | null }>('SELECT MAX(started_at) AS last FROM scan_runs')
      .get();
    if (!row?.last) return null;
    const parsed = new Date(row.last);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  // -------------------------------------------------------------------------
  // Invoices
  // -------------------------------------------------------------------------

  /**
   * Records a filed invoice. A repeat for the same (email, filename) pair
   * keeps the first row and returns its id.
   */
  saveInvoice(invoice: InvoiceRecordInput): number {
    const existing = this.db
      .prepare<[string, string], { id: number }>('SELECT id FROM invoices WHERE email_id = ? AND filename = ?')
      .get(invoice.emailId, invoice.filename);
    if (existing) return existing.id;

    const result = this.db
      .prepare(
        `INSERT INTO invoices
           (email_id, filename, drive_file_id, drive_web_link, sender, received_at, year, month,
            invoice_date, supplier, amount_pretax, amount_tax, amount_total, currency, confidence)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        invoice.emailId,
        invoice.filename,
        invoice.driveFileId,
        invoice.driveWebLink,
        invoice.sender,
        invoice.receivedAt,
        invoice.year,
        invoice.month,
        invoice.invoiceDate,
        invoice.supplier,
        invoice.amountPretax,
        invoice.amountTax,
        invoice.amountTotal,
        invoice.currency,
        invoice.confidence,
      );

    const id = Number(result.lastInsertRowid);
    console.log('[dedup-store] Invoice saved', {
      id,
      filename: invoice.filename,
      year: invoice.year,
      month: invoice.month,
      supplier: invoice.supplier,
    });
    return id;
  }

  getUnreportedInvoices(year: number, month: number): InvoiceRecord[] {
    return this.db
      .prepare<[number, number], InvoiceRow>(
        `SELECT * FROM invoices
         WHERE year = ? AND month = ? AND reported = 0
         ORDER BY COALESCE(invoice_date, received_at) ASC, id ASC`,
      )
      .all(year, month)
      .map(toInvoiceRecord);
  }

  markInvoicesReported(ids: readonly number[]): void {
    const update = this.db.prepare('UPDATE invoices SET reported = 1 WHERE id = ?');
    const markAll = this.db.transaction((invoiceIds: readonly number[]) => {
      for (const id of invoiceIds) update.run(id);
    });
    markAll(ids);
  }

  // -------------------------------------------------------------------------
  // Monthly reports
  // -------------------------------------------------------------------------

  saveMonthlyReport(year: number, month: number, sentAt: Date = new Date()): void {
    this.db
      .prepare('INSERT OR IGNORE INTO monthly_reports (year, month, sent_at) VALUES (?, ?, ?)')
      .run(year, month, sentAt.toISOString());
  }

  hasMonthlyReportBeenSent(year: number, month: number): boolean {
    const row = this.db
      .prepare<[number, number], { found: number }>(
        'SELECT 1 AS found FROM monthly_reports WHERE year = ? AND month = ?',
      )
      .get(year, month);
    return row !== undefined;
  }

  /** Marks the invoices reported and writes the period marker in one transaction */
  completeMonthlyReport(year: number, month: number, ids: readonly number[], sentAt: Date = new Date()): void {
    const complete = this.db.transaction(() => {
      this.markInvoicesReported(ids);
      this.saveMonthlyReport(year, month, sentAt);
    });
    complete();
  }

  close(): void {
    this.db.close();
  }
}

/** Opens the store at `${dataDir}/invoices.db`, creating the directory when needed */
export function openDedupStore(dataDir: string = appConfig.dataDir): DedupStore {
  mkdirSync(dataDir, { recursive: true });
  const dbPath = join(dataDir, 'invoices.db');
  console.log('[dedup-store] Database opened', { path: dbPath });
  return new DedupStore(dbPath);
}
