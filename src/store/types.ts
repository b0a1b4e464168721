/**
 * Dedup Store Type Definitions
 */

export interface ProcessedEmailInput {
  messageId: string;
  sender: string;
  subject: string;
  receivedAt: string;
}

export interface InvoiceRecordInput {
  emailId: string;
  filename: string;
  driveFileId: string;
  driveWebLink: string;
  sender: string;
  receivedAt: string;
  year: number;
  month: number;
  invoiceDate: string | null;
  supplier: string | null;
  amountPretax: number | null;
  amountTax: number | null;
  amountTotal: number | null;
  currency: string | null;
  confidence: number | null;
}

export interface InvoiceRecord extends InvoiceRecordInput {
  id: number;
  reported: boolean;
}
