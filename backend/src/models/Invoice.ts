import type {
  InvoiceDraft,
  InvoiceRecord,
  InvoiceStatus,
} from '@discounting/shared/schemas/invoiceTypes.zod';

export class DuplicateInvoiceError extends Error {
  constructor(public readonly invoiceNumber: string) {
    super(`Invoice number ${invoiceNumber} already exists`);
    this.name = 'DuplicateInvoiceError';
    Object.setPrototypeOf(this, DuplicateInvoiceError.prototype);
  }
}

/**
 * What gets stored alongside the invoice fields when it is created
 */
export interface InvoiceCreateInput extends InvoiceDraft {
  extraction_success: boolean;
  ocr_confidence: number | null;
  extraction_errors: string[];
  invoice_document: string | null;
}

/**
 * Repository interface for Invoice persistence
 */
export interface InvoiceRepository {
  /**
   * Create a new invoice in `pending` status. Rejects with
   * DuplicateInvoiceError when the invoice number is taken.
   */
  create(input: InvoiceCreateInput): Promise<InvoiceRecord>;

  findById(id: number): Promise<InvoiceRecord | null>;

  findByInvoiceNumber(invoiceNumber: string): Promise<InvoiceRecord | null>;

  /**
   * Newest first
   */
  findAll(filters?: { status?: InvoiceStatus }): Promise<InvoiceRecord[]>;
}
