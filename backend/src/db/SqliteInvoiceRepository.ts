import { z } from 'zod';
import {
  InvoiceStatusEnum,
  type InvoiceRecord,
  type InvoiceStatus,
} from '@discounting/shared/schemas/invoiceTypes.zod';
import { DuplicateInvoiceError, type InvoiceCreateInput, type InvoiceRepository } from '../models/Invoice';
import { all, get, run } from './connection';

const INVOICE_STATUS_PENDING: InvoiceStatus = 'pending';

interface InvoiceRow {
  id: number;
  invoice_number: string;
  amount: string;
  invoice_date: string;
  due_date: string;
  supplier_kra_pin: string | null;
  buyer_kra_pin: string | null;
  buyer_name: string | null;
  seller_name: string | null;
  status: string;
  extraction_success: number;
  ocr_confidence: number | null;
  extraction_errors: string;
  invoice_document: string | null;
  submitted_at: string;
}

const INVOICE_NUMBER_UNIQUE_VIOLATION = 'UNIQUE constraint failed: invoices.invoice_number';

function isDuplicateInvoiceNumber(err: unknown): boolean {
  return err instanceof Error && err.message.includes(INVOICE_NUMBER_UNIQUE_VIOLATION);
}

const ExtractionErrorsSchema = z.array(z.string()).catch([]);

function parseExtractionErrors(raw: string): string[] {
  try {
    return ExtractionErrorsSchema.parse(JSON.parse(raw));
  } catch {
    return [];
  }
}

function toRecord(row: InvoiceRow): InvoiceRecord {
  return {
    ...row,
    status: InvoiceStatusEnum.parse(row.status),
    extraction_success: Boolean(row.extraction_success),
    extraction_errors: parseExtractionErrors(row.extraction_errors),
  };
}

export class SqliteInvoiceRepository implements InvoiceRepository {
  async create(input: InvoiceCreateInput): Promise<InvoiceRecord> {
    const result = await this.insert(input);

    const created = await this.findById(result.lastID);
    if (!created) {
      throw new Error(`Invoice ${result.lastID} not found after insert`);
    }
    return created;
  }

  private async insert(input: InvoiceCreateInput): Promise<{ lastID: number; changes: number }> {
    try {
      return await run(
        `INSERT INTO invoices (
           invoice_number, amount, invoice_date, due_date,
           supplier_kra_pin, buyer_kra_pin, buyer_name, seller_name,
           status, extraction_success, ocr_confidence, extraction_errors, invoice_document
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          input.invoice_number,
          input.amount,
          input.invoice_date,
          input.due_date,
          input.supplier_kra_pin,
          input.buyer_kra_pin,
          input.buyer_name,
          input.seller_name,
          INVOICE_STATUS_PENDING,
          input.extraction_success ? 1 : 0,
          input.ocr_confidence,
          JSON.stringify(input.extraction_errors),
          input.invoice_document,
        ]
      );
    } catch (err) {
      if (isDuplicateInvoiceNumber(err)) {
        throw new DuplicateInvoiceError(input.invoice_number);
      }
      throw err;
    }
  }

  async findById(id: number): Promise<InvoiceRecord | null> {
    const row = await get<InvoiceRow>('SELECT * FROM invoices WHERE id = ?', [id]);
    return row ? toRecord(row) : null;
  }

  async findByInvoiceNumber(invoiceNumber: string): Promise<InvoiceRecord | null> {
    const row = await get<InvoiceRow>('SELECT * FROM invoices WHERE invoice_number = ?', [invoiceNumber]);
    return row ? toRecord(row) : null;
  }

  async findAll(filters: { status?: InvoiceStatus } = {}): Promise<InvoiceRecord[]> {
    let sql = 'SELECT * FROM invoices WHERE 1=1';
    const params: unknown[] = [];

    if (filters.status) {
      sql += ' AND status = ?';
      params.push(filters.status);
    }

    sql += ' ORDER BY submitted_at DESC, id DESC';

    const rows = await all<InvoiceRow>(sql, params);
    return rows.map(toRecord);
  }
}

let invoiceRepository: SqliteInvoiceRepository | null = null;

export function getInvoiceRepository(): SqliteInvoiceRepository {
  if (!invoiceRepository) {
    invoiceRepository = new SqliteInvoiceRepository();
  }
  return invoiceRepository;
}
