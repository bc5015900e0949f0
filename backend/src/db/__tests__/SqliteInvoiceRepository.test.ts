import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { closeDatabase, initDatabase, run } from '../connection';
import { ensureSchema } from '../init';
import { SqliteInvoiceRepository } from '../SqliteInvoiceRepository';
import { DuplicateInvoiceError, type InvoiceCreateInput } from '../../models/Invoice';
import { silentLogger } from '../../utils/logger';

function buildInput(overrides: Partial<InvoiceCreateInput> = {}): InvoiceCreateInput {
  return {
    invoice_number: 'INV-001',
    amount: '60000.00',
    invoice_date: '2025-12-17',
    due_date: '2026-01-16',
    supplier_kra_pin: 'P051234567X',
    buyer_kra_pin: null,
    buyer_name: 'ACME SUPPLIES LIMITED',
    seller_name: null,
    extraction_success: true,
    ocr_confidence: 0.91,
    extraction_errors: ['buyer_kra_pin could not be extracted'],
    invoice_document: '1700000000000-1-invoice.pdf',
    ...overrides,
  };
}

describe('SqliteInvoiceRepository', () => {
  const repository = new SqliteInvoiceRepository();

  beforeAll(async () => {
    await initDatabase({ path: ':memory:', logger: silentLogger });
    await ensureSchema();
  });

  beforeEach(async () => {
    await run('DELETE FROM invoices');
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('should create a pending invoice and read it back', async () => {
    const created = await repository.create(buildInput());

    expect(created).toMatchObject({
      invoice_number: 'INV-001',
      amount: '60000.00',
      invoice_date: '2025-12-17',
      due_date: '2026-01-16',
      supplier_kra_pin: 'P051234567X',
      buyer_kra_pin: null,
      buyer_name: 'ACME SUPPLIES LIMITED',
      seller_name: null,
      status: 'pending',
      extraction_success: true,
      ocr_confidence: 0.91,
      extraction_errors: ['buyer_kra_pin could not be extracted'],
      invoice_document: '1700000000000-1-invoice.pdf',
    });
    expect(created.id).toBeGreaterThan(0);
    expect(created.submitted_at).toMatch(/^\d{4}-\d{2}-\d{2}T/);

    expect(await repository.findById(created.id)).toEqual(created);
  });

  it('should keep amounts exactly as stored', async () => {
    const created = await repository.create(buildInput({ amount: '1234567890123.45' }));
    expect(created.amount).toBe('1234567890123.45');
  });

  it('should find invoices by number', async () => {
    await repository.create(buildInput());

    const found = await repository.findByInvoiceNumber('INV-001');
    expect(found?.invoice_number).toBe('INV-001');
    expect(await repository.findByInvoiceNumber('INV-404')).toBeNull();
  });

  it('should return null for unknown ids', async () => {
    expect(await repository.findById(9999)).toBeNull();
  });

  it('should refuse a second invoice with the same number', async () => {
    await repository.create(buildInput());

    const attempt = repository.create(buildInput());

    await expect(attempt).rejects.toBeInstanceOf(DuplicateInvoiceError);
    await expect(attempt).rejects.toThrow('Invoice number INV-001 already exists');
  });

  it('should report only one of two concurrent inserts as a duplicate', async () => {
    const results = await Promise.allSettled([repository.create(buildInput()), repository.create(buildInput())]);

    expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    const rejected = results.find((result) => result.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(DuplicateInvoiceError);
  });

  it('should list newest first and filter by status', async () => {
    const first = await repository.create(buildInput({ invoice_number: 'INV-001' }));
    const second = await repository.create(buildInput({ invoice_number: 'INV-002' }));
    await run("UPDATE invoices SET status = 'approved' WHERE id = ?", [first.id]);

    const all = await repository.findAll();
    expect(all.map((invoice) => invoice.id)).toEqual([second.id, first.id]);

    const approved = await repository.findAll({ status: 'approved' });
    expect(approved.map((invoice) => invoice.invoice_number)).toEqual(['INV-001']);
  });

  it('should reject statuses outside the lifecycle', async () => {
    const created = await repository.create(buildInput());
    await expect(run("UPDATE invoices SET status = 'lost' WHERE id = ?", [created.id])).rejects.toThrow(
      /SQLITE_CONSTRAINT/
    );
  });

  it('should read unreadable extraction errors as an empty list', async () => {
    const created = await repository.create(buildInput());

    await run("UPDATE invoices SET extraction_errors = 'not json' WHERE id = ?", [created.id]);
    expect((await repository.findById(created.id))?.extraction_errors).toEqual([]);

    await run('UPDATE invoices SET extraction_errors = ? WHERE id = ?', ['{"page":1}', created.id]);
    expect((await repository.findById(created.id))?.extraction_errors).toEqual([]);
  });
});
