import type {
  InvoiceExtractionResult,
  TextExtractionResult,
} from '@discounting/shared/schemas/invoiceTypes.zod';

export function buildTextResult(overrides: Partial<TextExtractionResult> = {}): TextExtractionResult {
  return {
    success: true,
    text: 'SCU ID: KRACU0100012345\nTotal Amount: KES 58,000.00',
    confidence: 0.88,
    pages: 1,
    errors: [],
    page_results: [],
    ...overrides,
  };
}

export function buildInvoiceResult(overrides: Partial<InvoiceExtractionResult> = {}): InvoiceExtractionResult {
  return {
    invoice_number: 'KRACU0100012345',
    invoice_amount: '58000.00',
    invoice_date: '2025-12-17',
    due_date: '2026-01-16',
    supplier_kra_pin: 'P051234567X',
    buyer_kra_pin: null,
    buyer_details: {},
    seller_details: { name: 'Jua Kali Traders' },
    confidence_scores: {
      invoice_number: 0.9,
      invoice_amount: 0.95,
      invoice_date: 0.9,
      due_date: 0.9,
      supplier_kra_pin: 0.95,
      buyer_kra_pin: 0,
    },
    extraction_success: true,
    extraction_errors: [],
    ...overrides,
  };
}
