import { describe, it, expect, vi } from 'vitest';
import { EtimsInvoiceParser } from '../EtimsInvoiceParser';
import { FieldExtractor } from '../FieldExtractor';
import { TypeCoercionService } from '../TypeCoercionService';
import { zeroScores } from '../ConfidenceScorer';
import { silentLogger } from '../../../utils/logger';

const FULL_INVOICE_TEXT = [
  'Seller Name: Jua Kali Traders',
  'PIN: P051234567X',
  'Buyer Name: ACME SUPPLIES LIMITED',
  'buyer@example.com PIN: A009876543B',
  'Date Created: 17/12/2025 10:42:11',
  'Due Date: 16/01/2026',
  'Total Amount: KES 1,250,000.50',
  'SCU ID: KRACU0100012345',
].join('\n');

function createParser(): { parser: EtimsInvoiceParser; extractor: FieldExtractor; coercion: TypeCoercionService } {
  const extractor = new FieldExtractor(silentLogger);
  const coercion = new TypeCoercionService();
  const parser = new EtimsInvoiceParser({ extractor, coercion, logger: silentLogger });
  return { parser, extractor, coercion };
}

describe('EtimsInvoiceParser', () => {
  it('should extract the core fields of a minimal invoice', () => {
    const { parser } = createParser();

    const result = parser.parseInvoice(
      'SCU ID: ABC12345\nTotal Amount: KES 60,000.00\nDate Created: 2025-12-17'
    );

    expect(result.invoice_number).toBe('ABC12345');
    expect(result.invoice_amount).toBe('60000.00');
    expect(result.invoice_date).toBe('2025-12-17');
    expect(result.due_date).toBeNull();
    expect(result.extraction_success).toBe(true);
    expect(result.extraction_errors).toEqual([]);
    expect(result.confidence_scores.invoice_amount).toBe(0.95);
    expect(result.confidence_scores.invoice_number).toBe(0.9);
    expect(result.confidence_scores.due_date).toBe(0);
  });

  it('should extract every field of a complete invoice', () => {
    const { parser } = createParser();

    const result = parser.parseInvoice(FULL_INVOICE_TEXT);

    expect(result).toEqual({
      invoice_number: 'KRACU0100012345',
      invoice_amount: '1250000.50',
      invoice_date: '2025-12-17',
      due_date: '2026-01-16',
      supplier_kra_pin: 'P051234567X',
      buyer_kra_pin: 'A009876543B',
      buyer_details: { name: 'ACME SUPPLIES LIMITED' },
      seller_details: { name: 'Jua Kali Traders' },
      confidence_scores: {
        invoice_number: 0.9,
        invoice_amount: 0.95,
        invoice_date: 0.9,
        due_date: 0.9,
        supplier_kra_pin: 0.95,
        buyer_kra_pin: 0.95,
      },
      extraction_success: true,
      extraction_errors: [],
    });
  });

  it('should correct an OCR-confused buyer PIN and score it as valid', () => {
    const { parser } = createParser();

    const result = parser.parseInvoice(
      'SCU ID: ABC12345\nTotal Amount: KES 60,000.00\nbuyer@example.com PIN: PO52006107N'
    );

    expect(result.buyer_kra_pin).toBe('P052006107N');
    expect(result.confidence_scores.buyer_kra_pin).toBe(0.95);
  });

  it('should reject text that is too short without running any pattern', () => {
    const { parser, extractor } = createParser();
    const extractSpy = vi.spyOn(extractor, 'extractField');

    const result = parser.parseInvoice('  SCU ID  ');

    expect(result.extraction_success).toBe(false);
    expect(result.extraction_errors).toEqual(['OCR text is empty or too short']);
    expect(result.confidence_scores).toEqual(zeroScores());
    expect(extractSpy).not.toHaveBeenCalled();
  });

  it('should handle empty and absent text', () => {
    const { parser } = createParser();

    for (const text of ['', null, undefined]) {
      const result = parser.parseInvoice(text);
      expect(result.extraction_success).toBe(false);
      expect(result.extraction_errors).toEqual(['OCR text is empty or too short']);
      expect(result.invoice_number).toBeNull();
    }
  });

  it('should name the missing core fields', () => {
    const { parser } = createParser();

    const result = parser.parseInvoice('Date Created: 2025-12-17\nThank you for your business');

    expect(result.extraction_success).toBe(false);
    expect(result.invoice_date).toBe('2025-12-17');
    expect(result.extraction_errors).toEqual(['Failed to extract core fields: invoice_number, invoice_amount']);
  });

  it('should keep partial results when extraction throws', () => {
    const { parser, coercion } = createParser();
    vi.spyOn(coercion, 'parseAmount').mockImplementation(() => {
      throw new Error('boom');
    });

    const result = parser.parseInvoice('SCU ID: ABC12345\nTotal Amount: KES 60,000.00');

    expect(result.invoice_number).toBe('ABC12345');
    expect(result.invoice_amount).toBeNull();
    expect(result.extraction_errors).toEqual([
      'Error parsing invoice: boom',
      'Failed to extract core fields: invoice_amount',
    ]);
    expect(result.confidence_scores.invoice_number).toBe(0.9);
    expect(result.confidence_scores.invoice_amount).toBe(0);
  });
});
