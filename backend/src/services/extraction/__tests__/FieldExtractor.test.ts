import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ScoredFieldEnum } from '@discounting/shared/schemas/invoiceTypes.zod';
import { captureOf, FieldExtractor } from '../FieldExtractor';
import type { Logger } from '../../../utils/logger';

function createLogger(): Logger {
  return {
    log: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('FieldExtractor', () => {
  let logger: Logger;
  let extractor: FieldExtractor;

  beforeEach(() => {
    logger = createLogger();
    extractor = new FieldExtractor(logger);
  });

  describe('captureOf', () => {
    it('should use the last group that took part in the match', () => {
      const match = /(a)|(b)/.exec('a');
      expect(match && captureOf(match)).toBe('a');

      const both = /(\w+)-(\w+)/.exec('left-right');
      expect(both && captureOf(both)).toBe('right');
    });

    it('should fall back to the whole match without groups', () => {
      const match = /abc/.exec('xxabcxx');
      expect(match && captureOf(match)).toBe('abc');
    });
  });

  describe('invoice_number', () => {
    it('should read the SCU ID', () => {
      expect(extractor.extractField('SCU ID: ABC12345\nTotal Amount: 100', 'invoice_number')).toBe('ABC12345');
    });

    it('should prefer the SCU ID over a CU invoice number', () => {
      const text = 'CU Invoice Number:\nKRASRN0000123/45\nSCU ID: KRACU0100012345';
      expect(extractor.extractField(text, 'invoice_number')).toBe('KRACU0100012345');
    });

    it('should read a CU invoice number when there is no SCU ID', () => {
      expect(extractor.extractField('Invoice KRASRN0000123/45 issued', 'invoice_number')).toBe('KRASRN0000123/45');
    });

    it('should read a receipt signature', () => {
      expect(extractor.extractField('Receipt Signature: ABCD1234EFGH5678', 'invoice_number')).toBe('ABCD1234EFGH5678');
    });
  });

  describe('invoice_amount', () => {
    it('should prefer the labelled total amount', () => {
      const text = 'Sub Total: 50,000.00\nTotal Amount: KES 58,000.00';
      expect(extractor.extractField(text, 'invoice_amount')).toBe('58,000.00');
    });

    it('should read a grand total with a currency code', () => {
      expect(extractor.extractField('Grand Total: KSH 1,000', 'invoice_amount')).toBe('1,000');
    });

    it('should read an amount due', () => {
      expect(extractor.extractField('Amount Due 2,500.75', 'invoice_amount')).toBe('2,500.75');
    });

    it('should fall back to the first bare total', () => {
      const text = 'Sub Total: 100.00\nVAT: 16.00\nTotal: 116.00';
      expect(extractor.extractField(text, 'invoice_amount')).toBe('100.00');
    });
  });

  describe('dates', () => {
    it('should read the creation date', () => {
      expect(extractor.extractField('Date Created: 2025-12-17', 'invoice_date')).toBe('2025-12-17');
    });

    it('should read a day-first invoice date', () => {
      expect(extractor.extractField('Invoice Date: 17/12/2025', 'invoice_date')).toBe('17/12/2025');
    });

    it('should read due dates in both layouts', () => {
      expect(extractor.extractField('Due Date: 2026-01-16', 'due_date')).toBe('2026-01-16');
      expect(extractor.extractField('Payment Due: 16/01/2026', 'due_date')).toBe('16/01/2026');
    });
  });

  describe('KRA PINs', () => {
    it('should read the PIN in the seller section', () => {
      const text = 'Seller: Jua Kali Traders\nPIN: P051234567X\nBuyer PIN: A009876543B';
      expect(extractor.extractField(text, 'supplier_kra_pin')).toBe('P051234567X');
    });

    it('should read the PIN following an e-mail address as the buyer PIN', () => {
      const text = 'buyer@example.com PIN: PO52006107N';
      expect(extractor.extractField(text, 'buyer_kra_pin')).toBe('PO52006107N');
    });

    it('should take the second PIN as the buyer PIN', () => {
      const text = 'PIN: P051234567X\nACME\nPIN: A009876543B';
      expect(extractor.extractField(text, 'supplier_kra_pin')).toBe('P051234567X');
      expect(extractor.extractField(text, 'buyer_kra_pin')).toBe('A009876543B');
    });
  });

  describe('missing fields', () => {
    it('should return null and warn when nothing matches', () => {
      expect(extractor.extractField('nothing useful here', 'due_date')).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('No match found for due_date');
    });

    it('should never throw, whatever the text', () => {
      const samples = ['', '\n\n\n', 'Total:', 'PIN PIN PIN', '@.', '\u0000￿'];
      for (const text of samples) {
        for (const field of ScoredFieldEnum.options) {
          expect(() => extractor.extractField(text, field)).not.toThrow();
        }
      }
    });
  });

  describe('party details', () => {
    it('should read labelled buyer and seller names', () => {
      const text = 'Buyer Name: ACME SUPPLIES LIMITED\nSeller Name: Jua Kali Traders\n';
      expect(extractor.extractBuyerDetails(text)).toEqual({ name: 'ACME SUPPLIES LIMITED' });
      expect(extractor.extractSellerDetails(text)).toEqual({ name: 'Jua Kali Traders' });
    });

    it('should read the company after the contact person heading', () => {
      expect(extractor.extractBuyerDetails('PERSON NAME ACME SUPPLIES LIMITED')).toEqual({
        name: 'ACME SUPPLIES LIMITED',
      });
    });

    it('should return empty details when no name is found', () => {
      expect(extractor.extractBuyerDetails('SCU ID: ABC12345')).toEqual({});
      expect(extractor.extractSellerDetails('SCU ID: ABC12345')).toEqual({});
    });
  });
});
