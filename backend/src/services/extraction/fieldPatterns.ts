import type { ScoredField } from '@discounting/shared/schemas/invoiceTypes.zod';

/**
 * Ordered extraction rules for eTIMS invoices.
 *
 * Every list runs from the most reliable structural marker to the most
 * generic fallback, and the first rule that matches wins. All patterns use
 * the `ims` flags: OCR output reflows layout freely, so wildcards must cross
 * line breaks.
 *
 * Known trade-off: the bare `Total:` amount fallback can pick up a subtotal
 * printed above the grand total on dense layouts. It is kept for recall;
 * the more specific total labels are tried first.
 */
export interface FieldRule {
  pattern: RegExp;
  label: string;
}

export type PartyRole = 'buyer' | 'seller';

const KRA_PIN = '[A-Z][0-9]{9}[A-Z]';
// Buyer PINs are often misread: an extra leading letter, or O for 0
const OCR_KRA_PIN = '[A-Z]{1,2}[O0-9]{9}[A-Z]';
const AMOUNT = '(?:KES|KSH)?\\s*([0-9,]+\\.?\\d*)';
const ISO_DATE = '(\\d{4}-\\d{2}-\\d{2})';
const SHORT_DATE = '(\\d{1,2}[/-]\\d{1,2}[/-]\\d{2,4})';
const COMPANY_SUFFIX = '(?:LIMITED|LTD|SOLUTIONS)';

const FLAGS = 'ims';

function rule(source: string, label: string): FieldRule {
  return { pattern: new RegExp(source, FLAGS), label };
}

export const FIELD_RULES: Record<ScoredField, readonly FieldRule[]> = {
  invoice_number: [
    rule('SCU\\s+ID\\s*:?\\s*([A-Z0-9]+)', 'SCU ID'),
    rule('(KRAS[RN][NO0]+\\d+/\\d+)', 'CU invoice number'),
    rule('Receipt\\s+Signature\\s*:?\\s*([A-Z0-9]{10,})', 'receipt signature'),
    rule('CU\\s+Invoice\\s+Number\\s*:?\\s*\\n.*?([A-Z0-9]+/\\d+)', 'after CU invoice number label'),
  ],
  invoice_amount: [
    rule(`Total\\s+Amount\\s*:?\\s*${AMOUNT}`, 'total amount'),
    rule(`Grand\\s*Total\\s*:?\\s*${AMOUNT}`, 'grand total'),
    rule(`Amount\\s*(?:Due|Payable)\\s*:?\\s*${AMOUNT}`, 'amount due'),
    rule(`Total\\s*:?\\s*${AMOUNT}`, 'bare total'),
  ],
  invoice_date: [
    rule(`Date\\s+Created\\s*:?\\s*${ISO_DATE}`, 'date created (ISO)'),
    rule(`Invoice\\s*Date\\s*:?\\s*${ISO_DATE}`, 'invoice date (ISO)'),
    rule(`Date\\s*:?\\s*${ISO_DATE}`, 'date (ISO)'),
    rule(`Date\\s+Created\\s*:?\\s*${SHORT_DATE}`, 'date created'),
    rule(`Invoice\\s*Date\\s*:?\\s*${SHORT_DATE}`, 'invoice date'),
  ],
  due_date: [
    rule(`Due\\s*Date\\s*:?\\s*${ISO_DATE}`, 'due date (ISO)'),
    rule(`Payment\\s*Due\\s*:?\\s*${ISO_DATE}`, 'payment due (ISO)'),
    rule(`Due\\s*Date\\s*:?\\s*${SHORT_DATE}`, 'due date'),
    rule(`Payment\\s*Due\\s*:?\\s*${SHORT_DATE}`, 'payment due'),
  ],
  supplier_kra_pin: [
    rule(`(?:Sale\\s+From|Seller|Supplier).*?PIN\\s*:?\\s*(${KRA_PIN})`, 'seller section PIN'),
    rule(`(?:^|\\n)PIN\\s*:?\\s*(${KRA_PIN})`, 'first PIN'),
  ],
  buyer_kra_pin: [
    rule(`@\\w+\\.\\w+\\s+PIN\\s*:?\\s*(${OCR_KRA_PIN})`, 'PIN after e-mail address'),
    rule(`email.*?PIN\\s*:?\\s*(${OCR_KRA_PIN})`, 'PIN after e-mail label'),
    rule(`PIN\\s*:?\\s*${KRA_PIN}.*?PIN\\s*:?\\s*(${OCR_KRA_PIN})`, 'second PIN'),
  ],
};

export const PARTY_NAME_RULES: Record<PartyRole, readonly FieldRule[]> = {
  buyer: [
    rule('(?:Buyer|Customer)\\s+Name\\s*:[ \\t]*([^\\n]+)', 'buyer name label'),
    rule(`PERSON\\s+NAME\\s+([A-Z][A-Z\\s]+${COMPANY_SUFFIX})`, 'company after contact person'),
    rule(`\\s([A-Z]{2,}(?:\\s+[A-Z]+)*\\s+${COMPANY_SUFFIX})\\s+KRAS`, 'company before CU number'),
  ],
  seller: [
    rule('(?:Seller|Supplier)\\s+Name\\s*:[ \\t]*([^\\n]+)', 'seller name label'),
    rule('CU\\s+Invoice\\s+Number\\s*:?\\s*\\n([A-Z]+\\s+[A-Z]+\\s+[A-Z]+)', 'name after CU invoice number'),
    rule(
      `Invoice\\s+Number\\s*:?\\s*\\n([A-Z]+(?:\\s+[A-Z]+){1,3})\\s+[A-Z]+(?:\\s+[A-Z]+)*\\s+${COMPANY_SUFFIX}`,
      'name before company'
    ),
  ],
};
