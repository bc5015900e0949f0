import {
  InvoiceSubmissionSchema,
  type InvoiceExtractionResult,
  type InvoiceSubmission,
} from '@discounting/shared/schemas/invoiceTypes.zod';

export type SubmissionField = keyof InvoiceSubmission;
export type FieldSource = 'user' | 'ocr' | 'missing';

type OcrValue = (result: InvoiceExtractionResult) => string | null | undefined;

/**
 * Which extraction output fills which submission field.
 */
export const OCR_FIELD_MAP: Record<SubmissionField, OcrValue> = {
  invoice_number: (result) => result.invoice_number,
  amount: (result) => result.invoice_amount,
  invoice_date: (result) => result.invoice_date,
  due_date: (result) => result.due_date,
  supplier_kra_pin: (result) => result.supplier_kra_pin,
  buyer_kra_pin: (result) => result.buyer_kra_pin,
  buyer_name: (result) => result.buyer_details.name,
  seller_name: (result) => result.seller_details.name,
};

const SUBMISSION_FIELDS = InvoiceSubmissionSchema.keyof().options;

function allMissing(): Record<SubmissionField, FieldSource> {
  return {
    invoice_number: 'missing',
    amount: 'missing',
    invoice_date: 'missing',
    due_date: 'missing',
    supplier_kra_pin: 'missing',
    buyer_kra_pin: 'missing',
    buyer_name: 'missing',
    seller_name: 'missing',
  };
}

export interface MergedSubmission {
  fields: InvoiceSubmission;
  sources: Record<SubmissionField, FieldSource>;
}

/**
 * Fills the gaps in a user submission from OCR output. A non-empty value the
 * user typed is never replaced.
 */
export function mergeOcrFields(
  submission: InvoiceSubmission,
  result: InvoiceExtractionResult | null
): MergedSubmission {
  const fields: InvoiceSubmission = {};
  const sources = allMissing();

  for (const field of SUBMISSION_FIELDS) {
    const userValue = submission[field]?.trim();
    if (userValue) {
      fields[field] = userValue;
      sources[field] = 'user';
      continue;
    }

    const ocrValue = result ? OCR_FIELD_MAP[field](result)?.trim() : undefined;
    if (ocrValue) {
      fields[field] = ocrValue;
      sources[field] = 'ocr';
    }
  }

  return { fields, sources };
}
