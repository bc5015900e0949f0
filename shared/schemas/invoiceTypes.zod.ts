import { z } from 'zod';

// ============================================================
// Enums
// ============================================================

export const SupportedFormatEnum = z.enum(['pdf', 'jpg', 'jpeg', 'png']);

export const ScoredFieldEnum = z.enum([
  'invoice_number',
  'invoice_amount',
  'invoice_date',
  'due_date',
  'supplier_kra_pin',
  'buyer_kra_pin',
]);

export const InvoiceStatusEnum = z.enum([
  'pending',
  'approved',
  'funded',
  'settled',
  'completed',
  'rejected',
]);

// ============================================================
// Value Formats
// ============================================================

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

// Amounts travel as normalized decimal strings so no float rounding creeps in
export const DecimalStringSchema = z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal amount');

// Stored amounts: up to 13 whole digits and 2 decimal places, never negative
export const InvoiceAmountSchema = z
  .string()
  .regex(/^\d{1,13}(\.\d{1,2})?$/, 'Expected an amount with at most 13 digits and 2 decimal places');

export const KraPinSchema = z.string().regex(/^[A-Za-z0-9]{11}$/, 'Expected an 11-character KRA PIN');

// ============================================================
// OCR Pipeline Types
// ============================================================

export const RecognizedPageSchema = z.object({
  page: z.number().int().positive(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
  error: z.string().optional(),
});

export const TextExtractionResultSchema = z.object({
  success: z.boolean(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
  pages: z.number().int().min(0),
  errors: z.array(z.string()),
  page_results: z.array(RecognizedPageSchema),
});

export const PartyDetailsSchema = z.object({
  name: z.string().optional(),
});

export const ExtractedFieldsSchema = z.object({
  invoice_number: z.string().nullable(),
  invoice_amount: DecimalStringSchema.nullable(),
  invoice_date: IsoDateSchema.nullable(),
  due_date: IsoDateSchema.nullable(),
  supplier_kra_pin: z.string().nullable(),
  buyer_kra_pin: z.string().nullable(),
  buyer_details: PartyDetailsSchema,
  seller_details: PartyDetailsSchema,
});

export const ConfidenceScoresSchema = z.object({
  invoice_number: z.number().min(0).max(1),
  invoice_amount: z.number().min(0).max(1),
  invoice_date: z.number().min(0).max(1),
  due_date: z.number().min(0).max(1),
  supplier_kra_pin: z.number().min(0).max(1),
  buyer_kra_pin: z.number().min(0).max(1),
});

export const InvoiceExtractionResultSchema = ExtractedFieldsSchema.extend({
  confidence_scores: ConfidenceScoresSchema,
  extraction_success: z.boolean(),
  extraction_errors: z.array(z.string()),
});

// ============================================================
// Invoice Submission
// ============================================================

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Fields a supplier may type in alongside (or instead of) an uploaded invoice.
 * Empty strings count as "not provided" so OCR values can fill them.
 */
export const InvoiceSubmissionSchema = z.object({
  invoice_number: optionalText,
  amount: optionalText,
  invoice_date: optionalText,
  due_date: optionalText,
  supplier_kra_pin: optionalText,
  buyer_kra_pin: optionalText,
  buyer_name: optionalText,
  seller_name: optionalText,
});

export const InvoiceDraftSchema = z.object({
  invoice_number: z.string().min(1).max(50),
  amount: InvoiceAmountSchema,
  invoice_date: IsoDateSchema,
  due_date: IsoDateSchema,
  supplier_kra_pin: z.string().nullable(),
  buyer_kra_pin: z.string().nullable(),
  buyer_name: z.string().nullable(),
  seller_name: z.string().nullable(),
});

export const InvoiceRecordSchema = InvoiceDraftSchema.extend({
  id: z.number().int().positive(),
  status: InvoiceStatusEnum,
  extraction_success: z.boolean(),
  ocr_confidence: z.number().min(0).max(1).nullable(),
  extraction_errors: z.array(z.string()),
  invoice_document: z.string().nullable(),
  submitted_at: z.string(),
});

// ============================================================
// Inferred Types
// ============================================================

export type SupportedFormat = z.infer<typeof SupportedFormatEnum>;
export type ScoredField = z.infer<typeof ScoredFieldEnum>;
export type InvoiceStatus = z.infer<typeof InvoiceStatusEnum>;

export type RecognizedPage = z.infer<typeof RecognizedPageSchema>;
export type TextExtractionResult = z.infer<typeof TextExtractionResultSchema>;
export type PartyDetails = z.infer<typeof PartyDetailsSchema>;
export type ExtractedFields = z.infer<typeof ExtractedFieldsSchema>;
export type ConfidenceScores = z.infer<typeof ConfidenceScoresSchema>;
export type InvoiceExtractionResult = z.infer<typeof InvoiceExtractionResultSchema>;

export type InvoiceSubmission = z.infer<typeof InvoiceSubmissionSchema>;
export type InvoiceDraft = z.infer<typeof InvoiceDraftSchema>;
export type InvoiceRecord = z.infer<typeof InvoiceRecordSchema>;
