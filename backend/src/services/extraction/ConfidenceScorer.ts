import type { ConfidenceScores, ExtractedFields, ScoredField } from '@discounting/shared/schemas/invoiceTypes.zod';
import { getTypeCoercionService, type TypeCoercionService } from './TypeCoercionService';

const CONFIDENCE_ABSENT = 0;
const INVOICE_NUMBER_CONFIDENCE_WELL_FORMED = 0.9;
const INVOICE_NUMBER_CONFIDENCE_IRREGULAR = 0.6;
const INVOICE_NUMBER_MIN_LENGTH = 5;
const INVOICE_NUMBER_MAX_LENGTH = 30;
const AMOUNT_CONFIDENCE = 0.95;
const DATE_CONFIDENCE = 0.9;
const KRA_PIN_CONFIDENCE_VALID = 0.95;
const KRA_PIN_CONFIDENCE_INVALID = 0.5;

export type ScorableFields = Pick<ExtractedFields, ScoredField>;

export function zeroScores(): ConfidenceScores {
  return {
    invoice_number: CONFIDENCE_ABSENT,
    invoice_amount: CONFIDENCE_ABSENT,
    invoice_date: CONFIDENCE_ABSENT,
    due_date: CONFIDENCE_ABSENT,
    supplier_kra_pin: CONFIDENCE_ABSENT,
    buyer_kra_pin: CONFIDENCE_ABSENT,
  };
}

/**
 * Assigns each extracted field a confidence in [0, 1] from its presence
 * and well-formedness. Absent fields score 0.
 */
export class ConfidenceScorer {
  constructor(private readonly coercion: TypeCoercionService = getTypeCoercionService()) {}

  score(fields: ScorableFields): ConfidenceScores {
    return {
      invoice_number: this.scoreInvoiceNumber(fields.invoice_number),
      invoice_amount: fields.invoice_amount ? AMOUNT_CONFIDENCE : CONFIDENCE_ABSENT,
      invoice_date: fields.invoice_date ? DATE_CONFIDENCE : CONFIDENCE_ABSENT,
      due_date: fields.due_date ? DATE_CONFIDENCE : CONFIDENCE_ABSENT,
      supplier_kra_pin: this.scoreKraPin(fields.supplier_kra_pin),
      buyer_kra_pin: this.scoreKraPin(fields.buyer_kra_pin),
    };
  }

  private scoreInvoiceNumber(value: string | null): number {
    if (!value) {
      return CONFIDENCE_ABSENT;
    }

    const wellFormed =
      value.length >= INVOICE_NUMBER_MIN_LENGTH &&
      value.length <= INVOICE_NUMBER_MAX_LENGTH &&
      /[A-Za-z0-9]/.test(value);

    return wellFormed ? INVOICE_NUMBER_CONFIDENCE_WELL_FORMED : INVOICE_NUMBER_CONFIDENCE_IRREGULAR;
  }

  private scoreKraPin(value: string | null): number {
    if (!value) {
      return CONFIDENCE_ABSENT;
    }
    return this.coercion.isValidKraPin(value) ? KRA_PIN_CONFIDENCE_VALID : KRA_PIN_CONFIDENCE_INVALID;
  }
}

let confidenceScorer: ConfidenceScorer | null = null;

export function getConfidenceScorer(): ConfidenceScorer {
  if (!confidenceScorer) {
    confidenceScorer = new ConfidenceScorer();
  }
  return confidenceScorer;
}
