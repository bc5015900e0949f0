import type { InvoiceExtractionResult, ScoredField } from '@discounting/shared/schemas/invoiceTypes.zod';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { ParseError } from '../ocr/errors';
import { getConfidenceScorer, zeroScores, type ConfidenceScorer } from './ConfidenceScorer';
import { getFieldExtractor, type FieldExtractor } from './FieldExtractor';
import { getTypeCoercionService, type TypeCoercionService } from './TypeCoercionService';

const MIN_TEXT_LENGTH = 10;
const TEXT_TOO_SHORT_ERROR = 'OCR text is empty or too short';

export const CORE_FIELDS: readonly ScoredField[] = ['invoice_number', 'invoice_amount'];
export const OPTIONAL_FIELDS: readonly ScoredField[] = [
  'invoice_date',
  'due_date',
  'supplier_kra_pin',
  'buyer_kra_pin',
];

export interface EtimsInvoiceParserDeps {
  extractor: FieldExtractor;
  coercion: TypeCoercionService;
  scorer: ConfidenceScorer;
  logger: Logger;
}

function emptyResult(): InvoiceExtractionResult {
  return {
    invoice_number: null,
    invoice_amount: null,
    invoice_date: null,
    due_date: null,
    supplier_kra_pin: null,
    buyer_kra_pin: null,
    buyer_details: {},
    seller_details: {},
    confidence_scores: zeroScores(),
    extraction_success: false,
    extraction_errors: [],
  };
}

/**
 * Turns recognized eTIMS invoice text into structured, scored fields.
 */
export class EtimsInvoiceParser {
  private readonly deps: EtimsInvoiceParserDeps;

  constructor(deps: Partial<EtimsInvoiceParserDeps> = {}) {
    this.deps = {
      extractor: deps.extractor ?? getFieldExtractor(),
      coercion: deps.coercion ?? getTypeCoercionService(),
      scorer: deps.scorer ?? getConfidenceScorer(),
      logger: deps.logger ?? defaultLogger,
    };
  }

  /**
   * Never throws. Extraction problems are reported in `extraction_errors`
   * and the fields found up to that point are kept.
   */
  parseInvoice(text: string | null | undefined): InvoiceExtractionResult {
    const result = emptyResult();
    const { logger } = this.deps;

    if (!text || text.trim().length < MIN_TEXT_LENGTH) {
      result.extraction_errors.push(TEXT_TOO_SHORT_ERROR);
      logger.warn(TEXT_TOO_SHORT_ERROR);
      return result;
    }

    try {
      this.extractInto(result, text);
    } catch (cause) {
      const error = new ParseError(cause);
      result.extraction_errors.push(error.message);
      logger.error(error.message);
    }

    result.confidence_scores = this.deps.scorer.score(result);

    const missingCore = CORE_FIELDS.filter((field) => !result[field]);
    if (missingCore.length === 0) {
      result.extraction_success = true;
      logger.info(`Successfully extracted core fields from invoice ${result.invoice_number}`);
    } else {
      const message = `Failed to extract core fields: ${missingCore.join(', ')}`;
      result.extraction_errors.push(message);
      logger.warn(message);
    }

    const missingOptional = OPTIONAL_FIELDS.filter((field) => !result[field]);
    if (missingOptional.length > 0) {
      logger.warn(`Optional fields not extracted: ${missingOptional.join(', ')}`);
    }

    return result;
  }

  private extractInto(result: InvoiceExtractionResult, text: string): void {
    const { extractor, coercion } = this.deps;

    result.invoice_number = extractor.extractField(text, 'invoice_number');
    result.invoice_amount = coercion.parseAmount(extractor.extractField(text, 'invoice_amount'));
    result.invoice_date = coercion.parseDate(extractor.extractField(text, 'invoice_date'));
    result.due_date = coercion.parseDate(extractor.extractField(text, 'due_date'));
    result.supplier_kra_pin = coercion.cleanupKraPin(extractor.extractField(text, 'supplier_kra_pin'));
    result.buyer_kra_pin = coercion.cleanupKraPin(extractor.extractField(text, 'buyer_kra_pin'));
    result.buyer_details = extractor.extractBuyerDetails(text);
    result.seller_details = extractor.extractSellerDetails(text);
  }
}

let etimsInvoiceParser: EtimsInvoiceParser | null = null;

export function getEtimsInvoiceParser(): EtimsInvoiceParser {
  if (!etimsInvoiceParser) {
    etimsInvoiceParser = new EtimsInvoiceParser();
  }
  return etimsInvoiceParser;
}
