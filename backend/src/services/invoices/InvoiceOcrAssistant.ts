import type {
  InvoiceExtractionResult,
  TextExtractionResult,
} from '@discounting/shared/schemas/invoiceTypes.zod';
import { getOcrConfig } from '../../config/ocrConfig';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { withTimeout } from '../../utils/withTimeout';
import { getEtimsInvoiceParser, OPTIONAL_FIELDS, type EtimsInvoiceParser } from '../extraction/EtimsInvoiceParser';
import { getOcrExtractor, type OcrExtractor } from '../ocr/OcrExtractor';

const OCR_TIMEOUT_LABEL = 'OCR extraction';

export interface InvoiceAnalysis {
  text: TextExtractionResult;
  /** Null when no text could be recognized */
  invoice: InvoiceExtractionResult | null;
}

export interface InvoiceOcrAssistantDeps {
  extractor: Pick<OcrExtractor, 'extractText'>;
  parser: Pick<EtimsInvoiceParser, 'parseInvoice'>;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Human-readable notes for a reviewer: optional fields that were not found,
 * followed by every OCR and parsing error.
 */
export function buildWarnings(analysis: InvoiceAnalysis): string[] {
  const warnings: string[] = [];

  if (analysis.invoice) {
    for (const field of OPTIONAL_FIELDS) {
      if (!analysis.invoice[field]) {
        warnings.push(`${field} could not be extracted`);
      }
    }
  }

  warnings.push(...analysis.text.errors);
  if (analysis.invoice) {
    warnings.push(...analysis.invoice.extraction_errors);
  }

  return warnings;
}

/**
 * Runs OCR then invoice parsing over an uploaded document.
 */
export class InvoiceOcrAssistant {
  private readonly deps: InvoiceOcrAssistantDeps;

  constructor(deps: Partial<InvoiceOcrAssistantDeps> = {}) {
    this.deps = {
      extractor: deps.extractor ?? getOcrExtractor(),
      parser: deps.parser ?? getEtimsInvoiceParser(),
      timeoutMs: deps.timeoutMs ?? getOcrConfig().timeoutMs,
      logger: deps.logger ?? defaultLogger,
    };
  }

  /**
   * Rejects with TimeoutError when OCR exceeds the configured limit.
   */
  async analyze(filePath: string): Promise<InvoiceAnalysis> {
    const text = await withTimeout(this.deps.extractor.extractText(filePath), this.deps.timeoutMs, OCR_TIMEOUT_LABEL);

    if (!text.success) {
      this.deps.logger.warn(`OCR failed: ${text.errors.join('; ')}`);
      return { text, invoice: null };
    }

    return { text, invoice: this.deps.parser.parseInvoice(text.text) };
  }
}

let invoiceOcrAssistant: InvoiceOcrAssistant | null = null;

export function getInvoiceOcrAssistant(): InvoiceOcrAssistant {
  if (!invoiceOcrAssistant) {
    invoiceOcrAssistant = new InvoiceOcrAssistant();
  }
  return invoiceOcrAssistant;
}
