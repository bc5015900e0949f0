import type { RecognizedPage, TextExtractionResult } from '@discounting/shared/schemas/invoiceTypes.zod';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { errorMessage } from './errors';
import { getFileValidator, type FileValidator } from './FileValidator';
import { getImageNormalizer, type ImageNormalizer } from './ImageNormalizer';
import { TextRecognizer } from './TextRecognizer';

const PAGE_SEPARATOR = '\n\n';
const FIRST_PAGE_NUMBER = 1;
const NO_TEXT_ERROR = 'No text could be extracted';

export interface OcrExtractorDeps {
  validator: Pick<FileValidator, 'checkFile'>;
  normalizer: Pick<ImageNormalizer, 'toPages'>;
  recognizer: Pick<TextRecognizer, 'recognize'>;
  logger: Logger;
}

function emptyResult(): TextExtractionResult {
  return {
    success: false,
    text: '',
    confidence: 0,
    pages: 0,
    errors: [],
    page_results: [],
  };
}

/**
 * Combines per-page results: text from the pages that succeeded, joined in
 * page order, and the mean of their confidences. Failed pages are skipped,
 * not scored as zero.
 */
export function combinePages(pages: RecognizedPage[]): { text: string; confidence: number; succeeded: number } {
  const succeeded = [...pages]
    .sort((a, b) => a.page - b.page)
    .filter((page) => page.error === undefined);

  if (succeeded.length === 0) {
    return { text: '', confidence: 0, succeeded: 0 };
  }

  return {
    text: succeeded.map((page) => page.text).join(PAGE_SEPARATOR),
    confidence: succeeded.reduce((sum, page) => sum + page.confidence, 0) / succeeded.length,
    succeeded: succeeded.length,
  };
}

export class OcrExtractor {
  private readonly deps: OcrExtractorDeps;

  constructor(deps: Partial<OcrExtractorDeps> = {}) {
    this.deps = {
      validator: deps.validator ?? getFileValidator(),
      normalizer: deps.normalizer ?? getImageNormalizer(),
      recognizer: deps.recognizer ?? new TextRecognizer(),
      logger: deps.logger ?? defaultLogger,
    };
  }

  /**
   * Recognizes all text in a PDF or image file. Never throws: validation,
   * decoding and per-page recognition problems end up in `errors`.
   */
  async extractText(filePath: string): Promise<TextExtractionResult> {
    const result = emptyResult();
    const { logger } = this.deps;

    const check = await this.deps.validator.checkFile(filePath);
    if (!check.valid) {
      result.errors.push(check.error);
      return result;
    }

    try {
      const bitmaps = await this.deps.normalizer.toPages(filePath, check.format);
      result.pages = bitmaps.length;

      // Pages are independent; Promise.all keeps them in page order
      const pages = await Promise.all(
        bitmaps.map((bitmap, index) => {
          const pageNumber = index + FIRST_PAGE_NUMBER;
          logger.info(`Processing page/image ${pageNumber}/${bitmaps.length}`);
          return this.deps.recognizer.recognize(bitmap, pageNumber);
        })
      );
      result.page_results = pages;

      for (const page of pages) {
        if (page.error !== undefined) {
          result.errors.push(`Page ${page.page}: ${page.error}`);
        }
      }

      const combined = combinePages(pages);
      if (combined.succeeded > 0 && combined.text.trim().length > 0) {
        result.text = combined.text;
        result.confidence = combined.confidence;
        result.success = true;
        logger.info(
          `OCR completed: ${combined.succeeded} pages, avg confidence: ${combined.confidence.toFixed(2)}`
        );
      } else {
        result.errors.push(NO_TEXT_ERROR);
        logger.warn('OCR completed but no text extracted');
      }
    } catch (error) {
      const message = `OCR extraction failed: ${errorMessage(error)}`;
      result.errors.push(message);
      logger.error(message);
    }

    return result;
  }
}

let ocrExtractor: OcrExtractor | null = null;

export function getOcrExtractor(): OcrExtractor {
  if (!ocrExtractor) {
    ocrExtractor = new OcrExtractor();
  }
  return ocrExtractor;
}
