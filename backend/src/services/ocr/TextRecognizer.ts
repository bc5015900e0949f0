import type { RecognizedPage } from '@discounting/shared/schemas/invoiceTypes.zod';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { RecognitionError } from './errors';
import { getImageNormalizer } from './ImageNormalizer';
import type { PageBitmap } from './PdfRenderer';
import { getTesseractService, type RecognitionBackend } from './TesseractService';

const CONFIDENCE_SCALE = 100;
const CONFIDENCE_MIN = 0;
const CONFIDENCE_MAX = 1;

export interface TextRecognizerDeps {
  backend: RecognitionBackend;
  preprocessor: { preprocess(page: PageBitmap): Promise<PageBitmap> };
  logger: Logger;
}

function clampConfidence(value: number): number {
  return Math.max(CONFIDENCE_MIN, Math.min(CONFIDENCE_MAX, value));
}

/**
 * Mean of the usable token confidences, normalised to [0, 1]. Negative
 * values are the backend's "no confidence" sentinel and are skipped.
 */
export function averageTokenConfidence(tokenConfidences: number[]): number {
  const usable = tokenConfidences.filter((confidence) => Number.isFinite(confidence) && confidence >= 0);
  if (usable.length === 0) {
    return 0;
  }

  const mean = usable.reduce((sum, confidence) => sum + confidence, 0) / usable.length;
  return clampConfidence(mean / CONFIDENCE_SCALE);
}

export class TextRecognizer {
  private readonly deps: TextRecognizerDeps;

  constructor(deps: Partial<TextRecognizerDeps> = {}) {
    this.deps = {
      backend: deps.backend ?? getTesseractService(),
      preprocessor: deps.preprocessor ?? getImageNormalizer(),
      logger: deps.logger ?? defaultLogger,
    };
  }

  /**
   * Preprocesses and recognizes one page. Failures come back as an empty,
   * zero-confidence page carrying the error message.
   */
  async recognize(bitmap: PageBitmap, pageNumber: number): Promise<RecognizedPage> {
    try {
      const processed = await this.deps.preprocessor.preprocess(bitmap);
      const raw = await this.deps.backend.recognize(processed);
      const text = raw.text.trim();

      if (text.length === 0) {
        this.deps.logger.warn(`No text extracted from page ${pageNumber}. This may be a blank page or image-only content.`);
      }

      return {
        page: pageNumber,
        text,
        confidence: averageTokenConfidence(raw.tokenConfidences),
      };
    } catch (cause) {
      const error = new RecognitionError(pageNumber, cause);
      this.deps.logger.error(`Text extraction failed on page ${pageNumber}: ${error.message}`);
      return {
        page: pageNumber,
        text: '',
        confidence: 0,
        error: error.message,
      };
    }
  }
}
