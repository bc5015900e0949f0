import { describe, it, expect, vi } from 'vitest';
import { combinePages, OcrExtractor, type OcrExtractorDeps } from '../OcrExtractor';
import { TextRecognizer } from '../TextRecognizer';
import { DecodeError } from '../errors';
import type { FileCheckResult } from '../FileValidator';
import type { RecognitionBackend } from '../TesseractService';
import { silentLogger } from '../../../utils/logger';

const VALID_PDF: FileCheckResult = { valid: true, format: 'pdf', size: 1024 };

/** Each fake page bitmap holds the text the fake engine will "read" from it */
function pages(...texts: string[]): Buffer[] {
  return texts.map((text) => Buffer.from(text));
}

function fakeBackend(confidence = 90): RecognitionBackend {
  return {
    recognize: async (image) => {
      const content = image.toString();
      if (content.startsWith('FAIL')) {
        throw new Error(`engine crashed on ${content}`);
      }
      return { text: content, tokenConfidences: [confidence] };
    },
  };
}

function createExtractor(overrides: Partial<OcrExtractorDeps> = {}): OcrExtractor {
  return new OcrExtractor({
    validator: { checkFile: async () => VALID_PDF },
    normalizer: { toPages: async () => pages('page one') },
    recognizer: new TextRecognizer({
      backend: fakeBackend(),
      preprocessor: { preprocess: async (page) => page },
      logger: silentLogger,
    }),
    logger: silentLogger,
    ...overrides,
  });
}

describe('combinePages', () => {
  it('should join successful pages in page order and average their confidence', () => {
    expect(
      combinePages([
        { page: 2, text: 'second', confidence: 1 },
        { page: 1, text: 'first', confidence: 0.5 },
        { page: 3, text: '', confidence: 0, error: 'boom' },
      ])
    ).toEqual({ text: 'first\n\nsecond', confidence: 0.75, succeeded: 2 });
  });

  it('should report nothing when every page failed', () => {
    expect(combinePages([{ page: 1, text: '', confidence: 0, error: 'boom' }])).toEqual({
      text: '',
      confidence: 0,
      succeeded: 0,
    });
  });
});

describe('OcrExtractor', () => {
  describe('extractText', () => {
    it('should recognize a single image', async () => {
      const extractor = createExtractor();

      const result = await extractor.extractText('/uploads/invoice.pdf');

      expect(result.success).toBe(true);
      expect(result.text).toBe('page one');
      expect(result.confidence).toBeCloseTo(0.9);
      expect(result.pages).toBe(1);
      expect(result.errors).toEqual([]);
    });

    it('should keep the text of other pages when one page fails', async () => {
      const extractor = createExtractor({
        normalizer: { toPages: async () => pages('page one', 'FAIL two', 'page three') },
      });

      const result = await extractor.extractText('/uploads/invoice.pdf');

      expect(result.success).toBe(true);
      expect(result.text).toBe('page one\n\npage three');
      expect(result.confidence).toBeCloseTo(0.9);
      expect(result.pages).toBe(3);
      expect(result.errors).toEqual(['Page 2: engine crashed on FAIL two']);
      expect(result.page_results.map((page) => page.page)).toEqual([1, 2, 3]);
    });

    it('should keep page order when later pages finish first', async () => {
      const backend: RecognitionBackend = {
        recognize: async (image) => {
          const text = image.toString();
          // first page is the slowest
          const delay = text === 'page one' ? 30 : 1;
          await new Promise((resolve) => setTimeout(resolve, delay));
          return { text, tokenConfidences: [80] };
        },
      };
      const extractor = createExtractor({
        normalizer: { toPages: async () => pages('page one', 'page two', 'page three') },
        recognizer: new TextRecognizer({
          backend,
          preprocessor: { preprocess: async (page) => page },
          logger: silentLogger,
        }),
      });

      const result = await extractor.extractText('/uploads/invoice.pdf');

      expect(result.text).toBe('page one\n\npage two\n\npage three');
    });

    it('should stop at validation without touching the recognizer', async () => {
      const toPages = vi.fn(async () => pages('page one'));
      const recognize = vi.fn();
      const extractor = createExtractor({
        validator: { checkFile: async () => ({ valid: false, error: 'File does not exist' }) },
        normalizer: { toPages },
        recognizer: { recognize },
      });

      const result = await extractor.extractText('/uploads/missing.pdf');

      expect(result).toEqual({
        success: false,
        text: '',
        confidence: 0,
        pages: 0,
        errors: ['File does not exist'],
        page_results: [],
      });
      expect(toPages).not.toHaveBeenCalled();
      expect(recognize).not.toHaveBeenCalled();
    });

    it('should report a document that cannot be decoded', async () => {
      const extractor = createExtractor({
        normalizer: {
          toPages: async () => {
            throw new DecodeError('Failed to convert PDF', new Error('bad xref table'));
          },
        },
      });

      const result = await extractor.extractText('/uploads/broken.pdf');

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['OCR extraction failed: Failed to convert PDF: bad xref table']);
    });

    it('should fail when every page is blank', async () => {
      const extractor = createExtractor({
        normalizer: { toPages: async () => pages('', '  ') },
      });

      const result = await extractor.extractText('/uploads/blank.pdf');

      expect(result.success).toBe(false);
      expect(result.text).toBe('');
      expect(result.pages).toBe(2);
      expect(result.errors).toEqual(['No text could be extracted']);
    });

    it('should fail when every page fails', async () => {
      const extractor = createExtractor({
        normalizer: { toPages: async () => pages('FAIL one') },
      });

      const result = await extractor.extractText('/uploads/invoice.pdf');

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['Page 1: engine crashed on FAIL one', 'No text could be extracted']);
    });
  });
});
