import { describe, it, expect, vi } from 'vitest';
import type { TextExtractionResult } from '@discounting/shared/schemas/invoiceTypes.zod';
import { buildWarnings, InvoiceOcrAssistant } from '../InvoiceOcrAssistant';
import type { OcrExtractor } from '../../ocr/OcrExtractor';
import type { EtimsInvoiceParser } from '../../extraction/EtimsInvoiceParser';
import { TimeoutError } from '../../../utils/withTimeout';
import { silentLogger } from '../../../utils/logger';
import { buildInvoiceResult, buildTextResult } from './fixtures';

function createAssistant(
  extractText: OcrExtractor['extractText'],
  parseInvoice: EtimsInvoiceParser['parseInvoice'],
  timeoutMs = 0
): InvoiceOcrAssistant {
  return new InvoiceOcrAssistant({
    extractor: { extractText },
    parser: { parseInvoice },
    timeoutMs,
    logger: silentLogger,
  });
}

describe('InvoiceOcrAssistant', () => {
  it('should parse the recognized text', async () => {
    const text = buildTextResult();
    const invoice = buildInvoiceResult();
    const parseInvoice = vi.fn<EtimsInvoiceParser['parseInvoice']>().mockReturnValue(invoice);
    const assistant = createAssistant(async () => text, parseInvoice);

    const analysis = await assistant.analyze('/tmp/invoice.pdf');

    expect(analysis).toEqual({ text, invoice });
    expect(parseInvoice).toHaveBeenCalledWith(text.text);
  });

  it('should skip parsing when no text was recognized', async () => {
    const text = buildTextResult({
      success: false,
      text: '',
      confidence: 0,
      errors: ['No text could be extracted'],
    });
    const parseInvoice = vi.fn<EtimsInvoiceParser['parseInvoice']>();
    const assistant = createAssistant(async () => text, parseInvoice);

    const analysis = await assistant.analyze('/tmp/blank.png');

    expect(analysis.invoice).toBeNull();
    expect(parseInvoice).not.toHaveBeenCalled();
  });

  it('should give up when OCR runs past the time limit', async () => {
    const assistant = createAssistant(
      () => new Promise<TextExtractionResult>(() => {}),
      vi.fn<EtimsInvoiceParser['parseInvoice']>(),
      10
    );

    await expect(assistant.analyze('/tmp/slow.pdf')).rejects.toBeInstanceOf(TimeoutError);
  });
});

describe('buildWarnings', () => {
  it('should list missing optional fields before OCR and parsing errors', () => {
    const warnings = buildWarnings({
      text: buildTextResult({ errors: ['Page 2: engine crashed'] }),
      invoice: buildInvoiceResult({
        due_date: null,
        extraction_errors: ['Error parsing invoice: boom'],
      }),
    });

    expect(warnings).toEqual([
      'due_date could not be extracted',
      'buyer_kra_pin could not be extracted',
      'Page 2: engine crashed',
      'Error parsing invoice: boom',
    ]);
  });

  it('should only report OCR errors when nothing was parsed', () => {
    const warnings = buildWarnings({
      text: buildTextResult({ success: false, errors: ['Failed to convert PDF: bad XRef'] }),
      invoice: null,
    });

    expect(warnings).toEqual(['Failed to convert PDF: bad XRef']);
  });
});
