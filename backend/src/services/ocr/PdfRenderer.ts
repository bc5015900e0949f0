import { createRequire } from 'module';
import { createCanvas, ImageData } from '@napi-rs/canvas';
import type { PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { getOcrConfig } from '../../config/ocrConfig';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { DecodeError, InputValidationError } from './errors';

const PDF_POINTS_PER_INCH = 72;
const PNG_IMAGE_FORMAT = 'image/png';
const MAX_PAGES = 100;
const FIRST_PAGE_NUMBER = 1;

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

/** Encoded (PNG/JPEG) image of one document page */
export type PageBitmap = Buffer;

export interface PdfRasterizer {
  rasterize(pdfData: Buffer, dpi: number): Promise<PageBitmap[]>;
}

let pdfjsModule: PdfJs | null = null;

async function loadPdfJs(): Promise<PdfJs> {
  if (pdfjsModule) {
    return pdfjsModule;
  }

  if (!('ImageData' in globalThis)) {
    Object.assign(globalThis, { ImageData });
  }

  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const require = createRequire(import.meta.url);
  pdfjs.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.min.mjs');
  pdfjsModule = pdfjs;
  return pdfjs;
}

export function dpiToScale(dpi: number): number {
  return dpi / PDF_POINTS_PER_INCH;
}

export class PdfRenderer implements PdfRasterizer {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async loadPdf(pdfData: Buffer): Promise<PDFDocumentProxy> {
    const pdfjs = await loadPdfJs();
    try {
      const loadingTask = pdfjs.getDocument({
        data: new Uint8Array(pdfData),
        isEvalSupported: false,
      });
      const pdf = await loadingTask.promise;
      this.logger.log(`PDF loaded: ${pdf.numPages} pages`);
      return pdf;
    } catch (error) {
      throw new DecodeError('Failed to convert PDF', error);
    }
  }

  async renderPage(pdf: PDFDocumentProxy, pageNumber: number, scale: number): Promise<PageBitmap> {
    const page = await pdf.getPage(pageNumber);
    const viewport = page.getViewport({ scale });

    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
    const context = canvas.getContext('2d');

    // pdfjs only knows the DOM context type; the napi canvas implements the same API
    await page.render({
      canvasContext: context as unknown as CanvasRenderingContext2D,
      viewport,
    }).promise;

    page.cleanup();
    return canvas.toBuffer(PNG_IMAGE_FORMAT);
  }

  /**
   * Renders every page at the given resolution, in page order.
   */
  async rasterize(pdfData: Buffer, dpi: number = getOcrConfig().pdfRenderDpi): Promise<PageBitmap[]> {
    const pdf = await this.loadPdf(pdfData);

    try {
      const pageCount = pdf.numPages;
      if (pageCount > MAX_PAGES) {
        throw new InputValidationError(`Document exceeds maximum page limit (${MAX_PAGES} pages)`);
      }

      const scale = dpiToScale(dpi);
      this.logger.log(`Rendering ${pageCount} pages at ${dpi} DPI...`);

      const bitmaps: PageBitmap[] = [];
      for (let pageNum = FIRST_PAGE_NUMBER; pageNum <= pageCount; pageNum++) {
        try {
          bitmaps.push(await this.renderPage(pdf, pageNum, scale));
        } catch (error) {
          throw new DecodeError(`Failed to render PDF page ${pageNum}`, error);
        }
        this.logger.debug(`Rendered page ${pageNum}/${pageCount}`);
      }

      return bitmaps;
    } finally {
      await pdf.destroy();
    }
  }
}

let pdfRenderer: PdfRenderer | null = null;

export function getPdfRenderer(): PdfRenderer {
  if (!pdfRenderer) {
    pdfRenderer = new PdfRenderer();
  }
  return pdfRenderer;
}
