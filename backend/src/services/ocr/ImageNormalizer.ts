import fs from 'fs/promises';
import sharp from 'sharp';
import type { SupportedFormat } from '@discounting/shared/schemas/invoiceTypes.zod';
import { getOcrConfig } from '../../config/ocrConfig';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { DecodeError } from './errors';
import { getImagePreprocessor, type ImagePreprocessor } from './ImagePreprocessor';
import { getPdfRenderer, type PageBitmap, type PdfRasterizer } from './PdfRenderer';

const PNG_FORMAT = 'png';

export interface ImageNormalizerDeps {
  rasterizer: PdfRasterizer;
  preprocessor: Pick<ImagePreprocessor, 'preprocess'>;
  pdfRenderDpi: number;
  logger: Logger;
}

export class ImageNormalizer {
  private readonly deps: ImageNormalizerDeps;

  constructor(deps: Partial<ImageNormalizerDeps> = {}) {
    this.deps = {
      rasterizer: deps.rasterizer ?? getPdfRenderer(),
      preprocessor: deps.preprocessor ?? getImagePreprocessor(),
      pdfRenderDpi: deps.pdfRenderDpi ?? getOcrConfig().pdfRenderDpi,
      logger: deps.logger ?? defaultLogger,
    };
  }

  /**
   * One bitmap per source page, in page order. Throws DecodeError when the
   * file cannot be rasterized or loaded.
   */
  async toPages(filePath: string, format: SupportedFormat): Promise<PageBitmap[]> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      throw new DecodeError('Failed to read file', error);
    }

    if (format === 'pdf') {
      const pages = await this.deps.rasterizer.rasterize(data, this.deps.pdfRenderDpi);
      this.deps.logger.info(`Converted PDF to ${pages.length} images`);
      return pages;
    }

    return [await this.loadImage(data)];
  }

  async loadImage(data: Buffer): Promise<PageBitmap> {
    try {
      const image = sharp(data);
      const { format, width, height } = await image.metadata();
      this.deps.logger.info(`Loaded image: ${format}, ${width}x${height}`);
      return await image.toFormat(PNG_FORMAT).toBuffer();
    } catch (error) {
      throw new DecodeError('Failed to load image', error);
    }
  }

  preprocess(page: PageBitmap): Promise<PageBitmap> {
    return this.deps.preprocessor.preprocess(page);
  }
}

let imageNormalizer: ImageNormalizer | null = null;

export function getImageNormalizer(): ImageNormalizer {
  if (!imageNormalizer) {
    imageNormalizer = new ImageNormalizer();
  }
  return imageNormalizer;
}
