import sharp from 'sharp';
import { getOcrConfig } from '../../config/ocrConfig';
import type { PageBitmap } from './PdfRenderer';

const FLATTEN_BACKGROUND = '#ffffff';

// 3x3 sharpen kernel: centre 32, neighbours -2, normalised by 16
const SHARPEN_KERNEL = {
  width: 3,
  height: 3,
  kernel: [-2, -2, -2, -2, 32, -2, -2, -2, -2],
  scale: 16,
};

export interface PreprocessOptions {
  contrastFactor: number;
  minDimension: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Target size for small scans: scaled isotropically until the smaller side
 * reaches `minDimension`. Returns null when no upscale is needed.
 */
export function computeUpscaleSize(size: Dimensions, minDimension: number): Dimensions | null {
  if (size.width >= minDimension && size.height >= minDimension) {
    return null;
  }

  const scaleFactor = Math.max(minDimension / size.width, minDimension / size.height);
  return {
    width: Math.round(size.width * scaleFactor),
    height: Math.round(size.height * scaleFactor),
  };
}

export class ImagePreprocessor {
  private readonly options: PreprocessOptions;

  constructor(options: Partial<PreprocessOptions> = {}) {
    this.options = {
      contrastFactor: options.contrastFactor ?? getOcrConfig().contrastFactor,
      minDimension: options.minDimension ?? getOcrConfig().minDimension,
    };
  }

  /**
   * grayscale -> contrast boost around the mean -> sharpen -> upscale.
   * Each step is its own sharp pass so they run in this order. Transparency
   * is flattened onto white first so the output has a single channel.
   */
  async preprocess(image: PageBitmap): Promise<PageBitmap> {
    const grayscale = await sharp(image)
      .flatten({ background: FLATTEN_BACKGROUND })
      .grayscale()
      .toColourspace('b-w')
      .png()
      .toBuffer();

    const stats = await sharp(grayscale).stats();
    const mean = stats.channels[0]?.mean ?? 0;
    const factor = this.options.contrastFactor;

    const enhanced = await sharp(grayscale)
      .linear(factor, mean * (1 - factor))
      .convolve(SHARPEN_KERNEL)
      .toColourspace('b-w')
      .png()
      .toBuffer();

    const { width, height } = await sharp(enhanced).metadata();
    if (!width || !height) {
      return enhanced;
    }

    const target = computeUpscaleSize({ width, height }, this.options.minDimension);
    if (!target) {
      return enhanced;
    }

    return sharp(enhanced)
      .resize({ width: target.width, height: target.height, fit: 'fill', kernel: sharp.kernel.lanczos3 })
      .toColourspace('b-w')
      .png()
      .toBuffer();
  }
}

let imagePreprocessor: ImagePreprocessor | null = null;

export function getImagePreprocessor(): ImagePreprocessor {
  if (!imagePreprocessor) {
    imagePreprocessor = new ImagePreprocessor();
  }
  return imagePreprocessor;
}
