import os from 'os';
import path from 'path';
import { z } from 'zod';
import { SupportedFormatEnum, type SupportedFormat } from '@discounting/shared/schemas/invoiceTypes.zod';

const BYTES_PER_MEGABYTE = 1024 * 1024;
const DEFAULT_MAX_FILE_SIZE_MB = 10;
const DEFAULT_SUPPORTED_FORMATS = 'pdf,jpg,jpeg,png';
const DEFAULT_TESSERACT_LANG = 'eng';
const DEFAULT_WORKER_COUNT = 2;
const DEFAULT_PDF_RENDER_DPI = 300;
const DEFAULT_MIN_DIMENSION = 1000;
const DEFAULT_CONTRAST_FACTOR = 2;
const DEFAULT_TIMEOUT_MS = 0;
const DEFAULT_UPLOAD_DIR = 'uploads';
const TEMP_DIR_NAME = 'invoice-ocr';

const formatListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((format) => format.trim().toLowerCase())
      .filter((format) => format.length > 0)
  )
  .pipe(z.array(SupportedFormatEnum).min(1));

const OcrEnvSchema = z.object({
  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(DEFAULT_MAX_FILE_SIZE_MB),
  OCR_SUPPORTED_FORMATS: formatListSchema.default(DEFAULT_SUPPORTED_FORMATS),
  TESSERACT_LANG: z.string().min(1).default(DEFAULT_TESSERACT_LANG),
  OCR_WORKER_COUNT: z.coerce.number().int().min(1).default(DEFAULT_WORKER_COUNT),
  PDF_RENDER_DPI: z.coerce.number().int().min(72).max(1200).default(DEFAULT_PDF_RENDER_DPI),
  OCR_MIN_DIMENSION: z.coerce.number().int().positive().default(DEFAULT_MIN_DIMENSION),
  OCR_CONTRAST_FACTOR: z.coerce.number().positive().default(DEFAULT_CONTRAST_FACTOR),
  OCR_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_TIMEOUT_MS),
  UPLOAD_DIR: z.string().min(1).default(DEFAULT_UPLOAD_DIR),
  TEMP_DIR: z.string().optional(),
});

export interface OcrConfig {
  maxFileSize: number;
  supportedFormats: SupportedFormat[];
  tesseractLang: string;
  workerCount: number;
  pdfRenderDpi: number;
  minDimension: number;
  contrastFactor: number;
  /** 0 disables the timeout around text extraction */
  timeoutMs: number;
  uploadDir: string;
  tempDir: string;
}

function resolveDir(dir: string): string {
  return path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return cleaned;
}

/**
 * Reads OCR settings from the environment. Throws with every offending
 * variable listed when a value does not parse.
 */
export function loadOcrConfig(env: NodeJS.ProcessEnv = process.env): OcrConfig {
  const parsed = OcrEnvSchema.safeParse(blankToUndefined(env));

  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid OCR configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    maxFileSize: Math.round(values.MAX_FILE_SIZE_MB * BYTES_PER_MEGABYTE),
    supportedFormats: values.OCR_SUPPORTED_FORMATS,
    tesseractLang: values.TESSERACT_LANG,
    workerCount: values.OCR_WORKER_COUNT,
    pdfRenderDpi: values.PDF_RENDER_DPI,
    minDimension: values.OCR_MIN_DIMENSION,
    contrastFactor: values.OCR_CONTRAST_FACTOR,
    timeoutMs: values.OCR_TIMEOUT_MS,
    uploadDir: resolveDir(values.UPLOAD_DIR),
    tempDir: values.TEMP_DIR ? resolveDir(values.TEMP_DIR) : path.join(os.tmpdir(), TEMP_DIR_NAME),
  };
}

let ocrConfig: OcrConfig | null = null;

export function getOcrConfig(): OcrConfig {
  if (!ocrConfig) {
    ocrConfig = loadOcrConfig();
  }
  return ocrConfig;
}
