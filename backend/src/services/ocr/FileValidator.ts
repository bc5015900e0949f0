import fs from 'fs/promises';
import path from 'path';
import type { SupportedFormat } from '@discounting/shared/schemas/invoiceTypes.zod';
import { getOcrConfig } from '../../config/ocrConfig';
import { InputValidationError } from './errors';

const BYTES_PER_MEGABYTE = 1024 * 1024;
const HEADER_BYTES = 1024;
const UNDETERMINED_MIME_TYPES = ['', 'application/octet-stream'];

const MIME_TYPE_BY_FORMAT: Record<SupportedFormat, string> = {
  pdf: 'application/pdf',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
};

const MAGIC_BYTES: Record<SupportedFormat, { signature: Buffer; label: string }> = {
  pdf: { signature: Buffer.from('%PDF', 'ascii'), label: 'a valid PDF' },
  jpg: { signature: Buffer.from([0xff, 0xd8, 0xff]), label: 'a valid JPEG image' },
  jpeg: { signature: Buffer.from([0xff, 0xd8, 0xff]), label: 'a valid JPEG image' },
  png: { signature: Buffer.from([0x89, 0x50, 0x4e, 0x47]), label: 'a valid PNG image' },
};

export type FileCheckResult =
  | { valid: true; format: SupportedFormat; size: number }
  | { valid: false; error: string };

export interface UploadedFileInfo {
  originalName: string;
  mimeType?: string;
  size: number;
  path: string;
}

export interface FileValidatorOptions {
  supportedFormats: SupportedFormat[];
  maxFileSize: number;
}

function toMegabytes(bytes: number): number {
  return bytes / BYTES_PER_MEGABYTE;
}

export function getExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase().replace(/^\./, '');
}

async function readHeader(filePath: string): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export class FileValidator {
  private readonly options: FileValidatorOptions;

  constructor(options: Partial<FileValidatorOptions> = {}) {
    this.options = {
      supportedFormats: options.supportedFormats ?? getOcrConfig().supportedFormats,
      maxFileSize: options.maxFileSize ?? getOcrConfig().maxFileSize,
    };
  }

  get maxFileSize(): number {
    return this.options.maxFileSize;
  }

  resolveFormat(fileName: string): SupportedFormat | null {
    const extension = getExtension(fileName);
    return this.options.supportedFormats.find((format) => format === extension) ?? null;
  }

  /**
   * Pre-flight check for a file already on disk. Never throws; the reason is
   * returned so the caller can report it without starting OCR.
   */
  async checkFile(filePath: string): Promise<FileCheckResult> {
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return { valid: false, error: 'File does not exist' };
      }
      size = stats.size;
    } catch {
      return { valid: false, error: 'File does not exist' };
    }

    const format = this.resolveFormat(filePath);
    if (!format) {
      return {
        valid: false,
        error: `Unsupported format. Supported formats: ${this.options.supportedFormats.join(', ')}`,
      };
    }

    if (size > this.options.maxFileSize) {
      return {
        valid: false,
        error: `File size exceeds maximum allowed size (${toMegabytes(this.options.maxFileSize).toFixed(1)} MB)`,
      };
    }

    try {
      this.validateContent(format, size, await readHeader(filePath));
    } catch (error) {
      if (error instanceof InputValidationError) {
        return { valid: false, error: error.message };
      }
      throw error;
    }

    return { valid: true, format, size };
  }

  /**
   * Full validation of an upload: extension, declared MIME type, size and
   * magic bytes. Throws InputValidationError on the first failure.
   */
  async validateUpload(file: UploadedFileInfo): Promise<SupportedFormat> {
    const format = this.validateFileType(file.originalName, file.mimeType);
    this.validateFileSize(file.size);

    let header: Buffer;
    try {
      header = await readHeader(file.path);
    } catch (error) {
      throw new InputValidationError(
        `File validation failed: ${error instanceof Error ? error.message : 'file is unreadable'}`
      );
    }

    this.validateContent(format, file.size, header);
    return format;
  }

  validateFileType(fileName: string, mimeType?: string): SupportedFormat {
    const extension = getExtension(fileName);
    const format = this.resolveFormat(fileName);

    if (!format) {
      throw new InputValidationError(
        `Unsupported file format '.${extension}'. Supported formats: ${this.options.supportedFormats.join(', ')}`
      );
    }

    const declared = (mimeType ?? '').toLowerCase();
    const expected = MIME_TYPE_BY_FORMAT[format];
    if (!UNDETERMINED_MIME_TYPES.includes(declared) && declared !== expected) {
      throw new InputValidationError(
        `File MIME type '${declared}' does not match extension '.${extension}'`
      );
    }

    return format;
  }

  validateFileSize(size: number): void {
    if (size > this.options.maxFileSize) {
      throw new InputValidationError(
        `File size (${toMegabytes(size).toFixed(2)} MB) exceeds maximum allowed size (${toMegabytes(this.options.maxFileSize).toFixed(1)} MB)`
      );
    }
  }

  validateContent(format: SupportedFormat, size: number, header: Buffer): void {
    if (size === 0 || header.length === 0) {
      throw new InputValidationError('File is empty');
    }

    const { signature, label } = MAGIC_BYTES[format];
    if (header.length < signature.length || !header.subarray(0, signature.length).equals(signature)) {
      throw new InputValidationError(`File does not appear to be ${label}`);
    }
  }
}

let fileValidator: FileValidator | null = null;

export function getFileValidator(): FileValidator {
  if (!fileValidator) {
    fileValidator = new FileValidator();
  }
  return fileValidator;
}
