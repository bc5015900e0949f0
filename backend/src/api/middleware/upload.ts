import fs from 'fs/promises';
import path from 'path';
import multer from 'multer';

const RANDOM_SUFFIX_RANGE = 1e9;

export interface UploadOptions {
  destination: string;
  maxFileSize: number;
}

function uniqueFileName(originalName: string): string {
  const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * RANDOM_SUFFIX_RANGE);
  return `${uniqueSuffix}-${path.basename(originalName)}`;
}

/**
 * Multer instance that writes uploads to `destination`. Format checks are
 * left to FileValidator so every rejection carries the same messages.
 */
export function createUpload(options: UploadOptions): multer.Multer {
  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      fs.mkdir(options.destination, { recursive: true })
        .then(() => cb(null, options.destination))
        .catch((err: Error) => cb(err, options.destination));
    },
    filename: (req, file, cb) => {
      cb(null, uniqueFileName(file.originalname));
    },
  });

  return multer({
    storage,
    limits: {
      fileSize: options.maxFileSize,
    },
  });
}
