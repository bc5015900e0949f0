import { Router } from 'express';
import type multer from 'multer';
import { asyncHandler } from '../middleware/errorHandler';
import { buildWarnings, type InvoiceAnalysis, type InvoiceOcrAssistant } from '../../services/invoices/InvoiceOcrAssistant';
import type { FileValidator } from '../../services/ocr/FileValidator';
import { removeFileQuietly } from '../../utils/files';
import type { Logger } from '../../utils/logger';

const HTTP_STATUS_BAD_REQUEST = 400;
const HTTP_STATUS_UNPROCESSABLE_ENTITY = 422;
const UPLOAD_FIELD_NAME = 'file';

export interface OcrRouteDeps {
  upload: multer.Multer;
  validator: Pick<FileValidator, 'validateUpload'>;
  assistant: Pick<InvoiceOcrAssistant, 'analyze'>;
  logger: Logger;
}

/**
 * OCR preview: reads an invoice document and returns what could be extracted
 * so the supplier can confirm it before submitting. Nothing is stored.
 */
export function createOcrRoutes(deps: OcrRouteDeps): Router {
  const router = Router();

  router.post(
    '/preview',
    deps.upload.single(UPLOAD_FIELD_NAME),
    asyncHandler(async (req, res) => {
      if (!req.file) {
        return res.status(HTTP_STATUS_BAD_REQUEST).json({ error: 'No file uploaded' });
      }

      const file = req.file;
      deps.logger.log(`Processing OCR preview: ${file.originalname} (${file.size} bytes)`);

      let analysis: InvoiceAnalysis;
      try {
        await deps.validator.validateUpload({
          originalName: file.originalname,
          mimeType: file.mimetype,
          size: file.size,
          path: file.path,
        });

        analysis = await deps.assistant.analyze(file.path);
      } finally {
        await removeFileQuietly(file.path, deps.logger);
      }

      if (!analysis.invoice) {
        return res.status(HTTP_STATUS_UNPROCESSABLE_ENTITY).json({
          error: 'Text extraction failed',
          errors: analysis.text.errors,
          pages: analysis.text.pages,
        });
      }

      res.json({
        ...analysis.invoice,
        ocr_confidence: analysis.text.confidence,
        pages: analysis.text.pages,
        warnings: buildWarnings(analysis),
      });
    })
  );

  return router;
}
