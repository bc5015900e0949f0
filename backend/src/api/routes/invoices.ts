import { Router } from 'express';
import type multer from 'multer';
import { z } from 'zod';
import {
  InvoiceStatusEnum,
  InvoiceSubmissionSchema,
} from '@discounting/shared/schemas/invoiceTypes.zod';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import type { InvoiceService } from '../../services/invoices/InvoiceService';
import type { UploadedFileInfo } from '../../services/ocr/FileValidator';
import { removeFileQuietly } from '../../utils/files';
import type { Logger } from '../../utils/logger';

const HTTP_STATUS_CREATED = 201;
const HTTP_STATUS_NOT_FOUND = 404;
const UPLOAD_FIELD_NAME = 'invoice_document';

const InvoiceIdSchema = z.coerce.number().int().positive();
const ListQuerySchema = z.object({
  status: InvoiceStatusEnum.optional(),
});

export interface InvoiceRouteDeps {
  upload: multer.Multer;
  service: Pick<InvoiceService, 'create' | 'list' | 'get'>;
  logger: Logger;
}

function toUploadedFileInfo(file: Express.Multer.File): UploadedFileInfo {
  return {
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    path: file.path,
  };
}

export function createInvoiceRoutes(deps: InvoiceRouteDeps): Router {
  const router = Router();

  router.post(
    '/',
    deps.upload.single(UPLOAD_FIELD_NAME),
    asyncHandler(async (req, res) => {
      const document = req.file ? toUploadedFileInfo(req.file) : undefined;

      const parsed = InvoiceSubmissionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        if (document) {
          await removeFileQuietly(document.path, deps.logger);
        }
        throw parsed.error;
      }

      const result = await deps.service.create(parsed.data, document);
      res.status(HTTP_STATUS_CREATED).json(result);
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { status } = ListQuerySchema.parse(req.query);
      const invoices = await deps.service.list(status);
      res.json(invoices);
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = InvoiceIdSchema.parse(req.params.id);
      const invoice = await deps.service.get(id);

      if (!invoice) {
        throw new AppError(HTTP_STATUS_NOT_FOUND, 'Invoice not found');
      }

      res.json(invoice);
    })
  );

  return router;
}
