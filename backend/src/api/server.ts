import express, { Express } from 'express';
import cors from 'cors';
import { createRequestLogger } from './middleware/requestLogger';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createUpload } from './middleware/upload';
import { createOcrRoutes } from './routes/ocr';
import { createInvoiceRoutes } from './routes/invoices';
import { getOcrConfig } from '../config/ocrConfig';
import { healthCheck } from '../db/connection';
import { getFileValidator, type FileValidator } from '../services/ocr/FileValidator';
import { getInvoiceOcrAssistant, type InvoiceOcrAssistant } from '../services/invoices/InvoiceOcrAssistant';
import { getInvoiceService, type InvoiceService } from '../services/invoices/InvoiceService';
import { logger as defaultLogger, type Logger } from '../utils/logger';

const DEFAULT_FRONTEND_URL = 'http://localhost:5173';
const JSON_SIZE_LIMIT = '10mb';
const URLENCODED_SIZE_LIMIT = '10mb';
const HTTP_STATUS_OK = 200;
const HTTP_STATUS_SERVICE_UNAVAILABLE = 503;

export interface AppDeps {
  validator: Pick<FileValidator, 'validateUpload'>;
  assistant: Pick<InvoiceOcrAssistant, 'analyze'>;
  invoiceService: Pick<InvoiceService, 'create' | 'list' | 'get'>;
  /** Where OCR preview uploads wait until they are read */
  tempDir: string;
  /** Where documents attached to invoices are kept */
  uploadDir: string;
  maxFileSize: number;
  logger: Logger;
}

export function createApp(overrides: Partial<AppDeps> = {}): Express {
  const deps: AppDeps = {
    validator: overrides.validator ?? getFileValidator(),
    assistant: overrides.assistant ?? getInvoiceOcrAssistant(),
    invoiceService: overrides.invoiceService ?? getInvoiceService(),
    tempDir: overrides.tempDir ?? getOcrConfig().tempDir,
    uploadDir: overrides.uploadDir ?? getOcrConfig().uploadDir,
    maxFileSize: overrides.maxFileSize ?? getOcrConfig().maxFileSize,
    logger: overrides.logger ?? defaultLogger,
  };

  const app = express();

  app.use(
    cors({
      origin: process.env.FRONTEND_URL || DEFAULT_FRONTEND_URL,
      credentials: true,
    })
  );

  app.use(express.json({ limit: JSON_SIZE_LIMIT }));
  app.use(express.urlencoded({ extended: true, limit: URLENCODED_SIZE_LIMIT }));

  app.use(createRequestLogger(deps.logger));

  app.get(
    '/api/health',
    asyncHandler(async (req, res) => {
      const database = await healthCheck();
      res.status(database ? HTTP_STATUS_OK : HTTP_STATUS_SERVICE_UNAVAILABLE).json({
        status: database ? 'ok' : 'degraded',
        database,
        timestamp: new Date().toISOString(),
      });
    })
  );

  app.use(
    '/api/ocr',
    createOcrRoutes({
      upload: createUpload({ destination: deps.tempDir, maxFileSize: deps.maxFileSize }),
      validator: deps.validator,
      assistant: deps.assistant,
      logger: deps.logger,
    })
  );

  app.use(
    '/api/invoices',
    createInvoiceRoutes({
      upload: createUpload({ destination: deps.uploadDir, maxFileSize: deps.maxFileSize }),
      service: deps.invoiceService,
      logger: deps.logger,
    })
  );

  app.use(notFoundHandler);

  app.use(errorHandler);

  return app;
}
