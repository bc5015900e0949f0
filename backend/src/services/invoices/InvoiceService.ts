import path from 'path';
import {
  InvoiceDraftSchema,
  type ConfidenceScores,
  type InvoiceRecord,
  type InvoiceStatus,
  type InvoiceSubmission,
} from '@discounting/shared/schemas/invoiceTypes.zod';
import { getInvoiceRepository } from '../../db/SqliteInvoiceRepository';
import { DuplicateInvoiceError, type InvoiceRepository } from '../../models/Invoice';
import { removeFileQuietly } from '../../utils/files';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { TimeoutError } from '../../utils/withTimeout';
import { mergeOcrFields, type FieldSource, type SubmissionField } from '../extraction/ocrMerge';
import { getTypeCoercionService, type TypeCoercionService } from '../extraction/TypeCoercionService';
import { getFileValidator, type FileValidator, type UploadedFileInfo } from '../ocr/FileValidator';
import { buildWarnings, getInvoiceOcrAssistant, type InvoiceOcrAssistant } from './InvoiceOcrAssistant';

export interface OcrAssistSummary {
  extraction_success: boolean;
  ocr_confidence: number;
  confidence_scores: ConfidenceScores | null;
  sources: Record<SubmissionField, FieldSource>;
  warnings: string[];
}

export interface CreateInvoiceResult {
  invoice: InvoiceRecord;
  ocr: OcrAssistSummary | null;
}

export interface InvoiceServiceDeps {
  repository: InvoiceRepository;
  validator: Pick<FileValidator, 'validateUpload'>;
  assistant: Pick<InvoiceOcrAssistant, 'analyze'>;
  coercion: TypeCoercionService;
  logger: Logger;
  today: () => string;
}

function isoToday(): string {
  return new Date().toISOString().slice(0, 10);
}

interface OcrOutcome {
  fields: InvoiceSubmission;
  summary: OcrAssistSummary;
  extractionErrors: string[];
}

export class InvoiceService {
  private readonly deps: InvoiceServiceDeps;

  constructor(deps: Partial<InvoiceServiceDeps> = {}) {
    this.deps = {
      repository: deps.repository ?? getInvoiceRepository(),
      validator: deps.validator ?? getFileValidator(),
      assistant: deps.assistant ?? getInvoiceOcrAssistant(),
      coercion: deps.coercion ?? getTypeCoercionService(),
      logger: deps.logger ?? defaultLogger,
      today: deps.today ?? isoToday,
    };
  }

  /**
   * Creates a pending invoice from user fields, filling blanks from the
   * attached document when there is one. The document is kept on success and
   * removed on any failure.
   */
  async create(submission: InvoiceSubmission, document?: UploadedFileInfo): Promise<CreateInvoiceResult> {
    try {
      return await this.createInvoice(submission, document);
    } catch (err) {
      if (document) {
        await removeFileQuietly(document.path, this.deps.logger);
      }
      throw err;
    }
  }

  list(status?: InvoiceStatus): Promise<InvoiceRecord[]> {
    return this.deps.repository.findAll({ status });
  }

  get(id: number): Promise<InvoiceRecord | null> {
    return this.deps.repository.findById(id);
  }

  private async createInvoice(submission: InvoiceSubmission, document?: UploadedFileInfo): Promise<CreateInvoiceResult> {
    const { coercion, repository, logger } = this.deps;

    let fields = submission;
    let ocr: OcrOutcome | null = null;
    if (document) {
      await this.deps.validator.validateUpload(document);
      ocr = await this.assist(submission, document);
      fields = ocr.fields;
    }

    const draft = InvoiceDraftSchema.parse({
      invoice_number: fields.invoice_number,
      amount: fields.amount ? coercion.parseAmount(fields.amount) ?? fields.amount : undefined,
      invoice_date: fields.invoice_date
        ? coercion.parseDate(fields.invoice_date) ?? fields.invoice_date
        : this.deps.today(),
      due_date: fields.due_date ? coercion.parseDate(fields.due_date) ?? fields.due_date : undefined,
      supplier_kra_pin: fields.supplier_kra_pin ?? null,
      buyer_kra_pin: fields.buyer_kra_pin ?? null,
      buyer_name: fields.buyer_name ?? null,
      seller_name: fields.seller_name ?? null,
    });

    // The repository raises DuplicateInvoiceError too, for creates that race past this check
    const existing = await repository.findByInvoiceNumber(draft.invoice_number);
    if (existing) {
      throw new DuplicateInvoiceError(draft.invoice_number);
    }

    const invoice = await repository.create({
      ...draft,
      extraction_success: ocr?.summary.extraction_success ?? false,
      ocr_confidence: ocr?.summary.ocr_confidence ?? null,
      extraction_errors: ocr?.extractionErrors ?? [],
      invoice_document: document ? path.basename(document.path) : null,
    });

    logger.info(`Invoice ${invoice.id} created (${invoice.invoice_number})`);
    return { invoice, ocr: ocr?.summary ?? null };
  }

  /**
   * OCR problems never block creation; they are recorded and the user's own
   * fields carry on.
   */
  private async assist(submission: InvoiceSubmission, document: UploadedFileInfo): Promise<OcrOutcome> {
    const { logger } = this.deps;

    try {
      const analysis = await this.deps.assistant.analyze(document.path);
      const merged = mergeOcrFields(submission, analysis.invoice);
      const extractionErrors = [...analysis.text.errors, ...(analysis.invoice?.extraction_errors ?? [])];

      return {
        fields: merged.fields,
        extractionErrors,
        summary: {
          extraction_success: analysis.invoice?.extraction_success ?? false,
          ocr_confidence: analysis.text.confidence,
          confidence_scores: analysis.invoice?.confidence_scores ?? null,
          sources: merged.sources,
          warnings: buildWarnings(analysis),
        },
      };
    } catch (err) {
      if (!(err instanceof TimeoutError)) {
        throw err;
      }

      logger.warn(`OCR skipped for ${document.originalName}: ${err.message}`);
      const merged = mergeOcrFields(submission, null);
      return {
        fields: merged.fields,
        extractionErrors: [err.message],
        summary: {
          extraction_success: false,
          ocr_confidence: 0,
          confidence_scores: null,
          sources: merged.sources,
          warnings: [err.message],
        },
      };
    }
  }
}

let invoiceService: InvoiceService | null = null;

export function getInvoiceService(): InvoiceService {
  if (!invoiceService) {
    invoiceService = new InvoiceService();
  }
  return invoiceService;
}
