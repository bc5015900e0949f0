import Tesseract from 'tesseract.js';
import { getOcrConfig } from '../../config/ocrConfig';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import type { PageBitmap } from './PdfRenderer';

const TESSERACT_OEM = Tesseract.OEM.LSTM_ONLY;
const TESSERACT_PSM = Tesseract.PSM.SINGLE_BLOCK;
const OCR_RECOGNIZE_JOB = 'recognize';
const OCR_STATUS_RECOGNIZING = 'recognizing text';
const PROGRESS_PERCENT = 100;

/** What any OCR backend hands back for one image */
export interface RawRecognition {
  text: string;
  /** Per-word confidences on a 0-100 scale; -1 means "not available" */
  tokenConfidences: number[];
}

export interface RecognitionBackend {
  recognize(image: PageBitmap): Promise<RawRecognition>;
  terminate?(): Promise<void>;
}

function createOcrLogger(logger: Logger) {
  return (m: Tesseract.LoggerMessage) => {
    if (m.status === OCR_STATUS_RECOGNIZING) {
      logger.debug(`OCR Progress: ${Math.round(m.progress * PROGRESS_PERCENT)}%`);
    }
  };
}

export class TesseractService implements RecognitionBackend {
  private scheduler: Tesseract.Scheduler | null = null;
  private initializing: Promise<Tesseract.Scheduler> | null = null;

  constructor(
    private readonly workerCount: number = getOcrConfig().workerCount,
    private readonly language: string = getOcrConfig().tesseractLang,
    private readonly logger: Logger = defaultLogger
  ) {}

  async initialize(): Promise<Tesseract.Scheduler> {
    if (this.scheduler) {
      return this.scheduler;
    }

    if (!this.initializing) {
      this.initializing = this.createScheduler().finally(() => {
        this.initializing = null;
      });
    }

    return this.initializing;
  }

  private async createScheduler(): Promise<Tesseract.Scheduler> {
    const scheduler = Tesseract.createScheduler();

    try {
      for (let i = 0; i < this.workerCount; i++) {
        const worker = await Tesseract.createWorker(this.language, TESSERACT_OEM, {
          logger: createOcrLogger(this.logger),
        });
        // Owned by the scheduler from here on, so a later failure still terminates it
        scheduler.addWorker(worker);
        await worker.setParameters({ tessedit_pageseg_mode: TESSERACT_PSM });
      }
    } catch (error) {
      this.logger.error('Tesseract initialization failed, terminating started workers');
      await scheduler.terminate().catch((terminateError: unknown) => {
        this.logger.warn('Could not terminate Tesseract workers:', terminateError);
      });
      throw error;
    }

    this.logger.info(`Tesseract initialized with ${this.workerCount} workers (${this.language})`);
    this.scheduler = scheduler;
    return scheduler;
  }

  async recognize(image: PageBitmap): Promise<RawRecognition> {
    if (!image || image.length === 0) {
      throw new Error('Invalid image buffer: buffer is empty');
    }

    const scheduler = await this.initialize();
    const startTime = Date.now();
    const result = await scheduler.addJob(OCR_RECOGNIZE_JOB, image);
    this.logger.debug(`OCR job completed in ${Date.now() - startTime}ms`);

    if (!result || !result.data) {
      throw new Error('OCR failed: no data returned');
    }

    return {
      text: result.data.text ?? '',
      tokenConfidences: (result.data.words ?? []).map((word) => word.confidence),
    };
  }

  async terminate(): Promise<void> {
    if (this.scheduler) {
      await this.scheduler.terminate();
      this.scheduler = null;
      this.logger.info('Tesseract scheduler terminated');
    }
  }
}

let tesseractService: TesseractService | null = null;

export function getTesseractService(): TesseractService {
  if (!tesseractService) {
    tesseractService = new TesseractService();
  }
  return tesseractService;
}
