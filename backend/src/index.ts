import * as dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { createApp } from './api/server';
import { getOcrConfig } from './config/ocrConfig';
import { initDatabase, healthCheck, closeDatabase } from './db/connection';
import { ensureSchema } from './db/init';
import { getTesseractService } from './services/ocr/TesseractService';
import { logger } from './utils/logger';

dotenv.config();

const DEFAULT_PORT = 3000;
const DEFAULT_DATABASE_PATH = '../data/db.sqlite';
const DEFAULT_NODE_ENV = 'development';
const SHUTDOWN_TIMEOUT_MS = 10000;
const EXIT_SUCCESS = 0;
const EXIT_ERROR = 1;

const PORT = Number(process.env.PORT) || DEFAULT_PORT;
const DATABASE_PATH = process.env.DATABASE_PATH || DEFAULT_DATABASE_PATH;
const NODE_ENV = process.env.NODE_ENV || DEFAULT_NODE_ENV;

const backendDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

function buildServerUrls(port: number): { base: string; api: string; health: string } {
  const base = `http://localhost:${port}`;
  return {
    base,
    api: `${base}/api`,
    health: `${base}/api/health`,
  };
}

async function start(): Promise<void> {
  try {
    logger.log(`Starting server in ${NODE_ENV} mode...`);

    // Fail fast on bad OCR settings before accepting uploads
    const ocrConfig = getOcrConfig();
    logger.log(`OCR: ${ocrConfig.workerCount} workers, ${ocrConfig.pdfRenderDpi} DPI, formats ${ocrConfig.supportedFormats.join(', ')}`);

    logger.log('Connecting to database...');
    await initDatabase({
      path: path.resolve(backendDir, DATABASE_PATH),
      verbose: NODE_ENV === DEFAULT_NODE_ENV,
    });

    const isHealthy = await healthCheck();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }
    logger.log('Database connected and healthy');

    await ensureSchema();
    logger.log('Database schema initialized successfully');

    const app = createApp();

    const server = app.listen(PORT, () => {
      const urls = buildServerUrls(PORT);
      logger.log(`Server running on ${urls.base}`);
      logger.log(`API available at ${urls.api}`);
      logger.log(`Health check: ${urls.health}`);
    });

    const closeResources = async (): Promise<void> => {
      await getTesseractService().terminate();
      await closeDatabase();
    };

    const shutdown = (signal: string) => {
      logger.log(`\n${signal} received. Shutting down gracefully...`);

      server.close(() => {
        logger.log('HTTP server closed');

        closeResources()
          .then(() => process.exit(EXIT_SUCCESS))
          .catch((err) => {
            logger.error('Error releasing resources:', err);
            process.exit(EXIT_ERROR);
          });
      });

      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(EXIT_ERROR);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (err) {
    logger.error('Failed to start server:', err);
    process.exit(EXIT_ERROR);
  }
}

void start();
