import sqlite3 from 'sqlite3';
import path from 'path';
import { logger as defaultLogger, type Logger } from '../utils/logger';

const IN_MEMORY_PATH = ':memory:';
const ENABLE_FOREIGN_KEYS_PRAGMA = 'PRAGMA foreign_keys = ON';
const HEALTH_CHECK_QUERY = 'SELECT 1 as result';
const HEALTH_CHECK_EXPECTED_VALUE = 1;

let db: sqlite3.Database | null = null;
let dbLogger: Logger = defaultLogger;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
  logger?: Logger;
}

export async function initDatabase(config: DatabaseConfig): Promise<sqlite3.Database> {
  if (db) {
    return db;
  }

  dbLogger = config.logger ?? defaultLogger;
  const sqlite = config.verbose ? sqlite3.verbose() : sqlite3;
  const dbPath = config.path === IN_MEMORY_PATH ? IN_MEMORY_PATH : path.resolve(config.path);

  const database = await new Promise<sqlite3.Database>((resolve, reject) => {
    const opened = new sqlite.Database(dbPath, (err) => {
      if (err) {
        dbLogger.error('Failed to connect to database:', err);
        reject(err);
      } else {
        resolve(opened);
      }
    });
  });

  db = database;
  dbLogger.log(`Connected to SQLite database at ${dbPath}`);
  await run(ENABLE_FOREIGN_KEYS_PRAGMA);

  return database;
}

export function getDatabase(): sqlite3.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!db) {
      resolve();
      return;
    }

    db.close((err) => {
      if (err) {
        reject(err);
      } else {
        db = null;
        dbLogger.log('Database connection closed');
        resolve();
      }
    });
  });
}

export function run(
  sql: string,
  params: unknown[] = []
): Promise<{ lastID: number; changes: number }> {
  return new Promise((resolve, reject) => {
    getDatabase().run(sql, params, function (err) {
      if (err) {
        reject(err);
      } else {
        resolve({ lastID: this.lastID, changes: this.changes });
      }
    });
  });
}

export function exec(sql: string): Promise<void> {
  return new Promise((resolve, reject) => {
    getDatabase().exec(sql, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

export function get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    const database = getDatabase();
    database.get(sql, params, (err, row) => {
      if (err) {
        reject(err);
      } else {
        resolve(row as T | undefined);
      }
    });
  });
}

export function all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    const database = getDatabase();
    database.all(sql, params, (err, rows) => {
      if (err) {
        reject(err);
      } else {
        resolve(rows as T[]);
      }
    });
  });
}

export async function healthCheck(): Promise<boolean> {
  try {
    const result = await get<{ result: number }>(HEALTH_CHECK_QUERY);
    return result?.result === HEALTH_CHECK_EXPECTED_VALUE;
  } catch (err) {
    dbLogger.error('Database health check failed:', err);
    return false;
  }
}
