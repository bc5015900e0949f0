import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { exec } from './connection';

const SCHEMA_FILE_NAME = 'schema.sql';
const UTF8_ENCODING = 'utf8';

const schemaDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Applies db/schema.sql. Every statement is idempotent, so this runs on
 * each start.
 */
export async function ensureSchema(schemaPath: string = path.join(schemaDir, SCHEMA_FILE_NAME)): Promise<void> {
  const schemaSql = await fs.readFile(schemaPath, UTF8_ENCODING);
  await exec(schemaSql);
}
