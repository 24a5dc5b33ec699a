// =====================================================
// Schema Bootstrap
// =====================================================
// Applies db/schema.sql. Every statement is idempotent
// (create ... if not exists), so this is safe on every run.

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { Queryable } from './db';
import { logger } from '../utils/logger';

export const SCHEMA_PATH = resolve(__dirname, '../../db/schema.sql');

export async function applySchema(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8');

  logger.info(`[Migrate] Applying schema from ${schemaPath}`);
  await db.query(sql);
  logger.info('[Migrate] Schema is up to date');
}
