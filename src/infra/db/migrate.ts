import { readFile } from 'fs/promises';
import path from 'path';
import { config } from '../../config';
import { logger } from '../logging/logger';
import { Database } from './client';

// Resolves to src/infra/db from both src/infra/db and dist/infra/db
const SCHEMA_PATH = path.resolve(__dirname, '..', '..', '..', 'src', 'infra', 'db', 'schema.sql');

export async function applySchema(db: Database, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8');
  await db.withTransaction(async (tx) => {
    await tx.query(sql);
  });
  logger.info({ schemaPath }, 'Schema applied');
}

async function main(): Promise<void> {
  const db = new Database(config.databaseUrl);
  try {
    await applySchema(db);
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error({ err }, 'Migration failed');
    process.exit(1);
  });
}
