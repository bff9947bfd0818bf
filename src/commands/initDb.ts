import path from 'path';
import { DatabaseConfig } from '../config/database.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('InitDb');

/**
 * Create tables, indexes and the hybrid_search function (idempotent)
 */
export async function initDb(schemaPath: string = path.join(process.cwd(), 'sql', 'schema.sql')): Promise<void> {
  await DatabaseConfig.applySqlFile(schemaPath);
  logger.info('Schema applied', { schemaPath });
}
