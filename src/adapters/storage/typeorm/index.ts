/**
 * TypeORM Storage Adapter for SQLite
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  ensureDatabaseDirectory,
  DEFAULT_DB_PATH,
  DEFAULT_BUSY_TIMEOUT_MS,
} from './typeorm.config';
export type { SqliteDataSourceOptions } from './typeorm.config';
export * from './entities';
