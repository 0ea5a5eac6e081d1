import * as fs from 'fs';
import * as path from 'path';
import { DataSource, DataSourceOptions } from 'typeorm';
import { ConversationEntity, CounterEntity } from './entities';

export type SqliteDataSourceOptions = Extract<
  DataSourceOptions,
  { type: 'better-sqlite3' }
>;

export const DEFAULT_DB_PATH = 'db_data/whatsapp_data.db';
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * TypeORM configuration for ConvoTrack (SQLite through better-sqlite3)
 *
 * The journal runs in WAL mode so readers do not block the writer, and the
 * busy timeout bounds how long a statement waits on a locked database.
 */
export const createTypeORMConfig = (
  options: Partial<SqliteDataSourceOptions> = {},
): SqliteDataSourceOptions => {
  const defaultConfig: SqliteDataSourceOptions = {
    type: 'better-sqlite3',
    database: process.env.DB_PATH || DEFAULT_DB_PATH,
    entities: [ConversationEntity, CounterEntity],
    synchronize: true,
    logging: process.env.DB_LOGGING === 'true',
    timeout: parseInt(
      process.env.DB_BUSY_TIMEOUT_MS || String(DEFAULT_BUSY_TIMEOUT_MS),
      10,
    ),
    prepareDatabase: (db) => {
      db.pragma('journal_mode = WAL');
    },
  };

  return {
    ...defaultConfig,
    ...options,
    type: 'better-sqlite3',
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<SqliteDataSourceOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};

/**
 * SQLite creates the database file but not its directory
 */
export const ensureDatabaseDirectory = (database: string): void => {
  if (database === ':memory:' || database === '') {
    return;
  }
  fs.mkdirSync(path.dirname(database), { recursive: true });
};
