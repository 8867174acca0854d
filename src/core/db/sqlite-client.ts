import Database from 'better-sqlite3';
import { SCHEMA } from './schema';

/**
 * Open the history database and apply the schema.
 *
 * `:memory:` gives a private throwaway database, which is what the tests use.
 */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}
