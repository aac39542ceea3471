import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { SCHEMA } from './schema.js';
import { StoreService } from '../services/store.js';

export type Db = Database.Database;

export function openDb(dbPath: string): Db {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  try {
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

/** Open a connection for one unit of work and close it afterwards. */
export async function withStore<T>(
  dbPath: string,
  fn: (store: StoreService) => T | Promise<T>
): Promise<T> {
  const db = openDb(dbPath);
  try {
    return await fn(new StoreService(db));
  } finally {
    db.close();
  }
}

/** Run `PRAGMA integrity_check` on a file without writing to it. */
export function integrityCheck(dbPath: string): string {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    const result: unknown = db.pragma('integrity_check', { simple: true });
    return String(result);
  } finally {
    db.close();
  }
}
