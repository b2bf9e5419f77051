import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { log, LogLevel } from './logger';

let dbInstance: Database.Database | null = null;

export function openDatabase(dbPath: string): Database.Database {
  if (dbInstance) return dbInstance;

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  log(LogLevel.INFO, `Opening task database at ${dbPath}`);
  try {
    dbInstance = new Database(dbPath);
    dbInstance.pragma('journal_mode = WAL');
    return dbInstance;
  } catch (error) {
    log(LogLevel.ERROR, `Failed to open task database: ${error}`);
    throw error;
  }
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
    log(LogLevel.INFO, 'Task database closed');
  }
}
