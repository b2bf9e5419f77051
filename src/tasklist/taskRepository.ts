import Database from 'better-sqlite3';
import { z } from 'zod';
import { TaskNode, TaskRow } from '../types/task';
import { log, LogLevel } from '../logger';

export const TASKLIST_FORMAT = '0.5';
const FORMAT_PROPERTY = 'tasklist_format';

const TaskRowSchema = z.object({
  id: z.number().int(),
  source: z.number().int(),
  parent: z.number().int(),
  haschildren: z.coerce.boolean(),
  open: z.coerce.boolean(),
  actionable: z.coerce.boolean(),
  prio: z.number().int(),
  due: z.string(),
  description: z.string(),
}).transform((row): TaskRow => ({
  id: row.id,
  source: row.source,
  parent: row.parent,
  hasChildren: row.haschildren,
  open: row.open,
  actionable: row.actionable,
  priority: row.prio,
  due: row.due,
  description: row.description,
}));

const PropertyRowSchema = z.object({ value: z.string() });

export interface ReplaceResult {
  removed: number;
  inserted: number;
}

/**
 * Task rows of all documents as an adjacency list. Every document's forest is
 * replaced in a single transaction, so readers never see half a document.
 */
export class TaskRepository {
  private db: Database.Database;
  private initialized = false;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  public static create(db: Database.Database): TaskRepository {
    db.exec(`
      CREATE TABLE IF NOT EXISTS properties (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
    const repo = new TaskRepository(db);
    repo.initialized = repo.getProperty(FORMAT_PROPERTY) === TASKLIST_FORMAT;
    return repo;
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Creates the task table. Existing rows of an older format are dropped.
   */
  public initialize(): void {
    const initialize = this.db.transaction(() => {
      this.db.exec('DROP TABLE IF EXISTS tasklist');
      this.db.exec(`
        CREATE TABLE tasklist (
          id INTEGER PRIMARY KEY,
          source INTEGER NOT NULL,
          parent INTEGER NOT NULL DEFAULT 0,
          haschildren INTEGER NOT NULL,
          open INTEGER NOT NULL,
          actionable INTEGER NOT NULL,
          prio INTEGER NOT NULL,
          due TEXT NOT NULL,
          description TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_tasklist_parent ON tasklist(parent);
        CREATE INDEX IF NOT EXISTS idx_tasklist_source ON tasklist(source);
      `);
      this.setProperty(FORMAT_PROPERTY, TASKLIST_FORMAT);
    });
    initialize();
    this.initialized = true;
    log(LogLevel.INFO, `Task table initialized (format ${TASKLIST_FORMAT})`);
  }

  public drop(): void {
    const drop = this.db.transaction(() => {
      this.db.exec('DROP TABLE IF EXISTS tasklist');
      this.db.prepare('DELETE FROM properties WHERE key = ?').run(FORMAT_PROPERTY);
    });
    drop();
    this.initialized = false;
    log(LogLevel.INFO, 'Task table dropped');
  }

  /**
   * Removes all rows of the document and inserts the new forest depth first.
   * On failure the transaction rolls back and the previous rows stay.
   */
  public replace(documentId: number, forest: TaskNode[]): ReplaceResult {
    if (!this.initialized) return { removed: 0, inserted: 0 };

    const insert = this.db.prepare(`
      INSERT INTO tasklist (source, parent, haschildren, open, actionable, prio, due, description)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertChildren = (parentId: number, children: TaskNode[]): number => {
      let count = 0;
      for (const { fields, children: grandchildren } of children) {
        const result = insert.run(
          documentId,
          parentId,
          grandchildren.length > 0 ? 1 : 0,
          fields.open ? 1 : 0,
          fields.actionable ? 1 : 0,
          fields.priority,
          fields.due,
          fields.description,
        );
        count += 1;
        if (grandchildren.length > 0) {
          count += insertChildren(Number(result.lastInsertRowid), grandchildren);
        }
      }
      return count;
    };

    const replace = this.db.transaction((): ReplaceResult => {
      const removed = this.db.prepare('DELETE FROM tasklist WHERE source = ?').run(documentId).changes;
      const inserted = insertChildren(0, forest);
      return { removed, inserted };
    });

    return replace();
  }

  public removeDocument(documentId: number): boolean {
    if (!this.initialized) return false;
    const info = this.db.prepare('DELETE FROM tasklist WHERE source = ?').run(documentId);
    return info.changes > 0;
  }

  /** Tasks directly below `parentId` in document order; 0 lists top level tasks. */
  public childrenOf(parentId = 0): TaskRow[] {
    if (!this.initialized) return [];
    const rows = this.db.prepare('SELECT * FROM tasklist WHERE parent = ? ORDER BY id').all(parentId);
    return rows.map((row) => TaskRowSchema.parse(row));
  }

  public get(taskId: number): TaskRow | undefined {
    if (!this.initialized) return undefined;
    const row = this.db.prepare('SELECT * FROM tasklist WHERE id = ?').get(taskId);
    return row === undefined ? undefined : TaskRowSchema.parse(row);
  }

  public all(): TaskRow[] {
    if (!this.initialized) return [];
    const rows = this.db.prepare('SELECT * FROM tasklist ORDER BY id').all();
    return rows.map((row) => TaskRowSchema.parse(row));
  }

  public documentRows(documentId: number): TaskRow[] {
    if (!this.initialized) return [];
    const rows = this.db.prepare('SELECT * FROM tasklist WHERE source = ? ORDER BY id').all(documentId);
    return rows.map((row) => TaskRowSchema.parse(row));
  }

  private getProperty(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM properties WHERE key = ?').get(key);
    return row === undefined ? null : PropertyRowSchema.parse(row).value;
  }

  private setProperty(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO properties (key, value) VALUES (?, ?)').run(key, value);
  }
}
