import Database from 'better-sqlite3';
import fg from 'fast-glob';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Root } from 'mdast';
import { DocumentRef, DocumentSource } from '../types/document';
import { log, LogLevel } from '../logger';
import { deadlineFromName } from './calendar';
import { parseMarkdown } from './markdown';

const DocumentRowSchema = z.object({
  id: z.number().int(),
  path: z.string(),
});

type DocumentRow = z.infer<typeof DocumentRowSchema>;

export interface NotebookSync {
  documents: DocumentRef[];
  removed: number[];
}

function toRef(row: DocumentRow): DocumentRef {
  const name = row.path.replace(/\.md$/, '');
  return { id: row.id, name, parts: name.split('/') };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * A directory of Markdown files. Document ids are kept in the `documents`
 * table so they stay stable across runs.
 */
export class MarkdownNotebook implements DocumentSource {
  private db: Database.Database;
  readonly root: string;

  private constructor(db: Database.Database, root: string) {
    this.db = db;
    this.root = path.resolve(root);
  }

  public static create(db: Database.Database, root: string): MarkdownNotebook {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id INTEGER PRIMARY KEY,
        path TEXT NOT NULL UNIQUE
      );
    `);
    return new MarkdownNotebook(db, root);
  }

  /** Notebook relative path with forward slashes, or null outside the notebook. */
  public relativePath(filePath: string): string | null {
    const relative = path.relative(this.root, path.resolve(this.root, filePath));
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return null;
    return relative.split(path.sep).join('/');
  }

  public register(filePath: string): DocumentRef | null {
    const relative = this.relativePath(filePath);
    if (relative === null || !relative.endsWith('.md')) return null;

    this.db.prepare('INSERT OR IGNORE INTO documents (path) VALUES (?)').run(relative);
    return this.findByPath(relative);
  }

  /** Removes a document from the notebook, returning its former id. */
  public forget(filePath: string): number | null {
    const relative = this.relativePath(filePath);
    if (relative === null) return null;
    const existing = this.findByPath(relative);
    if (!existing) return null;
    this.db.prepare('DELETE FROM documents WHERE id = ?').run(existing.id);
    return existing.id;
  }

  /**
   * Registers every Markdown file below the root and forgets documents whose
   * files are gone.
   */
  public async sync(): Promise<NotebookSync> {
    const files = await fg('**/*.md', { cwd: this.root, onlyFiles: true });
    const present = new Set(files);

    const removed: number[] = [];
    for (const ref of this.listDocuments()) {
      if (!present.has(`${ref.name}.md`)) {
        this.db.prepare('DELETE FROM documents WHERE id = ?').run(ref.id);
        removed.push(ref.id);
      }
    }

    const documents: DocumentRef[] = [];
    for (const file of files.sort()) {
      const ref = this.register(path.join(this.root, file));
      if (ref) documents.push(ref);
    }
    log(LogLevel.INFO, `Notebook ${this.root}: ${documents.length} documents, ${removed.length} removed`);
    return { documents, removed };
  }

  public findByPath(relativePath: string): DocumentRef | null {
    const row = this.db.prepare('SELECT id, path FROM documents WHERE path = ?').get(relativePath);
    return row === undefined ? null : toRef(DocumentRowSchema.parse(row));
  }

  public lookup(documentId: number): DocumentRef | null {
    const row = this.db.prepare('SELECT id, path FROM documents WHERE id = ?').get(documentId);
    return row === undefined ? null : toRef(DocumentRowSchema.parse(row));
  }

  public listDocuments(): DocumentRef[] {
    const rows = this.db.prepare('SELECT id, path FROM documents ORDER BY path').all();
    return rows.map((row) => toRef(DocumentRowSchema.parse(row)));
  }

  public filePath(ref: DocumentRef): string {
    return path.join(this.root, ...ref.parts) + '.md';
  }

  public async getParseTree(documentId: number): Promise<Root | null> {
    const ref = this.lookup(documentId);
    if (!ref) return null;

    let content: string;
    try {
      content = await fs.readFile(this.filePath(ref), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        log(LogLevel.DEBUG, `Document ${ref.name} has no file anymore`);
        return null;
      }
      throw error;
    }
    return parseMarkdown(content);
  }

  public defaultDueDate(documentId: number): string | null {
    const ref = this.lookup(documentId);
    return ref ? deadlineFromName(ref.name) : null;
  }
}
