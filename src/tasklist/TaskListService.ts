import { EventEmitter } from 'events';
import { DocumentRef, DocumentSource } from '../types/document';
import { TaskRow } from '../types/task';
import { log, LogLevel } from '../logger';
import { LabelMatcher } from './labels';
import {
  DEFAULT_PREFERENCES,
  TaskListPreferences,
  isDocumentIncluded,
  requiresRebuild,
} from './preferences';
import { TaskExtractor } from './taskExtractor';
import { ReplaceResult, TaskRepository } from './taskRepository';

export const TASKLIST_CHANGED = 'tasklist-changed';

const NOTHING_CHANGED: ReplaceResult = { removed: 0, inserted: 0 };

export interface IndexSummary {
  inserted: number;
  // Documents that could not be read or stored
  failed: number[];
}

/**
 * Keeps the task table in line with the documents: every time a document is
 * (re)indexed its tasks are extracted again and replace the old ones.
 * Emits `tasklist-changed` after every change of the table.
 */
export class TaskListService extends EventEmitter {
  private preferences: TaskListPreferences;
  private matcher: LabelMatcher;
  private documentLocks = new Map<number, Promise<void>>();

  constructor(
    private readonly repo: TaskRepository,
    private readonly documents: DocumentSource,
    preferences: TaskListPreferences = DEFAULT_PREFERENCES,
  ) {
    super();
    this.preferences = preferences;
    this.matcher = LabelMatcher.fromPreferences(preferences);
  }

  public get labels(): LabelMatcher {
    return this.matcher;
  }

  public getPreferences(): TaskListPreferences {
    return this.preferences;
  }

  public isInitialized(): boolean {
    return this.repo.isInitialized();
  }

  /**
   * Operations on the same document run one after the other, operations on
   * different documents do not wait for each other.
   */
  private withDocumentLock<T>(documentId: number, operation: () => Promise<T>): Promise<T> {
    const previous = this.documentLocks.get(documentId) ?? Promise.resolve();
    const resultPromise = previous.then(operation);

    const tail: Promise<void> = resultPromise
      .then(() => undefined, () => undefined)
      .then(() => {
        if (this.documentLocks.get(documentId) === tail) this.documentLocks.delete(documentId);
      });
    this.documentLocks.set(documentId, tail);

    return resultPromise;
  }

  private notify(result: ReplaceResult): void {
    if (result.removed > 0 || result.inserted > 0) {
      this.emit(TASKLIST_CHANGED);
    }
  }

  public indexDocument(documentId: number): Promise<ReplaceResult> {
    return this.withDocumentLock(documentId, async () => {
      if (!this.repo.isInitialized()) return NOTHING_CHANGED;

      const ref = this.documents.lookup(documentId);
      if (!ref || !isDocumentIncluded(ref.name, this.preferences)) {
        const result = this.repo.replace(documentId, []);
        this.notify(result);
        return result;
      }

      const tree = await this.documents.getParseTree(documentId);
      if (!tree) {
        const result = this.repo.replace(documentId, []);
        this.notify(result);
        return result;
      }

      const defaultDate = this.preferences.deadlineByDocument ? this.documents.defaultDueDate(documentId) : null;
      const extractor = new TaskExtractor(this.matcher, {
        allCheckboxes: this.preferences.allCheckboxes,
        defaultDate,
      });
      const forest = extractor.extract(tree);

      let result: ReplaceResult;
      try {
        result = this.repo.replace(documentId, forest);
      } catch (error) {
        log(LogLevel.ERROR, `TaskList: Failed to store tasks of ${ref.name}`, { error });
        throw error;
      }

      log(LogLevel.DEBUG, `TaskList: ${ref.name}: removed ${result.removed}, inserted ${result.inserted} tasks`);
      this.notify(result);
      return result;
    });
  }

  public onDocumentIndexed(documentId: number): Promise<ReplaceResult> {
    return this.indexDocument(documentId);
  }

  /** Removes the tasks of a document; resolves false when it had none. */
  public onDocumentRemoved(documentId: number): Promise<boolean> {
    return this.withDocumentLock(documentId, async () => {
      const found = this.repo.removeDocument(documentId);
      if (found) this.emit(TASKLIST_CHANGED);
      return found;
    });
  }

  /** Top level tasks, or the children of `parent`. */
  public listTasks(parent?: TaskRow | null): TaskRow[] {
    return this.repo.childrenOf(parent ? parent.id : 0);
  }

  public getTask(taskId: number): TaskRow | undefined {
    return this.repo.get(taskId);
  }

  public getDocumentOf(task: TaskRow): DocumentRef | null {
    return this.documents.lookup(task.source);
  }

  /**
   * Applies new preferences. When they change how tasks are extracted the
   * task table is dropped and true is returned: a rebuild is needed.
   */
  public setPreferences(preferences: TaskListPreferences): boolean {
    const rebuild = requiresRebuild(this.preferences, preferences);
    this.preferences = preferences;
    this.matcher = LabelMatcher.fromPreferences(preferences);
    if (rebuild && this.repo.isInitialized()) {
      this.repo.drop();
      this.emit(TASKLIST_CHANGED);
    }
    return rebuild;
  }

  /**
   * Indexes the documents one after the other. A document that fails is
   * logged and skipped, the others are still indexed.
   */
  public async indexDocuments(documentIds: number[]): Promise<IndexSummary> {
    const summary: IndexSummary = { inserted: 0, failed: [] };
    for (const documentId of documentIds) {
      try {
        const result = await this.indexDocument(documentId);
        summary.inserted += result.inserted;
      } catch (error) {
        const name = this.documents.lookup(documentId)?.name ?? `#${documentId}`;
        log(LogLevel.ERROR, `TaskList: Failed to index ${name}`, { error });
        summary.failed.push(documentId);
      }
    }
    return summary;
  }

  /** Creates a fresh task table and indexes every document. */
  public async rebuild(): Promise<IndexSummary> {
    this.repo.initialize();
    const summary = await this.indexDocuments(this.documents.listDocuments().map((ref) => ref.id));
    log(LogLevel.INFO, `TaskList: Rebuilt task table with ${summary.inserted} tasks, ${summary.failed.length} documents failed`);
    this.emit(TASKLIST_CHANGED);
    return summary;
  }
}
