import { FSWatcher, watch } from 'chokidar';
import { log, LogLevel } from '../logger';
import type { TaskListService } from '../tasklist/TaskListService';
import { MarkdownNotebook } from './MarkdownNotebook';

const DEBOUNCE_MS = 500;

/**
 * Watches the notebook directory and feeds changed and removed documents to
 * the task list service.
 */
export class NotebookWatcher {
  private watcher: FSWatcher | null = null;
  private queue: Set<string> = new Set();
  private processing = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly notebook: MarkdownNotebook,
    private readonly service: TaskListService,
  ) {}

  public start(): void {
    log(LogLevel.INFO, `Watching notebook ${this.notebook.root}`);

    this.watcher = watch(this.notebook.root, {
      ignored: /(^|[\/\\])\..|node_modules/, // ignore dotfiles
      persistent: true,
      ignoreInitial: true,
    });

    this.watcher
      .on('add', (filePath: string) => this.enqueue(filePath))
      .on('change', (filePath: string) => this.enqueue(filePath))
      .on('unlink', (filePath: string) => {
        this.handleDelete(filePath).catch((error: unknown) => {
          log(LogLevel.ERROR, `Failed to remove tasks of ${filePath}`, { error });
        });
      })
      .on('error', (error: unknown) => log(LogLevel.ERROR, 'Notebook watcher error', { error }));
  }

  public async stop(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  private enqueue(filePath: string): void {
    if (!filePath.endsWith('.md')) return;

    this.queue.add(filePath);
    this.scheduleProcess();
  }

  private async handleDelete(filePath: string): Promise<void> {
    this.queue.delete(filePath);
    const documentId = this.notebook.forget(filePath);
    if (documentId === null) return;

    const found = await this.service.onDocumentRemoved(documentId);
    log(LogLevel.INFO, `Document deleted: ${filePath}${found ? '' : ' (no tasks found)'}`);
  }

  private scheduleProcess(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.processQueue().catch((error: unknown) => {
        log(LogLevel.ERROR, 'Failed to process notebook changes', { error });
      });
    }, DEBOUNCE_MS);
  }

  private async processQueue(): Promise<void> {
    if (this.processing || this.queue.size === 0) return;

    this.processing = true;
    const batch = Array.from(this.queue);
    this.queue.clear();

    log(LogLevel.DEBUG, `Processing batch of ${batch.length} documents`);

    for (const filePath of batch) {
      try {
        const ref = this.notebook.register(filePath);
        if (!ref) continue;
        await this.service.onDocumentIndexed(ref.id);
      } catch (error) {
        log(LogLevel.ERROR, `Failed to index ${filePath}`, { error });
      }
    }

    this.processing = false;

    // If more came in
    if (this.queue.size > 0) {
      this.scheduleProcess();
    }
  }
}
