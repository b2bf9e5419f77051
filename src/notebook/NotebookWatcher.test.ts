import Database from 'better-sqlite3';
import { FSWatcher, watch } from 'chokidar';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { log, LogLevel } from '../logger';
import { TASKLIST_CHANGED, TaskListService } from '../tasklist/TaskListService';
import { TaskRepository } from '../tasklist/taskRepository';
import { MarkdownNotebook } from './MarkdownNotebook';
import { NotebookWatcher } from './NotebookWatcher';

jest.mock('chokidar', () => {
  const actual = jest.requireActual<typeof import('chokidar')>('chokidar');
  return { ...actual, watch: jest.fn() };
});
jest.mock('../logger');

describe('NotebookWatcher', () => {
  let root: string;
  let db: Database.Database;
  let notebook: MarkdownNotebook;
  let repo: TaskRepository;
  let service: TaskListService;
  let fsWatcher: FSWatcher;
  let watcher: NotebookWatcher;

  const write = (name: string, content: string): string => {
    const file = path.join(root, name);
    fs.writeFileSync(file, content);
    return file;
  };

  const nextChange = (): Promise<void> =>
    new Promise((resolve) => {
      service.once(TASKLIST_CHANGED, () => resolve());
    });

  const descriptions = (): string[] => repo.all().map((row) => row.description);

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });

    root = fs.mkdtempSync(path.join(os.tmpdir(), 'watched-'));
    db = new Database(':memory:');
    notebook = MarkdownNotebook.create(db, root);
    repo = TaskRepository.create(db);
    service = new TaskListService(repo, notebook);
    await service.rebuild();

    // A watcher on nothing; the tests emit its events
    fsWatcher = new FSWatcher({ persistent: false });
    jest.mocked(watch).mockReturnValue(fsWatcher);
    watcher = new NotebookWatcher(notebook, service);
    watcher.start();
  });

  afterEach(async () => {
    await watcher.stop();
    jest.useRealTimers();
    db.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should watch the notebook root', () => {
    expect(watch).toHaveBeenCalledWith(notebook.root, expect.objectContaining({ ignoreInitial: true }));
  });

  it('should index a changed document after the debounce delay', async () => {
    const indexed = jest.spyOn(service, 'onDocumentIndexed');
    const file = write('Inbox.md', 'TODO call the bank\n');
    const changed = nextChange();

    fsWatcher.emit('add', file);
    fsWatcher.emit('change', file);
    jest.advanceTimersByTime(499);
    expect(indexed).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await changed;

    expect(indexed).toHaveBeenCalledTimes(1);
    expect(descriptions()).toEqual(['TODO call the bank']);
  });

  it('should ignore files that are not markdown', () => {
    const indexed = jest.spyOn(service, 'onDocumentIndexed');

    fsWatcher.emit('add', write('notes.txt', 'TODO not a document\n'));
    jest.advanceTimersByTime(500);

    expect(indexed).not.toHaveBeenCalled();
  });

  it('should forget a deleted document and remove its tasks', async () => {
    const file = write('Inbox.md', 'TODO call the bank\n');
    let changed = nextChange();
    fsWatcher.emit('add', file);
    jest.advanceTimersByTime(500);
    await changed;

    fs.unlinkSync(file);
    changed = nextChange();
    fsWatcher.emit('unlink', file);
    await changed;

    expect(descriptions()).toEqual([]);
    expect(notebook.findByPath('Inbox.md')).toBeNull();
  });

  it('should go on with the batch when a document fails', async () => {
    // Reading a directory fails with EISDIR
    const broken = path.join(root, 'broken.md');
    fs.mkdirSync(broken);
    const good = write('Good.md', 'TODO still indexed\n');
    const changed = nextChange();

    fsWatcher.emit('add', broken);
    fsWatcher.emit('add', good);
    jest.advanceTimersByTime(500);
    await changed;

    expect(descriptions()).toEqual(['TODO still indexed']);
    expect(log).toHaveBeenCalledWith(LogLevel.ERROR, `Failed to index ${broken}`, expect.anything());
  });
});
