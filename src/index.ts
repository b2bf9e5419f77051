#!/usr/bin/env node
import 'dotenv/config'; // Load .env file into process.env
import readline from 'readline';
import chalk from 'chalk';

import { bootstrapLogger, applyLoggerConfig, log, LogLevel } from './logger';
import { loadConfig } from './configLoader';
import { openDatabase, closeDatabase } from './db';
import { MarkdownNotebook } from './notebook/MarkdownNotebook';
import { NotebookWatcher } from './notebook/NotebookWatcher';
import { TaskRepository } from './tasklist/taskRepository';
import { TASKLIST_CHANGED, TaskListService } from './tasklist/TaskListService';
import { TaskListView, ViewRow } from './tasklist/taskListView';
import { FilterCriteria, parseTextFilter } from './tasklist/queryEngine';
import { NO_DATE } from './types/task';

interface CliOptions {
  actionableOnly: boolean;
  tags: string[];
  labels: string[];
  text: string;
  rebuild: boolean;
  watch: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { actionableOnly: false, tags: [], labels: [], text: '', rebuild: false, watch: false };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--actionable':
        options.actionableOnly = true;
        break;
      case '--tag':
        if (argv[i + 1]) options.tags.push(argv[++i].replace(/^@/, ''));
        break;
      case '--label':
        if (argv[i + 1]) options.labels.push(argv[++i]);
        break;
      case '--rebuild':
        options.rebuild = true;
        break;
      case '--watch':
        options.watch = true;
        break;
      default:
        words.push(arg);
    }
  }
  options.text = words.join(' ');
  return options;
}

function formatRow(row: ViewRow, service: TaskListService): string {
  const indent = '  '.repeat(row.depth);
  let description = service.labels.stripNextLabel(row.description).replace(/\s*!+\s*/g, ' ').trim();
  if (!row.actionable) description = chalk.gray(description);

  let prio = String(row.priority);
  if (row.priority >= 3) prio = chalk.red(prio);
  else if (row.priority === 2) prio = chalk.yellow(prio);
  else if (row.priority === 1) prio = chalk.cyan(prio);

  const due = row.due === NO_DATE ? '' : ` ${chalk.bold(row.due)}`;
  return `${prio} ${indent}${description}${due} ${chalk.dim(row.documentName)}`;
}

function printTasks(view: TaskListView, service: TaskListService, criteria: FilterCriteria): void {
  view.refresh();
  for (const row of view.filter(criteria)) {
    console.log(formatRow(row, service));
  }
  const { total, byPriority } = view.statistics();
  console.log(chalk.dim(`${total} open item${total === 1 ? '' : 's'} (${byPriority.join('/')})`));
}

async function main(): Promise<void> {
  bootstrapLogger();
  const config = loadConfig();
  applyLoggerConfig(config.logging);

  const options = parseArgs(process.argv.slice(2));
  const db = openDatabase(config.notebook.dbPath);
  const notebook = MarkdownNotebook.create(db, config.notebook.root);
  const repo = TaskRepository.create(db);
  const service = new TaskListService(repo, notebook, config.tasklist);

  const { documents, removed } = await notebook.sync();
  for (const documentId of removed) {
    await service.onDocumentRemoved(documentId);
  }
  if (options.rebuild || !service.isInitialized()) {
    log(LogLevel.INFO, 'Task list not initialized, indexing the notebook');
    await service.rebuild();
  } else {
    await service.indexDocuments(documents.map((ref) => ref.id));
  }

  const view = new TaskListView(service);
  const criteria: FilterCriteria = {
    actionableOnly: options.actionableOnly,
    tagFilter: options.tags.length > 0 ? options.tags : null,
    labelFilter: options.labels.length > 0 ? options.labels : null,
    textFilter: parseTextFilter(options.text),
  };
  printTasks(view, service, criteria);

  if (!options.watch) {
    closeDatabase();
    return;
  }

  const watcher = new NotebookWatcher(notebook, service);
  watcher.start();
  service.on(TASKLIST_CHANGED, () => printTasks(view, service, criteria));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'filter> ' });
  rl.prompt();
  rl.on('line', (line) => {
    if (line.trim().toLowerCase() === 'exit') {
      rl.close();
      return;
    }
    criteria.textFilter = parseTextFilter(line);
    printTasks(view, service, criteria);
    rl.prompt();
  });
  rl.on('close', () => {
    watcher.stop()
      .then(() => {
        closeDatabase();
        log(LogLevel.INFO, 'Exiting. Goodbye!');
      })
      .catch((error: unknown) => log(LogLevel.ERROR, 'Failed to stop the notebook watcher', { error }));
  });
}

main().catch((error: unknown) => {
  log(LogLevel.ERROR, 'Fatal error', { error });
  closeDatabase();
  process.exitCode = 1;
});
