import { DocumentRef } from '../types/document';
import { TaskRow } from '../types/task';
import { LabelMatcher } from './labels';
import { FilterCriteria, FilterableTask, QueryEngine } from './queryEngine';
import { TagCount, TagIndex } from './tagIndex';
import type { TaskListService } from './TaskListService';

export interface ViewRow extends FilterableTask {
  tags: string[];
  label: string | null;
  depth: number;
  document: DocumentRef;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface TaskStatistics {
  total: number;
  byPriority: number[]; // Highest priority first, down to priority 0
}

function uniqueCaseInsensitive(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = value.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * The open tasks of all documents as a tree, with the tag and label counts
 * that go with it. Call `refresh()` after the task list changed.
 */
export class TaskListView {
  private rows: ViewRow[] = [];
  private tagIndex = new TagIndex();
  private labelIndex = new Map<string, number>();

  constructor(private readonly service: TaskListService) {}

  public refresh(): void {
    this.rows = [];
    this.tagIndex.clear();
    this.labelIndex.clear();
    this.appendTasks(null, 0, new Map());
  }

  private appendTasks(parent: TaskRow | null, depth: number, documentCache: Map<number, DocumentRef>): void {
    const rows: Array<{ row: TaskRow; document: DocumentRef }> = [];
    for (const row of this.service.listTasks(parent)) {
      let document = documentCache.get(row.source);
      if (!document) {
        // Stale rows of documents that are gone are left out
        document = this.service.getDocumentOf(row) ?? undefined;
        if (!document) continue;
        documentCache.set(row.source, document);
      }
      rows.push({ row, document });
    }

    rows.sort((a, b) => (a.document.name < b.document.name ? -1 : a.document.name > b.document.name ? 1 : 0));

    const matcher = this.service.labels;
    const { tagByDocument } = this.service.getPreferences();
    for (const { row, document } of rows) {
      if (!row.open) continue; // Only open tasks are listed

      const label = matcher.matchLabel(row.description);
      if (label !== null) {
        this.labelIndex.set(label, (this.labelIndex.get(label) ?? 0) + 1);
      }

      let tags = LabelMatcher.findTags(row.description);
      if (tagByDocument) tags = tags.concat(document.parts);
      tags = uniqueCaseInsensitive(tags);

      if (tags.length > 0) {
        for (const tag of tags) this.tagIndex.add(tag);
      } else {
        this.tagIndex.addUntagged();
      }

      this.rows.push({ ...row, documentName: document.name, tags, label, depth, document });

      if (row.hasChildren) {
        this.appendTasks(row, depth + 1, documentCache);
      }
    }
  }

  /** All rows of the view in tree order. */
  public all(): ViewRow[] {
    return [...this.rows];
  }

  /** The visible rows for the criteria, in tree order. */
  public filter(criteria: FilterCriteria): ViewRow[] {
    const engine = new QueryEngine(this.service.labels);
    const visible = engine.filterVisible(this.rows, criteria);
    return this.rows.filter((row) => visible.has(row.id));
  }

  public openCount(): number {
    return this.rows.length;
  }

  public tagCounts(): TagCount[] {
    return this.tagIndex.entries();
  }

  public untaggedCount(): number {
    return this.tagIndex.untagged;
  }

  /** Labels in use, in the configured order; the next label is left out. */
  public labelCounts(): LabelCount[] {
    const matcher = this.service.labels;
    return matcher.labels
      .filter((label) => label !== matcher.nextLabel && this.labelIndex.has(label))
      .map((label) => ({ label, count: this.labelIndex.get(label) ?? 0 }));
  }

  public statistics(): TaskStatistics {
    const counts = new Map<number, number>();
    for (const row of this.rows) {
      counts.set(row.priority, (counts.get(row.priority) ?? 0) + 1);
    }
    if (counts.size === 0) return { total: 0, byPriority: [] };

    const highest = Math.max(...counts.keys());
    const byPriority: number[] = [];
    for (let prio = highest; prio >= 0; prio--) {
      byPriority.push(counts.get(prio) ?? 0);
    }
    return { total: this.rows.length, byPriority };
  }
}
