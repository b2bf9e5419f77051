import { NO_TAGS, TaskRow } from '../types/task';
import { LabelMatcher } from './labels';

export interface TextFilter {
  negated: boolean;
  needle: string; // lower case
}

export interface FilterCriteria {
  actionableOnly: boolean;
  tagFilter?: string[] | null;
  labelFilter?: string[] | null;
  textFilter?: TextFilter | null;
}

export interface FilterableTask extends TaskRow {
  documentName: string;
  // Tags of the task; derived from the description when absent
  tags?: string[];
}

/**
 * Parses a filter string: a leading "not " negates the match, e.g.
 * "not @waiting". Empty input means no text filter.
 */
export function parseTextFilter(input: string): TextFilter | null {
  let text = input;
  if (!text.trim()) return null;

  let negated = false;
  if (text.toLowerCase().startsWith('not ')) {
    negated = true;
    text = text.slice(4);
  }
  return { negated, needle: text.trim().toLowerCase() };
}

export class QueryEngine {
  constructor(private readonly matcher: LabelMatcher) {}

  /** Visibility of a single task, ignoring its descendants. */
  public matches(task: FilterableTask, criteria: FilterCriteria): boolean {
    if (!task.open) return false;
    if (criteria.actionableOnly && !task.actionable) return false;

    const description = task.description.toLowerCase();

    const labelFilter = criteria.labelFilter?.map((label) => label.toLowerCase());
    if (labelFilter && labelFilter.length > 0) {
      const label = this.matcher.matchLabel(task.description);
      if (label === null || !labelFilter.includes(label.toLowerCase())) return false;
    }

    const tagFilter = criteria.tagFilter?.map((tag) => tag.toLowerCase());
    if (tagFilter && tagFilter.length > 0) {
      const tags = (task.tags ?? LabelMatcher.findTags(task.description)).map((tag) => tag.toLowerCase());
      const untaggedMatch = tagFilter.includes(NO_TAGS) && tags.length === 0;
      if (!untaggedMatch && !tags.some((tag) => tagFilter.includes(tag))) return false;
    }

    const textFilter = criteria.textFilter;
    if (textFilter) {
      const found = description.includes(textFilter.needle)
        || task.documentName.toLowerCase().includes(textFilter.needle);
      if (found === textFilter.negated) return false;
    }

    return true;
  }

  /**
   * Returns the ids of all visible tasks: those matching the criteria and
   * every ancestor of one, up to the top level.
   */
  public filterVisible(tasks: FilterableTask[], criteria: FilterCriteria): Set<number> {
    const parents = new Map<number, number>();
    for (const task of tasks) parents.set(task.id, task.parent);

    const visible = new Set<number>();
    for (const task of tasks) {
      if (!this.matches(task, criteria)) continue;

      let id: number | undefined = task.id;
      while (id !== undefined && parents.has(id) && !visible.has(id)) {
        visible.add(id);
        id = parents.get(id);
      }
    }
    return visible;
  }
}
