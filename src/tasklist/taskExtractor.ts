import type { Root } from 'mdast';
import { CHECKBOX_KINDS, Item, NO_DATE, TaskNode } from '../types/task';
import { flattenSection, splitSections } from './flattener';
import { LabelMatcher } from './labels';
import { TaskParser } from './taskParser';

export type SectionHeader =
  | { kind: 'header'; tags: string[] }
  | { kind: 'content' };

interface Frame {
  level: number;
  task: TaskNode;
}

export interface ExtractOptions {
  allCheckboxes: boolean;
  // Default due date for every task in the document, e.g. for calendar pages
  defaultDate?: string | null;
}

/**
 * Looks at the first line of a section: a label followed only by `@tags`,
 * directly above a list, declares a task list. Any other token makes it an
 * ordinary line.
 */
export function detectHeader(items: Item[], matcher: LabelMatcher): SectionHeader {
  const [first, second] = items;
  if (!first || !second || first.kind !== 'text' || second.kind !== 'entry') return { kind: 'content' };
  if (!matcher.matchLabel(first.text)) return { kind: 'content' };

  const words = first.text.replace(/^:+|:+$/g, '').split(/\s+/).filter(Boolean).slice(1);
  if (!words.every((word) => word.startsWith('@'))) return { kind: 'content' };

  return { kind: 'header', tags: words };
}

export class TaskExtractor {
  private readonly parser: TaskParser;

  constructor(
    private readonly matcher: LabelMatcher,
    private readonly options: ExtractOptions,
  ) {
    this.parser = new TaskParser(matcher);
  }

  /**
   * Extracts all tasks of a document as a forest, in document order.
   */
  public extract(tree: Root): TaskNode[] {
    const tasks: TaskNode[] = [];
    for (const section of splitSections(tree)) {
      this.extractSection(flattenSection(section), tasks);
    }
    return tasks;
  }

  /**
   * Adds the tasks of one section to `tasks`. The stack holds one frame per
   * open ancestor list level.
   */
  public extractSection(items: Item[], tasks: TaskNode[] = []): TaskNode[] {
    const defaultDate = this.options.defaultDate ?? null;
    const header = detectHeader(items, this.matcher);
    const isTaskList = header.kind === 'header';
    const globalTags = header.kind === 'header' ? header.tags : [];
    const lines = isTaskList ? items.slice(1) : items;

    let stack: Frame[] = [];
    // Level of the last non-task entry, its nested entries are pruned
    let pruneBelow: number | null = null;

    for (const item of lines) {
      if (item.kind === 'text') {
        // Normal line outside a list
        stack = [];
        pruneBelow = null;
        if (this.matcher.matchLabel(item.text)) {
          const fields = this.parser.parse(item.text, { globalTags, defaultDate, siblings: tasks });
          tasks.push({ fields, children: [] });
        }
        continue;
      }

      if (pruneBelow !== null) {
        if (item.level > pruneBelow) continue;
        pruneBelow = null;
      }

      while (stack.length > 0 && stack[stack.length - 1].level >= item.level) {
        stack.pop();
      }

      const isCheckbox = CHECKBOX_KINDS.includes(item.bullet);
      const isTask = (isCheckbox && (isTaskList || this.options.allCheckboxes))
        || this.matcher.matchLabel(item.text) !== null;
      if (!isTask) {
        pruneBelow = item.level;
        continue;
      }

      const parent = stack.length > 0 ? stack[stack.length - 1].task : null;
      const siblings = parent ? parent.children : tasks;
      // Inherit date and priority when not set explicitly on children
      let inheritedDate = defaultDate;
      let inheritedPriority: number | null = null;
      if (parent) {
        inheritedDate = parent.fields.due === NO_DATE ? defaultDate : parent.fields.due;
        inheritedPriority = parent.fields.priority;
      }

      const fields = this.parser.parse(item.text, {
        open: item.bullet !== 'checked' && item.bullet !== 'cancelled',
        globalTags,
        defaultDate: inheritedDate,
        defaultPriority: inheritedPriority,
        siblings,
      });
      const task: TaskNode = { fields, children: [] };
      siblings.push(task);
      stack.push({ level: item.level, task });
    }

    return tasks;
  }
}
