import { NO_DATE, TaskFields, TaskNode } from '../types/task';
import { extractDueDate } from './dueDate';
import { LabelMatcher } from './labels';

export interface ParseContext {
  open?: boolean;
  globalTags?: string[];
  defaultDate?: string | null;
  defaultPriority?: number | null;
  // Tasks already found at the same level, in document order
  siblings?: TaskNode[];
}

export class TaskParser {
  constructor(private readonly matcher: LabelMatcher) {}

  public parse(rawText: string, context: ParseContext = {}): TaskFields {
    const { open = true, globalTags = [], defaultDate = null, defaultPriority = null, siblings = [] } = context;

    let priority = (rawText.match(/!/g) ?? []).length;
    if (priority === 0 && defaultPriority) {
      priority = defaultPriority;
    }

    let text = rawText;
    for (const tag of globalTags) {
      if (!text.includes(tag)) {
        text += ' ' + tag;
      }
    }

    const extracted = extractDueDate(text);
    text = extracted.text;
    const due = extracted.date ?? defaultDate ?? NO_DATE;

    // Only the first open "Next:" item of a sequence is actionable
    let actionable = true;
    if (this.matcher.isNextItem(text)) {
      const previous = siblings[siblings.length - 1];
      actionable = !(previous && previous.fields.open);
    }

    return { open, actionable, priority, due, description: text };
  }
}
