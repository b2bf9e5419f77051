// Constant for an empty due date - value chosen so it sorts after every ISO date
export const NO_DATE = '9999';

// Synthetic tag matching tasks without any tag - must be lower case
export const NO_TAGS = '__no_tags__';

export type BulletKind = 'unchecked' | 'checked' | 'cancelled' | 'bullet';

export const CHECKBOX_KINDS: readonly BulletKind[] = ['unchecked', 'checked', 'cancelled'];

/**
 * One line of a flattened section: either plain text outside any list, or a
 * list entry with its bullet kind and nesting level (0 for the outer list).
 */
export type Item =
  | { kind: 'text'; text: string }
  | { kind: 'entry'; bullet: BulletKind; level: number; text: string };

export interface TaskFields {
  open: boolean;
  actionable: boolean;
  priority: number;
  due: string; // ISO date (YYYY-MM-DD) or NO_DATE
  description: string; // Original text plus appended header tags, minus a parsed date directive
}

export interface TaskNode {
  fields: TaskFields;
  children: TaskNode[];
}

export interface TaskRow extends TaskFields {
  id: number;
  source: number; // Document id
  parent: number; // 0 for top level tasks
  hasChildren: boolean;
}
