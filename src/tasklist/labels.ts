import type { TaskListPreferences } from './preferences';

const WORD_CHAR = '[\\p{L}\\p{N}_]';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regexes derived from the configured labels. The next label is part of the
 * label set so "Next: do this" does not need an extra "TODO".
 */
export class LabelMatcher {
  readonly labels: string[];
  readonly nextLabel: string | null;
  private readonly labelRegex: RegExp | null;
  private readonly nextLabelRegex: RegExp | null;

  // `@tag` not preceded by a non-space character
  static readonly tagRegex = new RegExp(`(?<!\\S)@(${WORD_CHAR}+)`, 'gu');

  constructor(labels: string[], nextLabel?: string | null) {
    this.labels = [...labels];
    if (nextLabel) {
      this.nextLabel = nextLabel;
      this.nextLabelRegex = new RegExp(`^${escapeRegExp(nextLabel)}:?\\s+`, 'u');
      this.labels.push(nextLabel);
    } else {
      this.nextLabel = null;
      this.nextLabelRegex = null;
    }

    this.labelRegex = this.labels.length > 0
      ? new RegExp(`^(${this.labels.map(escapeRegExp).join('|')})(?!${WORD_CHAR})`, 'u')
      : null;
  }

  static fromPreferences(prefs: TaskListPreferences): LabelMatcher {
    return new LabelMatcher(prefs.labels, prefs.nextLabel);
  }

  get hasLabels(): boolean {
    return this.labelRegex !== null;
  }

  /** Returns the label the text starts with, or null. */
  matchLabel(text: string): string | null {
    const match = this.labelRegex?.exec(text);
    return match ? match[1] : null;
  }

  isNextItem(text: string): boolean {
    return this.nextLabelRegex !== null && this.nextLabelRegex.test(text);
  }

  /** Text with the leading next label removed, for display. */
  stripNextLabel(text: string): string {
    return this.nextLabelRegex ? text.replace(this.nextLabelRegex, '') : text;
  }

  static findTags(text: string): string[] {
    return Array.from(text.matchAll(LabelMatcher.tagRegex), (match) => match[1]);
  }
}
