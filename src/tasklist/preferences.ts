import { z } from 'zod';

export const TaskListPreferencesSchema = z.object({
  allCheckboxes: z.boolean().default(true),
  labels: z.array(z.string().trim().min(1)).default(['FIXME', 'TODO']),
  nextLabel: z.string().trim().default('Next:'),
  tagByDocument: z.boolean().default(false),
  deadlineByDocument: z.boolean().default(false),
  includedSubtrees: z.array(z.string().trim().min(1)).default([]),
  excludedSubtrees: z.array(z.string().trim().min(1)).default([]),
});

export type TaskListPreferences = z.infer<typeof TaskListPreferencesSchema>;

export const DEFAULT_PREFERENCES: TaskListPreferences = TaskListPreferencesSchema.parse({});

// Rebuild the task table if any of these change, leave it alone for the others
const REBUILD_ON: ReadonlyArray<keyof TaskListPreferences> = [
  'allCheckboxes',
  'labels',
  'nextLabel',
  'deadlineByDocument',
  'includedSubtrees',
  'excludedSubtrees',
];

export function rebuildKey(prefs: TaskListPreferences): string {
  return JSON.stringify(REBUILD_ON.map((key) => prefs[key]));
}

export function requiresRebuild(previous: TaskListPreferences, next: TaskListPreferences): boolean {
  return rebuildKey(previous) !== rebuildKey(next);
}

/**
 * Decides whether a document takes part in the task list. With no included
 * subtrees every document does, minus the excluded ones.
 */
export function isDocumentIncluded(name: string, prefs: TaskListPreferences): boolean {
  if (prefs.includedSubtrees.length > 0 && !prefs.includedSubtrees.some((prefix) => name.startsWith(prefix))) {
    return false;
  }
  return !prefs.excludedSubtrees.some((prefix) => name.startsWith(prefix));
}
