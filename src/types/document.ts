import type { Root } from 'mdast';

export interface DocumentRef {
  id: number;
  name: string; // Notebook relative path without extension, e.g. "Projects/Garden"
  parts: string[];
}

/**
 * What the task list needs from the notebook that owns the documents.
 */
export interface DocumentSource {
  getParseTree(documentId: number): Promise<Root | null>;
  lookup(documentId: number): DocumentRef | null;
  listDocuments(): DocumentRef[];
  // Due date implied by the document itself, e.g. for calendar pages
  defaultDueDate(documentId: number): string | null;
}
