import type { Content, List, ListItem, Root } from 'mdast';
import type { Node, Parent } from 'unist';
import type { BulletKind, Item } from '../types/task';

/**
 * A run of top-level paragraphs and lists with no blank line between them.
 * This is the block that a task-list header applies to.
 */
export interface Section {
  type: 'section';
  children: Content[];
}

const CANCELLED_BOX = /^\[[-~]\]\s+/;

function isParent(node: Node): node is Parent {
  return 'children' in node && Array.isArray(node.children);
}

function isTextLiteral(node: Node): node is Node & { value: string } {
  return 'value' in node && typeof node.value === 'string';
}

// A trailing newline does not produce an empty last line
function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Groups the top-level blocks of a document into sections. Any block that is
 * not a paragraph or a list (headings, code, quotes, ...) ends the section.
 */
export function splitSections(root: Root): Section[] {
  const sections: Section[] = [];
  let current: Content[] = [];
  let lastLine = -1;

  const close = () => {
    if (current.length > 0) sections.push({ type: 'section', children: current });
    current = [];
  };

  for (const node of root.children) {
    if (node.type !== 'paragraph' && node.type !== 'list') {
      close();
      lastLine = -1;
      continue;
    }
    const start = node.position?.start.line;
    if (current.length > 0 && (start === undefined || start !== lastLine + 1)) {
      close();
    }
    current.push(node);
    lastLine = node.position?.end.line ?? -1;
  }
  close();

  return sections;
}

/** Flattens everything below a node to plain text, skipping struck-out text. */
export function flattenText(node: Node): string {
  if (node.type === 'delete') return '';
  if (node.type === 'break') return '\n';
  if (isTextLiteral(node)) return node.value;
  if (isParent(node)) return node.children.map(flattenText).join('');
  return '';
}

function bulletOf(item: ListItem, text: string): { bullet: BulletKind; text: string } {
  if (item.checked === true) return { bullet: 'checked', text };
  if (item.checked === false) return { bullet: 'unchecked', text };
  if (CANCELLED_BOX.test(text)) return { bullet: 'cancelled', text: text.replace(CANCELLED_BOX, '') };
  return { bullet: 'bullet', text };
}

function flattenList(list: List, level = 0): Item[] {
  const items: Item[] = [];
  for (const node of list.children) {
    const own = node.children
      .filter((child) => child.type !== 'list')
      .map(flattenText)
      .join(' ');
    const { bullet, text } = bulletOf(node, own);
    items.push({ kind: 'entry', bullet, level, text });

    for (const child of node.children) {
      if (child.type === 'list') items.push(...flattenList(child, level + 1));
    }
  }
  return items;
}

/**
 * Returns a mix of plain lines and list entries, in document order.
 */
export function flattenSection(section: Section): Item[] {
  const items: Item[] = [];
  let text = '';

  const flush = () => {
    for (const line of splitLines(text)) items.push({ kind: 'text', text: line });
    text = '';
  };

  for (const child of section.children) {
    if (child.type === 'list') {
      flush();
      items.push(...flattenList(child));
    } else if (child.type === 'paragraph') {
      if (text && !text.endsWith('\n')) text += '\n';
      text += flattenText(child) + '\n';
    }
  }
  flush();

  return items;
}
