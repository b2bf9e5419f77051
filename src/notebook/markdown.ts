import matter from 'gray-matter';
import unified from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { Root } from 'mdast';
import type { Node } from 'unist';

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm);

function isRoot(node: Node): node is Root {
  return node.type === 'root' && 'children' in node && Array.isArray(node.children);
}

/**
 * Parses a Markdown document into an mdast tree. Front matter is split off
 * first, so positions are relative to the body.
 */
export function parseMarkdown(content: string): Root {
  const { content: body } = matter(content);
  const tree = processor.parse(body);
  if (!isRoot(tree)) {
    throw new Error(`Unexpected markdown tree of type '${tree.type}'`);
  }
  return tree;
}
