/**
 * Tagged view over a parsed YAML tree, for walks that care only about the
 * shape of each node.
 */
import { isMapping } from '../document/values.js';

export type TreeNode =
  | { kind: 'string'; value: string }
  | { kind: 'mapping'; entries: Array<[string, unknown]> }
  | { kind: 'sequence'; items: unknown[] }
  | { kind: 'other'; value: unknown };

export function toTreeNode(value: unknown): TreeNode {
  if (typeof value === 'string') return { kind: 'string', value };
  if (Array.isArray(value)) return { kind: 'sequence', items: value };
  if (isMapping(value)) return { kind: 'mapping', entries: Object.entries(value) };
  return { kind: 'other', value };
}

/**
 * Collect every string in a tree: scalar values, list entries and mapping
 * keys alike, in document order.
 */
export function collectStrings(root: unknown): string[] {
  const found: string[] = [];

  const visit = (value: unknown): void => {
    const node = toTreeNode(value);
    switch (node.kind) {
      case 'string':
        found.push(node.value);
        return;
      case 'mapping':
        for (const [key, child] of node.entries) {
          visit(key);
          visit(child);
        }
        return;
      case 'sequence':
        node.items.forEach(visit);
        return;
      case 'other':
        return;
    }
  };

  visit(root);
  return found;
}
