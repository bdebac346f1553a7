/**
 * Read-side hierarchy queries
 */

import type { DivisionRepository } from './repository.js';
import type { Division } from './types.js';

export class HierarchyQueryEngine {
  constructor(private readonly repository: DivisionRepository) {}

  async getChildren(parentId: number, includeDeleted = false): Promise<Division[]> {
    return this.repository.findByParent(parentId, { includeDeleted });
  }

  /**
   * With a root: the root followed by all non-deleted descendants in
   * depth-first pre-order, siblings in (sortOrder, name) order. An unknown
   * root yields an empty list.
   *
   * Without a root: the top-level divisions only, not expanded.
   */
  async getHierarchyTree(rootId?: number | null): Promise<Division[]> {
    if (!rootId) {
      return this.repository.findRoots();
    }

    const root = await this.repository.find(rootId);
    if (!root) {
      return [];
    }

    const tree: Division[] = [];
    const visited = new Set<number>();
    const stack: Division[] = [root];

    for (let node = stack.pop(); node; node = stack.pop()) {
      // A looping parent chain would otherwise revisit nodes forever
      if (visited.has(node.id)) {
        continue;
      }
      visited.add(node.id);
      tree.push(node);

      const children = await this.getChildren(node.id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    return tree;
  }

  /**
   * Codes of active, non-deleted divisions in ascending order,
   * optionally limited to those starting with `prefix` (upper-cased).
   */
  async getAvailableCodes(prefix?: string): Promise<string[]> {
    const active = await this.repository.search({ activeOnly: true });
    let codes = active.map(division => division.code);

    if (prefix) {
      const normalizedPrefix = prefix.toUpperCase();
      codes = codes.filter(code => code.startsWith(normalizedPrefix));
    }

    return codes.sort();
  }
}
