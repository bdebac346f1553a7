/**
 * Sibling ordering.
 *
 * Sort orders are spaced by SORT_ORDER_STEP so a division can be slotted
 * between two siblings without renumbering the group.
 */

import type { DivisionRepository } from './repository.js';
import type { Division } from './types.js';

export const SORT_ORDER_STEP = 10;

export class OrderingEngine {
  constructor(private readonly repository: DivisionRepository) {}

  async nextSortOrder(parentId: number | null): Promise<number> {
    const highest = await this.repository.maxSortOrder(parentId);
    return (highest ?? 0) + SORT_ORDER_STEP;
  }

  /**
   * Renumber the non-deleted children of `parentId` to 10, 20, 30, ...
   * keeping their (sortOrder, name) order. Rows already in place are not
   * rewritten.
   */
  async reorderSiblings(parentId: number | null): Promise<Division[]> {
    const siblings = await this.repository.findByParent(parentId);
    const reordered: Division[] = [];

    for (const [index, sibling] of siblings.entries()) {
      const sortOrder = (index + 1) * SORT_ORDER_STEP;
      reordered.push(
        sibling.sortOrder === sortOrder
          ? sibling
          : await this.repository.update(sibling.id, { sortOrder }),
      );
    }

    return reordered;
  }
}
