/**
 * Integrity checks that gate every division mutation.
 *
 * Each check reads through the repository it was built with and returns the
 * business error that blocks the mutation, or null. None of them write.
 */

import {
  circularReference,
  codeExists,
  hasChildren,
  HierarchyCorruptionError,
  parentNotFound,
  selfParent,
  type DivisionError,
} from './errors.js';
import type { DivisionRepository } from './repository.js';

export class IntegrityEngine {
  constructor(private readonly repository: DivisionRepository) {}

  /**
   * A code is taken when a non-deleted division other than `exceptId` holds it.
   * Expects an already normalized code.
   */
  async checkCodeAvailable(code: string, exceptId?: number): Promise<DivisionError | null> {
    const holder = await this.repository.findByCode(code);
    if (holder && holder.id !== exceptId) {
      return codeExists(code);
    }
    return null;
  }

  /** Parents may be soft-deleted; they only have to exist */
  async checkParentExists(parentId: number): Promise<DivisionError | null> {
    const parent = await this.repository.find(parentId, { includeDeleted: true });
    return parent ? null : parentNotFound(parentId);
  }

  /**
   * Validate hanging `divisionId` under `parentId` (null = root):
   * self-parent, then parent existence, then cycle.
   */
  async checkParentAssignment(divisionId: number, parentId: number | null): Promise<DivisionError | null> {
    if (parentId === divisionId) {
      return selfParent(divisionId);
    }
    if (parentId === null) {
      return null;
    }

    const missing = await this.checkParentExists(parentId);
    if (missing) {
      return missing;
    }

    if (await this.wouldCreateCycle(divisionId, parentId)) {
      return circularReference(divisionId, parentId);
    }
    return null;
  }

  /**
   * Walk up from `newParentId`; reaching `divisionId` means the move would
   * close a loop. A dangling link ends the walk like a root does.
   *
   * The walk takes at most one step per stored row. Needing more means the
   * existing data already contains a loop.
   */
  async wouldCreateCycle(divisionId: number, newParentId: number): Promise<boolean> {
    const maxSteps = await this.repository.count();
    let currentId: number | null = newParentId;
    let steps = 0;

    while (currentId !== null) {
      if (currentId === divisionId) {
        return true;
      }
      if (steps >= maxSteps) {
        throw new HierarchyCorruptionError(
          `Parent chain above division ${newParentId} does not reach a root within ${maxSteps} steps`,
          newParentId,
        );
      }
      steps += 1;

      const current = await this.repository.find(currentId, { includeDeleted: true });
      currentId = current ? current.parentId : null;
    }

    return false;
  }

  async checkDeletable(divisionId: number): Promise<DivisionError | null> {
    const childrenCount = await this.repository.countChildren(divisionId);
    return childrenCount > 0 ? hasChildren(childrenCount) : null;
  }
}
