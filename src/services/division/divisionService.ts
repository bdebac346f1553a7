/**
 * Division Service
 *
 * Entry point for every division operation. Mutations run in one repository
 * transaction that spans their validation reads and their writes; engines are
 * built per transaction on the transaction-bound repository.
 */

import type { Logger } from '../../logger.js';
import {
  codeNotFound,
  divisionNotFound,
  fail,
  notDeleted,
  ok,
  type Result,
} from './errors.js';
import { HierarchyQueryEngine } from './hierarchy.js';
import { IntegrityEngine } from './integrity.js';
import { OrderingEngine } from './ordering.js';
import type { DivisionRepository, TransactionOptions } from './repository.js';
import type {
  Division,
  DivisionChanges,
  DivisionCreateInput,
  DivisionListFilters,
  DivisionPatch,
} from './types.js';

export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_SUGGESTION_LIMIT = 10;

/**
 * Isolation for mutations that write a parent link. Of two concurrent moves
 * that together close a loop, one fails with 40001 (answered as a 409).
 */
const PARENT_CHANGE: TransactionOptions = { isolationLevel: 'serializable' };

/** Codes are compared and stored upper-cased */
export function normalizeCode(code: string): string {
  return code.toUpperCase();
}

/** 0 is accepted as an alias for "no parent" */
function normalizeParentId(parentId: number | null | undefined): number | null {
  return parentId ? parentId : null;
}

function engines(repository: DivisionRepository) {
  return {
    integrity: new IntegrityEngine(repository),
    ordering: new OrderingEngine(repository),
    hierarchy: new HierarchyQueryEngine(repository),
  };
}

export class DivisionService {
  constructor(
    private readonly repository: DivisionRepository,
    private readonly logger: Logger = console,
  ) {}

  // ===========================================================================
  // Reads
  // ===========================================================================

  async list(filters: DivisionListFilters = {}): Promise<Division[]> {
    return this.repository.search({
      includeDeleted: filters.includeDeleted ?? false,
      activeOnly: filters.activeOnly ?? true,
      query: filters.search,
      skip: filters.skip ?? 0,
      limit: filters.limit ?? DEFAULT_PAGE_SIZE,
    });
  }

  /** Same filters as list, without pagination */
  async listAll(filters: Omit<DivisionListFilters, 'skip' | 'limit'> = {}): Promise<Division[]> {
    return this.repository.search({
      includeDeleted: filters.includeDeleted ?? false,
      activeOnly: filters.activeOnly ?? true,
      query: filters.search,
    });
  }

  async getById(id: number, includeDeleted = false): Promise<Result<Division>> {
    const division = await this.repository.find(id, { includeDeleted });
    return division ? ok(division) : fail(divisionNotFound(id));
  }

  async getByCode(code: string, includeDeleted = false): Promise<Result<Division>> {
    const division = await this.repository.findByCode(normalizeCode(code), { includeDeleted });
    return division ? ok(division) : fail(codeNotFound(code));
  }

  /** Autocomplete: active, non-deleted matches, first page only */
  async suggest(query: string, limit = DEFAULT_SUGGESTION_LIMIT): Promise<Division[]> {
    return this.repository.search({
      query,
      activeOnly: true,
      includeDeleted: false,
      skip: 0,
      limit,
    });
  }

  /** Direct children of an existing division */
  async getChildren(parentId: number, includeDeleted = false): Promise<Result<Division[]>> {
    const parent = await this.repository.find(parentId, { includeDeleted });
    if (!parent) {
      return fail(divisionNotFound(parentId));
    }
    return ok(await engines(this.repository).hierarchy.getChildren(parentId, includeDeleted));
  }

  async getHierarchyTree(rootId?: number | null): Promise<Division[]> {
    return engines(this.repository).hierarchy.getHierarchyTree(rootId);
  }

  async getAvailableCodes(prefix?: string): Promise<string[]> {
    return engines(this.repository).hierarchy.getAvailableCodes(prefix);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async create(input: DivisionCreateInput): Promise<Result<Division>> {
    const result = await this.repository.transaction(async (repository) => {
      const { integrity, ordering } = engines(repository);
      const code = normalizeCode(input.code);
      const parentId = normalizeParentId(input.parentId);

      const codeTaken = await integrity.checkCodeAvailable(code);
      if (codeTaken) {
        return fail(codeTaken);
      }

      if (parentId !== null) {
        const missingParent = await integrity.checkParentExists(parentId);
        if (missingParent) {
          return fail(missingParent);
        }
      }

      const sortOrder = input.sortOrder ? input.sortOrder : await ordering.nextSortOrder(parentId);

      return ok(await repository.insert({
        code,
        name: input.name,
        shortName: input.shortName ?? null,
        parentId,
        sortOrder,
        isInternal: input.isInternal ?? false,
        isActive: input.isActive ?? true,
      }));
    });

    if (result.ok) {
      this.logger.info(`[DivisionService] Created division ${result.value.id} (${result.value.code})`);
    }
    return result;
  }

  async update(id: number, patch: DivisionPatch): Promise<Result<Division>> {
    const result = await this.repository.transaction(async (repository) => {
      const current = await repository.find(id);
      if (!current) {
        return fail(divisionNotFound(id));
      }
      return this.applyPatch(repository, current, patch, false);
    }, patch.parentId !== undefined ? PARENT_CHANGE : undefined);

    if (result.ok) {
      this.logger.info(`[DivisionService] Updated division ${id}`, Object.keys(patch));
    }
    return result;
  }

  /**
   * Soft delete flags the row; hard delete removes it. Either way the
   * division must have no non-deleted children.
   */
  async delete(id: number, softDelete = true): Promise<Result<Division>> {
    const result = await this.repository.transaction(async (repository) => {
      const { integrity } = engines(repository);
      const current = await repository.find(id);
      if (!current) {
        return fail(divisionNotFound(id));
      }

      const blocked = await integrity.checkDeletable(id);
      if (blocked) {
        return fail(blocked);
      }

      if (softDelete) {
        return ok(await repository.update(id, { isDeleted: true }));
      }
      await repository.remove(id);
      return ok(current);
    });

    if (result.ok) {
      this.logger.info(`[DivisionService] ${softDelete ? 'Soft' : 'Hard'} deleted division ${id}`);
    }
    return result;
  }

  /**
   * Undo a soft delete. Goes through the same checks as an update, with the
   * record's own code and parent re-validated: either may have become
   * invalid while the row was deleted.
   */
  async restore(id: number): Promise<Result<Division>> {
    const result = await this.repository.transaction(async (repository) => {
      const current = await repository.find(id, { includeDeleted: true });
      if (!current) {
        return fail(divisionNotFound(id));
      }
      if (!current.isDeleted) {
        return fail(notDeleted(id));
      }

      return this.applyPatch(
        repository,
        current,
        { code: current.code, parentId: current.parentId, isDeleted: false },
        true,
      );
    }, PARENT_CHANGE);

    if (result.ok) {
      this.logger.info(`[DivisionService] Restored division ${id}`);
    }
    return result;
  }

  /**
   * Re-parent a division. Without `newSortOrder` it goes to the end of the
   * new sibling group; the group it left is renumbered to close the gap.
   */
  async move(id: number, newParentId?: number | null, newSortOrder?: number | null): Promise<Result<Division>> {
    const result = await this.repository.transaction(async (repository) => {
      const { integrity, ordering } = engines(repository);
      const current = await repository.find(id);
      if (!current) {
        return fail(divisionNotFound(id));
      }

      const parentId = normalizeParentId(newParentId);
      const invalidParent = await integrity.checkParentAssignment(id, parentId);
      if (invalidParent) {
        return fail(invalidParent);
      }

      const sortOrder = newSortOrder ?? await ordering.nextSortOrder(parentId);
      const moved = await repository.update(id, { parentId, sortOrder });

      if (current.parentId !== parentId) {
        await ordering.reorderSiblings(current.parentId);
      }
      return ok(moved);
    }, PARENT_CHANGE);

    if (result.ok) {
      this.logger.info(`[DivisionService] Moved division ${id} under ${result.value.parentId ?? 'root'} at ${result.value.sortOrder}`);
    }
    return result;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Validate and write the keys present in `patch`. With `revalidate` the
   * code check runs even when the code is unchanged.
   */
  private async applyPatch(
    repository: DivisionRepository,
    current: Division,
    patch: DivisionPatch,
    revalidate: boolean,
  ): Promise<Result<Division>> {
    const { integrity } = engines(repository);
    const changes: DivisionChanges = {};

    if (patch.code !== undefined) {
      const code = normalizeCode(patch.code);
      if (revalidate || code !== current.code) {
        const codeTaken = await integrity.checkCodeAvailable(code, current.id);
        if (codeTaken) {
          return fail(codeTaken);
        }
      }
      changes.code = code;
    }

    if (patch.parentId !== undefined) {
      const parentId = normalizeParentId(patch.parentId);
      const invalidParent = await integrity.checkParentAssignment(current.id, parentId);
      if (invalidParent) {
        return fail(invalidParent);
      }
      changes.parentId = parentId;
    }

    // Soft delete through a patch has to clear the same guard as delete()
    if (patch.isDeleted === true && !current.isDeleted) {
      const blocked = await integrity.checkDeletable(current.id);
      if (blocked) {
        return fail(blocked);
      }
    }

    if (patch.name !== undefined) changes.name = patch.name;
    if (patch.shortName !== undefined) changes.shortName = patch.shortName;
    if (patch.sortOrder !== undefined) changes.sortOrder = patch.sortOrder;
    if (patch.isInternal !== undefined) changes.isInternal = patch.isInternal;
    if (patch.isActive !== undefined) changes.isActive = patch.isActive;
    if (patch.isDeleted !== undefined) changes.isDeleted = patch.isDeleted;

    if (Object.keys(changes).length === 0) {
      return ok(current);
    }
    return ok(await repository.update(current.id, changes));
  }
}
