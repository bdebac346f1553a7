/**
 * PostgreSQL-backed division repository (drizzle-orm)
 */

import { and, asc, count, eq, ilike, isNull, max, or, type SQL } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { divisions } from '../../db/schema.js';
import type { DivisionRepository, TransactionOptions } from './repository.js';
import type {
  Division,
  DivisionChanges,
  DivisionSearchFilters,
  NewDivision,
  ReadOptions,
} from './types.js';

const siblingOrder = [asc(divisions.sortOrder), asc(divisions.name)];

function liveOnly(includeDeleted = false): SQL | undefined {
  return includeDeleted ? undefined : eq(divisions.isDeleted, false);
}

function parentIs(parentId: number | null): SQL {
  return parentId === null ? isNull(divisions.parentId) : eq(divisions.parentId, parentId);
}

/** Escape LIKE wildcards so user input matches literally */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class DrizzleDivisionRepository implements DivisionRepository {
  constructor(private readonly db: Database) {}

  async find(id: number, { includeDeleted = false }: ReadOptions = {}): Promise<Division | null> {
    const rows = await this.db.select()
      .from(divisions)
      .where(and(eq(divisions.id, id), liveOnly(includeDeleted)))
      .limit(1);

    return rows[0] ?? null;
  }

  async findByCode(code: string, { includeDeleted = false }: ReadOptions = {}): Promise<Division | null> {
    const rows = await this.db.select()
      .from(divisions)
      .where(and(eq(divisions.code, code), liveOnly(includeDeleted)))
      .orderBy(asc(divisions.isDeleted), asc(divisions.id))
      .limit(1);

    return rows[0] ?? null;
  }

  async findByParent(parentId: number | null, { includeDeleted = false }: ReadOptions = {}): Promise<Division[]> {
    return this.db.select()
      .from(divisions)
      .where(and(parentIs(parentId), liveOnly(includeDeleted)))
      .orderBy(...siblingOrder);
  }

  async findRoots(options: ReadOptions = {}): Promise<Division[]> {
    return this.findByParent(null, options);
  }

  async search(filters: DivisionSearchFilters): Promise<Division[]> {
    const conditions: (SQL | undefined)[] = [liveOnly(filters.includeDeleted)];

    if (filters.activeOnly) {
      conditions.push(eq(divisions.isActive, true));
    }

    if (filters.query) {
      const pattern = `%${escapeLikePattern(filters.query)}%`;
      conditions.push(or(
        ilike(divisions.code, pattern),
        ilike(divisions.name, pattern),
        ilike(divisions.shortName, pattern),
      ));
    }

    let query = this.db.select()
      .from(divisions)
      .where(and(...conditions))
      .orderBy(...siblingOrder)
      .$dynamic();

    if (filters.limit !== undefined) {
      query = query.limit(filters.limit);
    }
    if (filters.skip) {
      query = query.offset(filters.skip);
    }

    return query;
  }

  async countChildren(parentId: number): Promise<number> {
    const [row] = await this.db.select({ value: count() })
      .from(divisions)
      .where(and(eq(divisions.parentId, parentId), liveOnly()));

    return row?.value ?? 0;
  }

  async maxSortOrder(parentId: number | null): Promise<number | null> {
    const [row] = await this.db.select({ value: max(divisions.sortOrder) })
      .from(divisions)
      .where(parentIs(parentId));

    return row?.value ?? null;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(divisions);
    return row?.value ?? 0;
  }

  async insert(values: NewDivision): Promise<Division> {
    const [row] = await this.db.insert(divisions).values(values).returning();
    return row;
  }

  async update(id: number, changes: DivisionChanges): Promise<Division> {
    const [row] = await this.db.update(divisions)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(divisions.id, id))
      .returning();

    if (!row) {
      throw new Error(`Division ${id} disappeared during update`);
    }
    return row;
  }

  async remove(id: number): Promise<void> {
    await this.db.delete(divisions).where(eq(divisions.id, id));
  }

  async transaction<T>(work: (repository: DivisionRepository) => Promise<T>, options?: TransactionOptions): Promise<T> {
    return this.db.transaction(async (tx) => work(new DrizzleDivisionRepository(tx)), options);
  }
}
