import type {
  Division,
  DivisionChanges,
  DivisionSearchFilters,
  NewDivision,
  ReadOptions,
} from './types.js';

export interface TransactionOptions {
  /** Defaults to the database default (read committed on PostgreSQL) */
  isolationLevel?: 'read committed' | 'serializable';
}

/**
 * Storage contract for divisions.
 *
 * Reads skip soft-deleted rows unless `includeDeleted` is set. List reads are
 * ordered by (sortOrder, name) and return an empty array when nothing matches.
 */
export interface DivisionRepository {
  find(id: number, options?: ReadOptions): Promise<Division | null>;
  findByCode(code: string, options?: ReadOptions): Promise<Division | null>;
  findByParent(parentId: number | null, options?: ReadOptions): Promise<Division[]>;
  findRoots(options?: ReadOptions): Promise<Division[]>;
  search(filters: DivisionSearchFilters): Promise<Division[]>;

  /** Non-deleted direct children */
  countChildren(parentId: number): Promise<number>;
  /** Highest sort order in a sibling group, deleted rows included; null when empty */
  maxSortOrder(parentId: number | null): Promise<number | null>;
  /** All rows, deleted included */
  count(): Promise<number>;

  insert(values: NewDivision): Promise<Division>;
  update(id: number, changes: DivisionChanges): Promise<Division>;
  remove(id: number): Promise<void>;

  /**
   * Run `work` against a repository bound to one transaction.
   * Commits when `work` resolves, rolls back when it rejects.
   */
  transaction<T>(work: (repository: DivisionRepository) => Promise<T>, options?: TransactionOptions): Promise<T>;
}
