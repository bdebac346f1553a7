/**
 * Types for the division service
 */

export interface Division {
  id: number;
  code: string;
  name: string;
  shortName: string | null;
  parentId: number | null;
  sortOrder: number;
  isInternal: boolean;
  isActive: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Values the service hands to the repository for a new row */
export interface NewDivision {
  code: string;
  name: string;
  shortName: string | null;
  parentId: number | null;
  sortOrder: number;
  isInternal: boolean;
  isActive: boolean;
}

export type DivisionChanges = Partial<Omit<Division, 'id' | 'createdAt' | 'updatedAt'>>;

/**
 * Input for creating a division.
 * `parentId` 0 means root; `sortOrder` missing or 0 is auto-assigned.
 */
export interface DivisionCreateInput {
  code: string;
  name: string;
  shortName?: string | null;
  parentId?: number | null;
  sortOrder?: number | null;
  isInternal?: boolean;
  isActive?: boolean;
}

/** Partial update: only the keys that are present get written */
export interface DivisionPatch {
  code?: string;
  name?: string;
  shortName?: string | null;
  parentId?: number | null;
  sortOrder?: number;
  isInternal?: boolean;
  isActive?: boolean;
  isDeleted?: boolean;
}

export interface ReadOptions {
  includeDeleted?: boolean;
}

export interface DivisionSearchFilters extends ReadOptions {
  activeOnly?: boolean;
  /** Case-insensitive substring over code, name and short name */
  query?: string;
  skip?: number;
  /** Omitted for an unpaginated result */
  limit?: number;
}

export interface DivisionListFilters {
  skip?: number;
  limit?: number;
  includeDeleted?: boolean;
  activeOnly?: boolean;
  search?: string;
}
