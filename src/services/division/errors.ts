/**
 * Business errors of the division service.
 *
 * These are returned, not thrown: every service operation that can fail on
 * caller input resolves to a Result. Only storage faults and a corrupted
 * hierarchy surface as exceptions.
 */

export type DivisionError =
  | { kind: 'NotFound'; message: string; divisionId?: number; code?: string }
  | { kind: 'CodeExists'; message: string; code: string }
  | { kind: 'ParentNotFound'; message: string; parentId: number }
  | { kind: 'SelfParent'; message: string; divisionId: number }
  | { kind: 'CircularReference'; message: string; divisionId: number; parentId: number }
  | { kind: 'HasChildren'; message: string; childrenCount: number }
  | { kind: 'NotDeleted'; message: string; divisionId: number };

export type DivisionErrorKind = DivisionError['kind'];

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: DivisionError };
export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(error: DivisionError): Failure {
  return { ok: false, error };
}

export function divisionNotFound(divisionId: number): DivisionError {
  return { kind: 'NotFound', message: `Division with ID ${divisionId} not found`, divisionId };
}

export function codeNotFound(code: string): DivisionError {
  return { kind: 'NotFound', message: `Division with code '${code}' not found`, code };
}

export function codeExists(code: string): DivisionError {
  return { kind: 'CodeExists', message: `Division with code '${code}' already exists`, code };
}

export function parentNotFound(parentId: number): DivisionError {
  return { kind: 'ParentNotFound', message: `Parent division with ID ${parentId} not found`, parentId };
}

export function selfParent(divisionId: number): DivisionError {
  return { kind: 'SelfParent', message: 'Division cannot be its own parent', divisionId };
}

export function circularReference(divisionId: number, parentId: number): DivisionError {
  return {
    kind: 'CircularReference',
    message: 'Cannot create circular parent-child relationship',
    divisionId,
    parentId,
  };
}

export function hasChildren(childrenCount: number): DivisionError {
  const noun = childrenCount === 1 ? 'child division' : 'child divisions';
  return { kind: 'HasChildren', message: `Cannot delete division with ${childrenCount} ${noun}`, childrenCount };
}

export function notDeleted(divisionId: number): DivisionError {
  return { kind: 'NotDeleted', message: `Division with ID ${divisionId} is not deleted`, divisionId };
}

/**
 * The stored parent chain loops or is longer than the table.
 * Raised instead of walking forever; maps to a 500.
 */
export class HierarchyCorruptionError extends Error {
  constructor(message: string, readonly divisionId: number) {
    super(message);
    this.name = 'HierarchyCorruptionError';
  }
}
