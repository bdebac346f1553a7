/**
 * Division hierarchy store
 */

export type {
  Division,
  DivisionCreateInput,
  DivisionListFilters,
  DivisionPatch,
  DivisionSearchFilters,
} from './types.js';
export type { DivisionRepository, TransactionOptions } from './repository.js';
export {
  HierarchyCorruptionError,
  type DivisionError,
  type DivisionErrorKind,
  type Result,
} from './errors.js';
export { DivisionService, normalizeCode } from './divisionService.js';
export { DrizzleDivisionRepository } from './drizzleRepository.js';
export { IntegrityEngine } from './integrity.js';
export { OrderingEngine, SORT_ORDER_STEP } from './ordering.js';
export { HierarchyQueryEngine } from './hierarchy.js';
