/**
 * Division Controller
 *
 * Request handlers over the division service. Handlers parse their input with
 * zod (a ZodError becomes a 400) and turn failed results into ApiErrors.
 */

import type { DivisionService } from '../../services/division/index.js';
import { createDivisionCrudHandlers } from './divisionCrud.js';
import { createDivisionHierarchyHandlers } from './divisionHierarchy.js';
import { createDivisionSearchHandlers } from './divisionSearch.js';

export function createDivisionController(service: DivisionService) {
  return {
    ...createDivisionCrudHandlers(service),
    ...createDivisionHierarchyHandlers(service),
    ...createDivisionSearchHandlers(service),
  };
}

export type DivisionController = ReturnType<typeof createDivisionController>;
