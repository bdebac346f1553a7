/**
 * Division Routes
 *
 * Mounted at /api/divisions. Literal paths are registered before /:id so
 * they are not captured as ids.
 */
import { Router } from 'express';
import { createDivisionController } from '../controllers/division/index.js';
import { searchLimiter } from '../middleware/rateLimiter.js';
import type { DivisionService } from '../services/division/index.js';

export function createDivisionRoutes(service: DivisionService): Router {
  const router = Router();
  const controller = createDivisionController(service);

  // =============================================================================
  // Listing & lookup
  // =============================================================================
  router.get('/', controller.listDivisions);
  router.get('/list', controller.listAllDivisions);  // Unpaginated
  router.get('/codes/available', controller.getAvailableCodes);
  router.get('/search/suggest', searchLimiter, controller.suggestDivisions);
  router.get('/hierarchy/tree', controller.getHierarchyTree);
  router.get('/by-code/:code', controller.getDivisionByCode);
  router.get('/:id', controller.getDivisionById);
  router.get('/:id/children', controller.getChildren);

  // =============================================================================
  // Mutations
  // =============================================================================
  router.post('/', controller.createDivision);
  router.put('/:id', controller.updateDivision);
  router.patch('/:id', controller.updateDivision);
  router.delete('/:id', controller.deleteDivision);
  router.post('/:id/restore', controller.restoreDivision);
  router.put('/:id/move', controller.moveDivision);

  return router;
}
