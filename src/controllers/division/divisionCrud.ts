/**
 * Division CRUD operations
 */

import { Request, Response } from 'express';
import type { DivisionService } from '../../services/division/index.js';
import {
  createDivisionSchema,
  deleteDivisionQuerySchema,
  divisionCodeParamSchema,
  divisionIdParamSchema,
  includeDeletedQuerySchema,
  listAllDivisionsQuerySchema,
  listDivisionsQuerySchema,
  updateDivisionSchema,
} from '../../types/index.js';
import { unwrap } from './helpers.js';

export function createDivisionCrudHandlers(service: DivisionService) {
  return {
    /**
     * Paginated list with search and deleted/active filters
     */
    async listDivisions(req: Request, res: Response): Promise<void> {
      const query = listDivisionsQuerySchema.parse(req.query);
      res.json(await service.list(query));
    },

    /**
     * Unpaginated list (dropdowns and the like)
     */
    async listAllDivisions(req: Request, res: Response): Promise<void> {
      const query = listAllDivisionsQuerySchema.parse(req.query);
      res.json(await service.listAll(query));
    },

    async getDivisionById(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      const { includeDeleted } = includeDeletedQuerySchema.parse(req.query);
      res.json(unwrap(await service.getById(id, includeDeleted)));
    },

    async getDivisionByCode(req: Request, res: Response): Promise<void> {
      const { code } = divisionCodeParamSchema.parse(req.params);
      const { includeDeleted } = includeDeletedQuerySchema.parse(req.query);
      res.json(unwrap(await service.getByCode(code, includeDeleted)));
    },

    async createDivision(req: Request, res: Response): Promise<void> {
      const body = createDivisionSchema.parse(req.body);
      res.status(201).json(unwrap(await service.create(body)));
    },

    /**
     * Handles both PUT and PATCH: only the fields sent are changed
     */
    async updateDivision(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      const patch = updateDivisionSchema.parse(req.body);
      res.json(unwrap(await service.update(id, patch)));
    },

    async deleteDivision(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      const { softDelete } = deleteDivisionQuerySchema.parse(req.query);
      unwrap(await service.delete(id, softDelete));
      res.status(204).send();
    },

    async restoreDivision(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      res.json(unwrap(await service.restore(id)));
    },
  };
}
