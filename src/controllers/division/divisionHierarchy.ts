/**
 * Division hierarchy operations (children, tree, move)
 */

import { Request, Response } from 'express';
import type { DivisionService } from '../../services/division/index.js';
import {
  divisionIdParamSchema,
  hierarchyTreeQuerySchema,
  includeDeletedQuerySchema,
  moveDivisionQuerySchema,
} from '../../types/index.js';
import { unwrap } from './helpers.js';

export function createDivisionHierarchyHandlers(service: DivisionService) {
  return {
    /**
     * Direct children of a division; 404 when the division itself is missing
     */
    async getChildren(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      const { includeDeleted } = includeDeletedQuerySchema.parse(req.query);
      res.json(unwrap(await service.getChildren(id, includeDeleted)));
    },

    /**
     * With rootId: the root and all its descendants, parents first.
     * Without: the top-level divisions only.
     */
    async getHierarchyTree(req: Request, res: Response): Promise<void> {
      const { rootId } = hierarchyTreeQuerySchema.parse(req.query);
      res.json(await service.getHierarchyTree(rootId));
    },

    async moveDivision(req: Request, res: Response): Promise<void> {
      const { id } = divisionIdParamSchema.parse(req.params);
      const { newParentId, newSortOrder } = moveDivisionQuerySchema.parse(req.query);
      res.json(unwrap(await service.move(id, newParentId, newSortOrder)));
    },
  };
}
