/**
 * Division search operations
 */

import { Request, Response } from 'express';
import type { DivisionService } from '../../services/division/index.js';
import { availableCodesQuerySchema, suggestQuerySchema } from '../../types/index.js';

export function createDivisionSearchHandlers(service: DivisionService) {
  return {
    async getAvailableCodes(req: Request, res: Response): Promise<void> {
      const { prefix } = availableCodesQuerySchema.parse(req.query);
      res.json(await service.getAvailableCodes(prefix));
    },

    /**
     * Autocomplete over code, name and short name (min. 2 characters)
     */
    async suggestDivisions(req: Request, res: Response): Promise<void> {
      const { q, limit } = suggestQuerySchema.parse(req.query);
      res.json(await service.suggest(q, limit));
    },
  };
}
