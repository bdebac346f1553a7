import { z } from 'zod';

/**
 * Request schemas for the division API
 *
 * Query strings arrive as strings: numbers are coerced and booleans accept
 * true/false, 1/0, yes/no, on/off, t/f and y/n in any case.
 */

// =============================================================================
// Shared pieces
// =============================================================================

const TRUE_VALUES = ['true', '1', 'yes', 'on', 't', 'y'];
const FALSE_VALUES = ['false', '0', 'no', 'off', 'f', 'n'];

export function booleanQuerySchema(defaultValue: boolean) {
  return z.string().trim().toLowerCase()
    .refine(v => TRUE_VALUES.includes(v) || FALSE_VALUES.includes(v), { message: 'Expected a boolean' })
    .optional()
    .transform(v => (v === undefined ? defaultValue : TRUE_VALUES.includes(v)));
}

export const divisionIdSchema = z.coerce.number().int().positive();
/** Parent references accept 0 as "root" */
export const parentIdSchema = z.coerce.number().int().min(0);
export const skipSchema = z.coerce.number().int().min(0).default(0);
export const limitSchema = z.coerce.number().int().min(1).max(100).default(20);

const codeSchema = z.string().trim().min(1).max(50);
const nameSchema = z.string().trim().min(1).max(100);
const shortNameSchema = z.string().trim().max(100).nullable();

// =============================================================================
// Path params
// =============================================================================

export const divisionIdParamSchema = z.object({
  id: divisionIdSchema,
});

export const divisionCodeParamSchema = z.object({
  code: codeSchema,
});

// =============================================================================
// Query strings
// =============================================================================

export const includeDeletedQuerySchema = z.object({
  includeDeleted: booleanQuerySchema(false),
});

export const listAllDivisionsQuerySchema = z.object({
  includeDeleted: booleanQuerySchema(false),
  search: z.string().trim().max(255).optional(),
  activeOnly: booleanQuerySchema(true),
});

export const listDivisionsQuerySchema = listAllDivisionsQuerySchema.extend({
  skip: skipSchema,
  limit: limitSchema,
});

export const deleteDivisionQuerySchema = z.object({
  softDelete: booleanQuerySchema(true),
});

export const hierarchyTreeQuerySchema = z.object({
  rootId: parentIdSchema.optional(),
});

export const moveDivisionQuerySchema = z.object({
  newParentId: parentIdSchema.optional(),
  newSortOrder: z.coerce.number().int().optional(),
});

export const availableCodesQuerySchema = z.object({
  prefix: z.string().trim().max(50).optional(),
});

export const suggestQuerySchema = z.object({
  q: z.string().trim().min(2).max(255),
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

// =============================================================================
// Bodies
// =============================================================================

export const createDivisionSchema = z.object({
  code: codeSchema,
  name: nameSchema,
  shortName: shortNameSchema.optional(),
  parentId: z.number().int().min(0).nullable().optional(),
  sortOrder: z.number().int().nullable().optional(),
  isInternal: z.boolean().default(false),
  isActive: z.boolean().default(true),
});

export const updateDivisionSchema = z.object({
  code: codeSchema.optional(),
  name: nameSchema.optional(),
  shortName: shortNameSchema.optional(),
  parentId: z.number().int().min(0).nullable().optional(),
  sortOrder: z.number().int().optional(),
  isInternal: z.boolean().optional(),
  isActive: z.boolean().optional(),
  isDeleted: z.boolean().optional(),
}).strict();
