import { sql } from 'drizzle-orm';
import { pgTable, bigserial, bigint, varchar, integer, boolean, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

/**
 * Database Schema for the division hierarchy
 *
 * A division is a node in the organizational tree. `parent_id` points at
 * another division (NULL for roots); `sort_order` orders siblings.
 * Rows are soft-deleted through `is_deleted` and stay in the table.
 */

// =============================================================================
// Divisions
// =============================================================================

export const divisions = pgTable('divisions', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  code: varchar('code', { length: 50 }).notNull(),
  name: varchar('name', { length: 100 }).notNull(),
  shortName: varchar('short_name', { length: 100 }),
  // No foreign key: a hard-deleted parent may leave soft-deleted children behind
  parentId: bigint('parent_id', { mode: 'number' }),
  sortOrder: integer('sort_order').notNull().default(0),
  isInternal: boolean('is_internal').notNull().default(false),
  isActive: boolean('is_active').notNull().default(true),
  isDeleted: boolean('is_deleted').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  parentIdx: index('idx_divisions_parent').on(table.parentId),
  siblingOrderIdx: index('idx_divisions_parent_sort').on(table.parentId, table.sortOrder),
  // Last line of defense against two requests claiming the same code concurrently
  activeCodeIdx: uniqueIndex('uq_divisions_code_active').on(table.code).where(sql`${table.isDeleted} = false`),
}));

export const divisionsRelations = relations(divisions, ({ one, many }) => ({
  parent: one(divisions, {
    fields: [divisions.parentId],
    references: [divisions.id],
    relationName: 'parentChild',
  }),
  children: many(divisions, { relationName: 'parentChild' }),
}));
