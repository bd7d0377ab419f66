/**
 * Shared Types
 *
 * Product catalog schemas used by the store and the products resource.
 */

import { z } from 'zod';

// ============================================================================
// Products
// ============================================================================

/**
 * A catalog entry. Rows are soft-deleted: `deletedAt` is null while live.
 */
export const Product = z.object({
  id: z.number().int().positive(),
  code: z.string(),
  price: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
  deletedAt: z.string().nullable(),
});
export type Product = z.infer<typeof Product>;

/**
 * Fields supplied when inserting; the rest are assigned by the store.
 */
export const NewProduct = Product.pick({ code: true, price: true });
export type NewProduct = z.infer<typeof NewProduct>;

// ============================================================================
// Logging
// ============================================================================

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;
