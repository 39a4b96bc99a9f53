import { z } from 'zod';
import type { DocumentFilter, StoredDocument } from './database';

export const PRODUCT_COLLECTION = 'product';
export const FEATURED_TAG = 'featured';

// Keys only the store may set
const SERVER_ASSIGNED_FIELDS = ['_id', 'id', 'created_at', 'updated_at'] as const;

export const ProductInput = z
  .object({
    title: z.string().min(1).max(200),
    description: z.string().max(5000).optional(),
    price: z.number().nonnegative(),
    category: z.string().min(1),
    tags: z.array(z.string()).default([]),
    in_stock: z.boolean().default(true),
  })
  .passthrough()
  .transform((input) => {
    const product: Record<string, unknown> = { ...input };
    for (const field of SERVER_ASSIGNED_FIELDS) {
      delete product[field];
    }
    return product;
  });

// Plain decimal digits only: rejects "0x10", "1e1", " 5"
function limitParam(max: number, fallback: number) {
  return z
    .string()
    .regex(/^\d+$/, 'Expected a whole number')
    .pipe(z.coerce.number().int().min(1).max(max))
    .default(String(fallback));
}

export const ProductListQuery = z.object({
  category: z.string().optional(),
  q: z.string().optional(),
  limit: limitParam(50, 12),
});

export type ProductListQuery = z.infer<typeof ProductListQuery>;

export const FeaturedQuery = z.object({
  limit: limitParam(12, 8),
});

export interface PublicProduct {
  id: string;
  created_at?: string | null;
  updated_at?: string | null;
  [field: string]: unknown;
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildProductFilter(query: Pick<ProductListQuery, 'category' | 'q'>): DocumentFilter {
  const filter: DocumentFilter = {};

  if (query.category) {
    filter.category = query.category;
  }

  if (query.q) {
    const pattern = escapeRegex(query.q);
    filter.$or = [
      { title: { $regex: pattern, $options: 'i' } },
      { description: { $regex: pattern, $options: 'i' } },
      { tags: { $elemMatch: { $regex: pattern, $options: 'i' } } },
    ];
  }

  return filter;
}

export function featuredFilter(): DocumentFilter {
  return { tags: FEATURED_TAG };
}

export function formatTimestamp(value: unknown): string | null {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Shapes a stored document for the API: `_id` becomes a string `id`,
 * timestamps become strings, every other field is passed through.
 */
export function toPublicProduct(doc: StoredDocument): PublicProduct {
  const { _id, created_at, updated_at, ...fields } = doc;
  const product: PublicProduct = { ...fields, id: String(_id) };

  if (created_at !== undefined) {
    product.created_at = formatTimestamp(created_at);
  }
  if (updated_at !== undefined) {
    product.updated_at = formatTimestamp(updated_at);
  }

  return product;
}
