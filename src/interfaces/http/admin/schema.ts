import { z } from "zod";

/**
 * Admin catalog operations. A product is either given as an index record
 * (`product_id` + `text_description`) or as a catalog row
 * (`id`, `nameFa`, `nameEn`, `description`).
 */
export const ProductBodySchema = z.union([
  z.object({
    product_id: z.union([z.string(), z.number()]).transform(String),
    text_description: z.string().min(1),
    metadata: z.record(z.unknown()).optional(),
  }),
  z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    nameFa: z.string().optional(),
    nameEn: z.string().optional(),
    description: z.string().optional(),
  }),
]);

export type ProductBody = z.infer<typeof ProductBodySchema>;

export const ReindexRequestSchema = z.union([
  z.object({ products: z.array(ProductBodySchema) }),
  z.object({
    filepath: z.string().min(1),
    comments_filepath: z.string().min(1).optional(),
    summaries_filepath: z.string().min(1).optional(),
  }),
]);

export const UpsertProductsRequestSchema = z.object({
  products: z.array(ProductBodySchema).min(1),
});
