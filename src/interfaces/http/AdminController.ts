/**
 * Catalog admin HTTP controller.
 *
 * Express handlers for the /api/v1/admin endpoints:
 * - index-products: full rebuild from a product list or a catalog file
 * - products: upsert one or more products
 * - products/:productId: delete one product
 *
 * Every write is accepted with 202 and applied on the persistence queue.
 */
import type { Request, Response } from "express";

import { productText } from "@app/catalog/catalogLoader";
import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import type { ProductInput } from "@domain/rag/types";
import {
  ReindexRequestSchema,
  UpsertProductsRequestSchema,
  type ProductBody,
} from "@interfaces/http/admin/schema";
import { parseInput } from "@interfaces/http/validation";

export function toProductInput(body: ProductBody): ProductInput {
  if ("product_id" in body) {
    return {
      productId: body.product_id,
      textDescription: body.text_description,
      metadata: body.metadata ?? {},
    };
  }

  const row = {
    nameFa: body.nameFa ?? "",
    nameEn: body.nameEn ?? "",
    description: body.description ?? "",
  };

  return {
    productId: body.id,
    textDescription: productText(row),
    metadata: { nameFa: row.nameFa, nameEn: row.nameEn },
  };
}

export function createAdminController(catalog: CatalogUseCase) {
  return {
    async reindex(req: Request, res: Response): Promise<void> {
      const body = parseInput(ReindexRequestSchema, req.body);

      const result =
        "filepath" in body
          ? catalog.ingestCatalogFile(body.filepath, {
              commentsPath: body.comments_filepath,
              summariesPath: body.summaries_filepath,
            })
          : catalog.reindex(body.products.map(toProductInput));

      res.status(202).json({ success: true, ...result });
    },

    async upsert(req: Request, res: Response): Promise<void> {
      const body = parseInput(UpsertProductsRequestSchema, req.body);
      const result = catalog.upsertProducts(body.products.map(toProductInput));
      res.status(202).json({ success: true, ...result });
    },

    async remove(req: Request<{ productId: string }>, res: Response): Promise<void> {
      const result = catalog.deleteProduct(req.params.productId);
      res.status(202).json({ success: true, productId: req.params.productId, ...result });
    },
  };
}
