/**
 * Product search HTTP controller.
 *
 * Express handler for POST /api/v1/search: runs the retrieval step of a chat
 * turn on its own and returns the ranked products with their scores. Useful
 * for checking catalog coverage and retrieval quality.
 */
import type { Request, Response } from "express";

import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { SearchRequestSchema } from "@interfaces/http/search/schema";
import { parseInput } from "@interfaces/http/validation";

export function createSearchController(catalog: CatalogUseCase) {
  return {
    async search(req: Request, res: Response): Promise<void> {
      const { query, limit } = parseInput(SearchRequestSchema, req.body);
      const result = await catalog.searchProducts(query, limit);

      res.json({
        query: result.query,
        results: result.results.map((hit) => ({
          product_id: hit.productId,
          score: hit.score,
          text: hit.textDescription,
          metadata: hit.metadata,
        })),
      });
    },
  };
}
