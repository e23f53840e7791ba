import { Router } from "express";

import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { createSearchController } from "@interfaces/http/SearchController";

export function createSearchRouter(catalog: CatalogUseCase): Router {
  const router = Router();
  const controller = createSearchController(catalog);

  router.post("/", controller.search);

  return router;
}
