import { Router } from "express";

import type { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { createAdminController } from "@interfaces/http/AdminController";

export function createAdminRouter(catalog: CatalogUseCase): Router {
  const router = Router();
  const controller = createAdminController(catalog);

  router.post("/index-products", controller.reindex);
  router.post("/products", controller.upsert);
  router.delete("/products/:productId", controller.remove);

  return router;
}
