import { Router } from "express";

import type { ProfileUseCase } from "@app/profile/ProfileUseCase";
import { createProfileController } from "@interfaces/http/ProfileController";

export function createProfileRouter(profiles: ProfileUseCase): Router {
  const router = Router();
  const controller = createProfileController(profiles);

  router.get("/:userId", controller.get);
  // POST kept for existing clients; both apply a partial update.
  router.post("/:userId", controller.update);
  router.patch("/:userId", controller.update);

  return router;
}
