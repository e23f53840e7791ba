import { Router } from "express";

import type { ConversationUseCase } from "@app/conversation/ConversationUseCase";
import { createConversationController } from "@interfaces/http/ConversationController";

export function createConversationRouter(conversations: ConversationUseCase): Router {
  const router = Router();
  const controller = createConversationController(conversations);

  router.get("/conversation/:userId", controller.history);
  router.delete("/conversation/:userId", controller.clear);
  router.get("/memory/:userId", controller.memory);

  return router;
}
