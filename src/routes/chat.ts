import { Router } from "express";

import type { ChatUseCase } from "@app/chat/ChatUseCase";
import { createChatController } from "@interfaces/http/ChatController";

export function createChatRouter(chat: ChatUseCase): Router {
  const router = Router();
  const controller = createChatController(chat);

  router.post("/", controller.chat);

  return router;
}
