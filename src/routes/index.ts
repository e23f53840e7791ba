/**
 * Express route registration.
 *
 * - /api/health: liveness and component status
 * - /api/v1/chat: one chat turn with memory and product retrieval
 * - /api/v1/profile, /conversation, /memory: per-user state
 * - /api/v1/admin: catalog reindex, upsert and delete
 * - /api/v1/search, /stats: retrieval checks and counters
 */
import type { Express } from "express";

import type { Engine } from "@app/engine";
import { createAdminRouter } from "@routes/admin";
import { createChatRouter } from "@routes/chat";
import { createConversationRouter } from "@routes/conversation";
import { createHealthRouter, createStatsRouter } from "@routes/health";
import { createProfileRouter } from "@routes/profile";
import { createSearchRouter } from "@routes/search";

export function registerRoutes(app: Express, engine: Engine): void {
  app.use("/api/health", createHealthRouter(engine));
  app.use("/api/v1/chat", createChatRouter(engine.chat));
  app.use("/api/v1/profile", createProfileRouter(engine.profiles));
  app.use("/api/v1", createConversationRouter(engine.conversations));
  app.use("/api/v1/admin", createAdminRouter(engine.catalog));
  app.use("/api/v1/search", createSearchRouter(engine.catalog));
  app.use("/api/v1/stats", createStatsRouter(engine));
}
