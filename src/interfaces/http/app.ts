import express, { type Express } from "express";

import type { Engine } from "@app/engine";
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";

export function createApp(engine: Engine): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app, engine);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
