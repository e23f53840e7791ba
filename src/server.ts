/**
 * Application entry point.
 *
 * Builds the engine from configuration, warms the product index (snapshot or
 * catalog file), then serves the HTTP API. SIGINT/SIGTERM drain the
 * persistence queue before the process exits.
 */
import { createEngine } from "@app/engine";
import { config } from "@config/index";
import { closePool } from "@infrastructure/database/db";
import { logger } from "@infrastructure/logging/Logger";
import { createApp } from "@interfaces/http/app";

async function main(): Promise<void> {
  const engine = createEngine();
  const status = await engine.warmUp();

  logger.log("info", "Product index ready", { ...status });

  const app = createApp(engine);

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);
    console.log("OpenAI model:", config.openai.model);
  });

  const stop = async (signal: string): Promise<void> => {
    logger.log("info", "Shutting down", { signal });
    server.close();
    await engine.shutdown();
    await closePool();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        logger.log("error", "Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.log("error", "Startup failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
