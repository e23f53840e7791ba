/**
 * Offline catalog check: loads a catalog export into a fresh engine, waits for
 * the index build and prints the top matches for a few sample queries.
 *
 *   npm run reindex -- data/products.json "ضد آفتاب" "oily skin cleanser"
 */
import { createEngine } from "@app/engine";
import { config } from "@config/index";
import { closePool } from "@infrastructure/database/db";

async function main(): Promise<void> {
  const [filepath = config.rag.catalogPath, ...queries] = process.argv.slice(2);

  const engine = createEngine({ generator: null });
  const result = engine.catalog.ingestCatalogFile(filepath, {
    commentsPath: config.rag.commentsPath,
    summariesPath: config.rag.summariesPath,
  });
  await engine.queue.onIdle();

  const status = engine.catalog.status();
  console.log(
    `Indexed ${status.size} products from ${filepath} (skipped ${result.skipped}), state=${status.state}`
  );
  if (status.lastBuildError) {
    console.error(`Last build error: ${status.lastBuildError}`);
  }

  for (const query of queries) {
    const { results } = await engine.catalog.searchProducts(query, 3);
    console.log(`\n${query}`);
    for (const hit of results) {
      console.log(`  ${hit.score.toFixed(3)}  ${hit.productId}  ${hit.textDescription.split("\n")[0]}`);
    }
  }

  await engine.shutdown();
  await closePool();
}

main().catch((error: unknown) => {
  console.error("❌ Reindex failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
