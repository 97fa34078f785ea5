import http from "http";
import { CatalogService } from "../catalog/service";
import { loadConfig } from "./config";
import { openDocumentStore } from "./connect";
import { createHttpApp } from "./http";

// Bootstrap: one store handle for the whole process, injected into the catalog and HTTP layers.

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await openDocumentStore(config);
  const catalog = new CatalogService(store);
  const app = createHttpApp({
    catalog,
    store,
    env: { databaseUrl: config.databaseUrl, databaseName: config.databaseName }
  });
  const server = http.createServer(app);

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close();
    store
      .close()
      .then(() => process.exit(0))
      .catch(err => {
        console.error("Failed to close document store", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(config.port, () => {
    console.log(`Games Download API running on port ${config.port}`);
    console.log("Diagnostics: GET /test");
  });
}

main().catch(err => {
  console.error("Failed to start server", err);
  process.exit(1);
});
