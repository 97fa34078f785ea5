import { AppConfig } from "./config";
import { MongoDocumentStore } from "./mongo";
import { DocumentStore, MemoryDocumentStore } from "./store";

/**
 * Builds the process-wide store from configuration.
 * A failed MongoDB connection still yields a (Disconnected) store so the HTTP layer can report it.
 */
export async function openDocumentStore(config: AppConfig): Promise<DocumentStore> {
  if (config.databaseUrl?.startsWith("memory://")) {
    console.warn("Using in-memory document store; data is lost on restart");
    return new MemoryDocumentStore();
  }
  const store = new MongoDocumentStore({
    url: config.databaseUrl,
    databaseName: config.databaseName,
    serverSelectionTimeoutMs: config.databaseTimeoutMs
  });
  await store.connect();
  return store;
}
