import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/server/config";
import { openDocumentStore } from "../../src/server/connect";
import { MongoDocumentStore } from "../../src/server/mongo";
import { MemoryDocumentStore } from "../../src/server/store";

describe("openDocumentStore", () => {
  it("uses the in-memory store for memory:// URLs", async () => {
    const store = await openDocumentStore(loadConfig({ DATABASE_URL: "memory://dev", DATABASE_NAME: "dev" }));
    expect(store).toBeInstanceOf(MemoryDocumentStore);
    expect(store.status()).toEqual({ connected: true });
  });

  it("returns a disconnected MongoDB store when nothing is configured", async () => {
    const store = await openDocumentStore(loadConfig({}));
    expect(store).toBeInstanceOf(MongoDocumentStore);
    expect(store.status().connected).toBe(false);
  });
});
