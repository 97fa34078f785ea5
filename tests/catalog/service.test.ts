import { describe, expect, it } from "vitest";
import { MATCH_ALL, contains, or } from "../../src/catalog/predicate";
import { CatalogService, buildSearchPredicate, toPublicGame } from "../../src/catalog/service";
import { SAMPLE_GAMES } from "../../src/catalog/samples";
import { PersistenceError } from "../../src/catalog/types";
import { MemoryDocumentStore } from "../../src/server/store";
import { makeGame } from "../helpers/games";

describe("buildSearchPredicate", () => {
  it("matches everything without a term", () => {
    expect(buildSearchPredicate()).toEqual(MATCH_ALL);
    expect(buildSearchPredicate("")).toEqual(MATCH_ALL);
  });

  it("searches title or genre", () => {
    expect(buildSearchPredicate("rpg")).toEqual(or(contains("title", "rpg"), contains("genre", "rpg")));
  });
});

describe("toPublicGame", () => {
  it("keeps the id and drops fields outside the schema", () => {
    const game = makeGame();
    expect(toPublicGame({ ...game, id: "g1", created_at: "2024-01-01" })).toEqual({ ...game, id: "g1" });
  });

  it("rejects stored documents missing required fields", () => {
    expect(() => toPublicGame({ id: "broken", title: "No genre" })).toThrowError(PersistenceError);
    expect(() => toPublicGame({ id: "broken", title: "No genre" })).toThrowError(/^Stored game broken is malformed/);
  });
});

describe("CatalogService", () => {
  it("lists created games with unique ids and equal fields", async () => {
    const service = new CatalogService(new MemoryDocumentStore());
    const games = [makeGame({ title: "One" }), makeGame({ title: "Two" }), makeGame({ title: "Three" })];
    const ids: string[] = [];
    for (const game of games) {
      ids.push(await service.createGame(game));
    }

    const listed = await service.listGames();
    expect(listed).toEqual(games.map((game, i) => ({ ...game, id: ids[i] })));
    expect(new Set(listed.map(game => game.id)).size).toBe(3);
  });

  it("filters by title or genre case-insensitively", async () => {
    const service = new CatalogService(new MemoryDocumentStore());
    await service.createGame(makeGame({ title: "Dungeon Delve", genre: "Roguelike" }));
    await service.createGame(makeGame({ title: "Farm Days", genre: "Simulation" }));
    await service.createGame(makeGame({ title: "Rogue Planet", genre: "Shooter" }));
    await service.createGame(makeGame({ title: "Kart Chaos", genre: "Racing" }));

    const rogue = await service.listGames({ q: "ROGUE" });
    expect(rogue.map(game => game.title)).toEqual(["Dungeon Delve", "Rogue Planet"]);

    const racing = await service.listGames({ q: "racing" });
    expect(racing.map(game => game.title)).toEqual(["Kart Chaos"]);

    expect(await service.listGames({ q: "platformer" })).toEqual([]);
  });

  it("bounds results by the limit", async () => {
    const service = new CatalogService(new MemoryDocumentStore());
    for (let i = 0; i < 5; i++) {
      await service.createGame(makeGame({ title: `Match ${i}` }));
    }
    expect(await service.listGames({ q: "match", limit: 2 })).toHaveLength(2);
  });

  it("seeds the three samples into an empty collection", async () => {
    const store = new MemoryDocumentStore();
    const service = new CatalogService(store);

    const listed = await service.seedSampleGames();
    expect(listed.map(game => game.title)).toEqual(["Starlight Odyssey", "Neon Drift", "Echoes of Eldoria"]);
    expect(listed).toEqual(SAMPLE_GAMES.map(game => ({ ...game, id: expect.any(String) })));
    expect(store.count("game")).toBe(3);
  });

  it("does not seed when a game already exists", async () => {
    const store = new MemoryDocumentStore();
    const service = new CatalogService(store);
    await service.createGame(makeGame({ title: "Already Here" }));

    const listed = await service.seedSampleGames();
    expect(listed.map(game => game.title)).toEqual(["Already Here"]);
    expect(store.count("game")).toBe(1);
  });

  it("seeds only once across repeated calls", async () => {
    const store = new MemoryDocumentStore();
    const service = new CatalogService(store);
    await service.seedSampleGames();
    await service.seedSampleGames();
    expect(store.count("game")).toBe(3);
  });

  it("uses the configured collection", async () => {
    const store = new MemoryDocumentStore();
    const service = new CatalogService(store, "staging_games");
    await service.createGame(makeGame());
    expect(store.count("staging_games")).toBe(1);
    expect(store.count("game")).toBe(0);
  });
});
