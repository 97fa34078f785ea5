import { DocumentStore, StoredDocument } from "../server/store";
import { MATCH_ALL, Predicate, contains, or } from "./predicate";
import { SAMPLE_GAMES } from "./samples";
import {
  DEFAULT_LIST_LIMIT,
  GAME_COLLECTION,
  Game,
  GameSchema,
  PersistenceError,
  PublicGame,
  formatIssues
} from "./types";

export interface ListGamesOptions {
  q?: string;
  limit?: number;
}

/** Free-text search over title and genre; no term (or an empty one) matches everything. */
export function buildSearchPredicate(term?: string): Predicate {
  if (!term) return MATCH_ALL;
  return or(contains("title", term), contains("genre", term));
}

/**
 * Maps a stored document onto the public game shape.
 * Fields outside the schema are dropped; a document missing required fields means the collection
 * was written to out-of-band, so it surfaces as a persistence failure.
 */
export function toPublicGame(doc: StoredDocument): PublicGame {
  const { id, ...fields } = doc;
  const result = GameSchema.safeParse(fields);
  if (!result.success) {
    throw new PersistenceError(`Stored game ${id} is malformed: ${formatIssues(result.error.issues)}`);
  }
  return { id, ...result.data };
}

/** List/create/seed operations for the game catalog. Holds no state beyond the injected store. */
export class CatalogService {
  constructor(private store: DocumentStore, private collection: string = GAME_COLLECTION) {}

  /** Persists an already-validated game and returns its identifier. */
  createGame(game: Game): Promise<string> {
    return this.store.createDocument(this.collection, game);
  }

  async listGames(options: ListGamesOptions = {}): Promise<PublicGame[]> {
    const docs = await this.store.getDocuments(
      this.collection,
      buildSearchPredicate(options.q),
      options.limit ?? DEFAULT_LIST_LIMIT
    );
    return docs.map(toPublicGame);
  }

  /**
   * Inserts the sample catalog when the collection is empty, then lists it.
   * Check and insert are separate calls, so two concurrent first requests can both seed.
   */
  async seedSampleGames(): Promise<PublicGame[]> {
    const existing = await this.store.getDocuments(this.collection, MATCH_ALL, 1);
    if (existing.length === 0) {
      for (const game of SAMPLE_GAMES) {
        await this.store.createDocument(this.collection, game);
      }
      console.log(`Seeded ${SAMPLE_GAMES.length} sample games into "${this.collection}"`);
    }
    return this.listGames({ limit: DEFAULT_LIST_LIMIT });
  }
}
