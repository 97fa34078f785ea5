import { randomUUID } from "crypto";
import { MATCH_ALL, Predicate, matchesPredicate } from "../catalog/predicate";
import { DEFAULT_LIST_LIMIT, PersistenceError } from "../catalog/types";

/** A document as returned by a store: its fields plus the surrogate identifier rendered as `id`. */
export type StoredDocument = { id: string } & Record<string, unknown>;

export interface StoreStatus {
  connected: boolean;
}

/**
 * Persistence gateway. The only layer that talks to the database; everything above it sees string IDs
 * and store-neutral predicates.
 */
export interface DocumentStore {
  /** Inserts a copy of `record` and resolves to its new identifier. */
  createDocument(collection: string, record: object): Promise<string>;
  /** Reads up to `limit` documents matching `filter`, oldest first. */
  getDocuments(collection: string, filter?: Predicate, limit?: number): Promise<StoredDocument[]>;
  status(): StoreStatus;
  listCollectionNames(): Promise<string[]>;
  close(): Promise<void>;
}

export function requireCollectionName(collection: string): void {
  if (collection.length === 0) {
    throw new PersistenceError("Collection name must not be empty");
  }
}

/**
 * In-process store keyed by collection.
 * Backs `memory://` URLs for local development and the test suite. Insertion order is creation order.
 */
export class MemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, StoredDocument[]>();

  async createDocument(collection: string, record: object): Promise<string> {
    requireCollectionName(collection);
    const id = randomUUID();
    const docs = this.collections.get(collection) ?? [];
    docs.push({ ...structuredClone(record), id });
    this.collections.set(collection, docs);
    return id;
  }

  async getDocuments(
    collection: string,
    filter: Predicate = MATCH_ALL,
    limit: number = DEFAULT_LIST_LIMIT
  ): Promise<StoredDocument[]> {
    requireCollectionName(collection);
    if (limit < 1) return [];
    const docs = this.collections.get(collection) ?? [];
    return docs
      .filter(doc => matchesPredicate(filter, doc))
      .slice(0, Math.floor(limit))
      .map(doc => structuredClone(doc));
  }

  status(): StoreStatus {
    return { connected: true };
  }

  async listCollectionNames(): Promise<string[]> {
    return Array.from(this.collections.keys());
  }

  /** Counts documents in a collection; handy for diagnostics and tests. */
  count(collection: string): number {
    return this.collections.get(collection)?.length ?? 0;
  }

  async close(): Promise<void> {
    this.collections.clear();
  }
}
