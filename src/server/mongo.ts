import { Db, Document, MongoClient, ObjectId } from "mongodb";
import { MATCH_ALL, Predicate, escapeRegExp } from "../catalog/predicate";
import { DEFAULT_LIST_LIMIT, PersistenceError, describeError } from "../catalog/types";
import { DocumentStore, StoreStatus, StoredDocument, requireCollectionName } from "./store";

export interface MongoStoreOptions {
  url?: string;
  databaseName?: string;
  serverSelectionTimeoutMs?: number;
}

const NOT_AVAILABLE = "Database not available. Check DATABASE_URL and DATABASE_NAME environment variables.";

/** Matches no document; `$or` rejects an empty list. */
const MATCH_NOTHING: Document = { _id: { $in: [] } };

/** Translates a store-neutral predicate into a MongoDB query document. */
export function toMongoFilter(predicate: Predicate): Document {
  switch (predicate.kind) {
    case "all":
      return {};
    case "equals": {
      if (predicate.field !== "id") {
        return { [predicate.field]: predicate.value };
      }
      const id = String(predicate.value);
      return ObjectId.isValid(id) ? { _id: new ObjectId(id) } : MATCH_NOTHING;
    }
    case "contains":
      return { [predicate.field]: { $regex: escapeRegExp(predicate.term), $options: "i" } };
    case "or":
      if (predicate.predicates.length === 0) return MATCH_NOTHING;
      return { $or: predicate.predicates.map(toMongoFilter) };
    default: {
      const exhaustive: never = predicate;
      throw new Error(`Unknown predicate ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Moves `_id` into a string `id` field. */
export function normalizeDocument(doc: Document): StoredDocument {
  const { _id, ...fields } = doc;
  return { ...fields, id: String(_id) };
}

/**
 * MongoDB-backed gateway.
 * Starts Disconnected; `connect` moves it to Connected or records why it could not.
 * There is no automatic reconnection: callers decide whether to call `connect` again.
 */
export class MongoDocumentStore implements DocumentStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private lastError: string | null = null;

  constructor(private options: MongoStoreOptions) {}

  /**
   * Resolves to true once connected. Never rejects; failures are logged and kept for diagnostics.
   * Any previous connection is closed first, so a failed reconnect leaves the store Disconnected.
   */
  async connect(): Promise<boolean> {
    await this.close().catch(err => console.warn("Failed to close previous MongoDB client", err));
    const { url, databaseName } = this.options;
    if (!url || !databaseName) {
      this.lastError = "DATABASE_URL or DATABASE_NAME is not set";
      console.warn(`MongoDB disabled: ${this.lastError}`);
      return false;
    }

    const { serverSelectionTimeoutMs } = this.options;
    const client = new MongoClient(
      url,
      serverSelectionTimeoutMs === undefined ? {} : { serverSelectionTimeoutMS: serverSelectionTimeoutMs }
    );
    try {
      await client.connect();
      await client.db(databaseName).command({ ping: 1 });
      this.attach(client, databaseName);
      console.log(`Connected to MongoDB database "${databaseName}"`);
      return true;
    } catch (err) {
      this.lastError = describeError(err);
      console.error(`Failed to connect to MongoDB: ${this.lastError}`);
      await client.close().catch(closeErr => console.warn("Failed to close MongoDB client", closeErr));
      return false;
    }
  }

  /** Moves to Connected on an already-established client. The store owns the client from here on. */
  attach(client: MongoClient, databaseName: string): void {
    this.client = client;
    this.db = client.db(databaseName);
    this.lastError = null;
  }

  private requireDb(): Db {
    if (!this.db) {
      throw new PersistenceError(this.lastError ? `${NOT_AVAILABLE} (${this.lastError})` : NOT_AVAILABLE);
    }
    return this.db;
  }

  async createDocument(collection: string, record: object): Promise<string> {
    requireCollectionName(collection);
    const db = this.requireDb();
    try {
      const result = await db.collection(collection).insertOne({ ...record });
      return String(result.insertedId);
    } catch (err) {
      throw new PersistenceError(describeError(err), { cause: err });
    }
  }

  async getDocuments(
    collection: string,
    filter: Predicate = MATCH_ALL,
    limit: number = DEFAULT_LIST_LIMIT
  ): Promise<StoredDocument[]> {
    requireCollectionName(collection);
    const db = this.requireDb();
    // limit(0) means "unbounded" to the driver
    if (limit < 1) return [];
    try {
      const docs = await db
        .collection(collection)
        .find(toMongoFilter(filter))
        .sort({ _id: 1 })
        .limit(Math.floor(limit))
        .toArray();
      return docs.map(normalizeDocument);
    } catch (err) {
      throw new PersistenceError(describeError(err), { cause: err });
    }
  }

  status(): StoreStatus {
    return { connected: this.db !== null };
  }

  async listCollectionNames(): Promise<string[]> {
    const db = this.requireDb();
    const collections = await db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map(info => info.name);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.db = null;
    if (client) {
      await client.close();
    }
  }
}
