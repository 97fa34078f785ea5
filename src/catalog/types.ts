/**
 * Core domain types for the games catalog.
 * Schemas double as the validation boundary: anything typed as `Game` has been through `GameSchema`.
 */
import { z, ZodIssue } from "zod";

/** Collection that holds every catalog entry. */
export const GAME_COLLECTION = "game";

/** Default and maximum page size for listings. */
export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 1000;

export const GameSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  genre: z.string().min(1),
  platform: z.string().min(1),
  size_gb: z.number().nonnegative(),
  thumbnail: z.string().url(),
  screenshots: z.array(z.string().url()).default([]),
  download_url: z.string().url()
});

/** A catalog entry as accepted from clients and persisted. Unknown keys are stripped. */
export type Game = z.infer<typeof GameSchema>;

/** Public representation: the game plus its store-assigned identifier. */
export interface PublicGame extends Game {
  id: string;
}

export const ListQuerySchema = z.object({
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT)
});

export type ListQuery = z.infer<typeof ListQuerySchema>;

/**
 * Base class for catalog failures. `code` is stable and machine-readable; the message is shown to clients.
 */
export class CatalogError extends Error {
  constructor(public code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogError";
  }
}

/** Payload rejected before reaching persistence. */
export class ValidationError extends CatalogError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
  }
}

/** Store unreachable, write rejected, or a driver-level failure. `cause` keeps the original error. */
export class PersistenceError extends CatalogError {
  constructor(message: string, options?: ErrorOptions) {
    super("PERSISTENCE_FAILED", message, options);
    this.name = "PersistenceError";
  }
}

/** Renders zod issues as `path: message` pairs. */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validates an untrusted payload into a `Game`, throwing ValidationError on failure. */
export function parseGame(input: unknown): Game {
  const result = GameSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error.issues));
  }
  return result.data;
}

/** Validates listing query parameters (`q`, `limit`). */
export function parseListQuery(input: unknown): ListQuery {
  const result = ListQuerySchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error.issues));
  }
  return result.data;
}

/** Best-effort string form of anything thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
