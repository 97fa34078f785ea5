/**
 * Store-neutral filter expressions.
 * Each DocumentStore interprets these in its own query dialect; nothing above the store builds native queries.
 */

export type FieldValue = string | number | boolean;

export type Predicate =
  /** Matches every document. */
  | { kind: "all" }
  /** Exact field equality. The `id` field refers to the surrogate identifier. */
  | { kind: "equals"; field: string; value: FieldValue }
  /** Case-insensitive substring match on a string field. The term is literal text, not a pattern. */
  | { kind: "contains"; field: string; term: string }
  /** Matches when any member matches; an empty list matches nothing. */
  | { kind: "or"; predicates: Predicate[] };

export const MATCH_ALL: Predicate = { kind: "all" };

export function equals(field: string, value: FieldValue): Predicate {
  return { kind: "equals", field, value };
}

export function contains(field: string, term: string): Predicate {
  return { kind: "contains", field, term };
}

export function or(...predicates: Predicate[]): Predicate {
  return { kind: "or", predicates };
}

/** Escapes regex metacharacters so a search term matches literally. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Evaluates a predicate against a plain document (in-memory stores).
 * `id` must already hold the surrogate identifier as a string.
 */
export function matchesPredicate(predicate: Predicate, doc: Record<string, unknown>): boolean {
  switch (predicate.kind) {
    case "all":
      return true;
    case "equals":
      return doc[predicate.field] === predicate.value;
    case "contains": {
      const value = doc[predicate.field];
      return typeof value === "string" && value.toLowerCase().includes(predicate.term.toLowerCase());
    }
    case "or":
      return predicate.predicates.some(member => matchesPredicate(member, doc));
    default: {
      const exhaustive: never = predicate;
      throw new Error(`Unknown predicate ${JSON.stringify(exhaustive)}`);
    }
  }
}
