import type { Clause, ClauseDraft } from "./types";
import { InvalidArgumentError } from "./errors";

function clauseKey(c: ClauseDraft): string {
  return JSON.stringify([c.page, c.title, c.body]);
}

/**
 * Ordered, append-only collection of the clauses of one document. Ids are
 * positional: the n-th appended clause gets id n - 1. Appending a clause that
 * repeats the page, title and body of an earlier one is a no-op.
 */
export class ClauseStore {
  private readonly clauses: Clause[] = [];
  private readonly keys = new Set<string>();

  /**
   * Rebuild a store from clauses that were persisted earlier. Ids must be
   * exactly 0..n-1 in order; anything else means the archive was tampered
   * with or belongs to another store.
   */
  public static from(clauses: readonly Clause[]): ClauseStore {
    const store = new ClauseStore();
    clauses.forEach((c, i) => {
      if (c.id !== i) {
        throw new InvalidArgumentError(`Clause ids must be positional: expected ${i}, got ${c.id}`);
      }
      if (!store.append(c)) {
        throw new InvalidArgumentError(`Clause ${c.id} duplicates an earlier clause`);
      }
    });
    return store;
  }

  /** @returns The stored clause, or `null` if it was a duplicate. */
  public append(draft: ClauseDraft): Clause | null {
    const key = clauseKey(draft);
    if (this.keys.has(key)) return null;
    this.keys.add(key);
    const clause: Clause = Object.freeze({
      id: this.clauses.length,
      title: draft.title,
      body: draft.body,
      page: draft.page,
    });
    this.clauses.push(clause);
    return clause;
  }

  public get(id: number): Clause | undefined {
    return this.clauses[id];
  }

  public get size(): number {
    return this.clauses.length;
  }

  /** Snapshot of the clauses in id order. */
  public all(): readonly Clause[] {
    return Object.freeze([...this.clauses]);
  }
}
