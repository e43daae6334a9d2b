import type { Clause, FeatureVector, RetrievalResult, ScoredId, VectorBackend } from "./types";
import { ClauseStore } from "./clause-store";
import { SimilarityIndex } from "./similarity";
import { normalizeQuery } from "./normalizer";
import {
  createSparseVectorizer,
  selectVectorizer,
  type SelectVectorizerOptions,
  type Vectorizer,
} from "./vectorizer";
import { IndexBuildError, InvalidArgumentError, describeError } from "./errors";

export interface BuildIndexOptions extends SelectVectorizerOptions {
  /** Identifier of the document the clauses came from. */
  documentId?: string;
  verbose?: boolean;
}

/** `empty` is a successful build over zero clauses, not a failure. */
export type IndexStatus = "ready" | "empty";

/** A vectorizer paired with the similarity index built from its corpus vectors. */
interface Searcher {
  readonly size: number;
  search(query: string): Promise<ScoredId[]>;
}

async function bindSearcher<V extends FeatureVector>(
  vectorizer: Vectorizer<V>,
  clauses: readonly Clause[],
): Promise<Searcher> {
  const index = new SimilarityIndex(await vectorizer.vectorizeCorpus(clauses));
  return {
    size: index.size,
    search: async (query) => index.search(await vectorizer.vectorizeQuery(query)),
  };
}

/**
 * Immutable handle over one document's clauses and their vectors. Handles
 * are never patched: processing a document again produces a new handle.
 * {@link retrieve} is read-only, so any number of queries may run against a
 * handle at once.
 */
export class ClauseIndex {
  public readonly builtAt = new Date().toISOString();

  public constructor(
    public readonly documentId: string | undefined,
    public readonly clauses: readonly Clause[],
    public readonly backend: VectorBackend,
    public readonly fallbackReason: string | undefined,
    private readonly searcher: Searcher,
  ) {
    Object.freeze(this);
  }

  public get size(): number {
    return this.clauses.length;
  }

  public get status(): IndexStatus {
    return this.clauses.length ? "ready" : "empty";
  }

  public getClause(id: number): Clause | undefined {
    return this.clauses[id];
  }

  /**
   * Top-`k` clauses for `query`, best first, ties by ascending clause id.
   * Returns `min(k, size)` results; a blank query returns none.
   *
   * @throws {InvalidArgumentError} If `k` is not a positive integer.
   */
  public async retrieve(query: string, k: number): Promise<RetrievalResult[]> {
    const q = normalizeQuery(query);
    if (!q) return [];
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }
    if (!this.searcher.size) return [];
    const scored = await this.searcher.search(q);
    return scored.slice(0, k).map(({ id, score }, rank) => ({
      clauseId: id,
      score,
      rank,
      clause: this.clauses[id],
    }));
  }
}

/**
 * Vectorize `clauses` and build the similarity index over them. The backend
 * is chosen here, once: dense when an embedder is available and loads, TF-IDF
 * otherwise, or when dense embedding fails part-way through the corpus.
 *
 * @throws {InvalidArgumentError} If clause ids are not positional.
 * @throws {IndexBuildError} If no backend could vectorize the corpus.
 */
export async function buildIndex(
  clauses: readonly Clause[],
  options: BuildIndexOptions = {},
): Promise<ClauseIndex> {
  const snapshot = ClauseStore.from(clauses).all();
  const { vectorizer, fallbackReason } = await selectVectorizer(options);

  let backend: VectorBackend = vectorizer.backend;
  let reason = fallbackReason;
  let searcher: Searcher;
  try {
    searcher = await bindSearcher<FeatureVector>(vectorizer, snapshot);
  } catch (e) {
    if (vectorizer.backend !== "dense") {
      throw new IndexBuildError(`Could not build TF-IDF index: ${describeError(e)}`, { cause: e });
    }
    reason = `Dense vectorization failed: ${describeError(e)}`;
    console.error(`[Policy] ${reason}. Rebuilding the index with TF-IDF vectors.`);
    backend = "sparse";
    try {
      searcher = await bindSearcher<FeatureVector>(createSparseVectorizer(options), snapshot);
    } catch (e2) {
      throw new IndexBuildError(`Could not build TF-IDF index: ${describeError(e2)}`, {
        cause: e2,
      });
    }
  }

  if (searcher.size !== snapshot.length) {
    throw new IndexBuildError(
      `Vectorized ${searcher.size} of ${snapshot.length} clauses for ${options.documentId ?? "document"}`,
    );
  }
  if (options.verbose) {
    console.error(
      `[Policy][verbose] Indexed ${snapshot.length} clauses (${backend}) for ${options.documentId ?? "document"}`,
    );
  }
  return new ClauseIndex(options.documentId, snapshot, backend, reason, searcher);
}

/** Functional form of {@link ClauseIndex.retrieve}. */
export function retrieve(index: ClauseIndex, query: string, k: number): Promise<RetrievalResult[]> {
  return index.retrieve(query, k);
}
