/**
 * Shared domain types for the segmentation, vectorization and retrieval
 * layers. Everything that leaves the engine is read-only.
 */

/** Plain text of one page, as produced by the PDF text layer. */
export interface PageText {
  /** 1-based page number. */
  readonly pageNumber: number;
  readonly text: string;
}

/** A titled, page-referenced unit of policy text. */
export interface Clause {
  /** Positional id, assigned in discovery order (0-based). */
  readonly id: number;
  readonly title: string;
  readonly body: string;
  /** Page on which the clause's heading (or first line) appeared. */
  readonly page: number;
}

/** A clause before the store has assigned it an id. */
export type ClauseDraft = Omit<Clause, "id">;

export type VectorBackend = "dense" | "sparse";

/** Dense embedding, compared by cosine similarity. */
export type DenseVector = Float32Array;

/** Sparse TF-IDF vector: vocabulary term index -> weight. */
export type SparseVector = ReadonlyMap<number, number>;

export type FeatureVector = DenseVector | SparseVector;

/** A single ranked match returned by the retrieval engine. */
export interface RetrievalResult {
  readonly clauseId: number;
  /** Cosine similarity, higher is more relevant. */
  readonly score: number;
  /** 0-based position in descending score order. */
  readonly rank: number;
  readonly clause: Clause;
}

/** `(clauseId, score)` pair as produced by the similarity index. */
export interface ScoredId {
  readonly id: number;
  readonly score: number;
}
