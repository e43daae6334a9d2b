import type { FeatureVector, ScoredId, SparseVector } from "./types";
import { InvalidArgumentError } from "./errors";

function isDense(v: FeatureVector): v is Float32Array {
  return v instanceof Float32Array;
}

/** Euclidean norm of a dense or sparse vector. */
export function magnitude(v: FeatureVector): number {
  let sum = 0;
  if (isDense(v)) {
    for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  } else {
    for (const w of v.values()) sum += w * w;
  }
  return Math.sqrt(sum);
}

function sparseDot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, w] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += w * other;
  }
  return dot;
}

/**
 * Dot product. Dense vectors of different lengths are compared up to the
 * shorter length; mixing a dense and a sparse vector is a caller error.
 */
export function dot(a: FeatureVector, b: FeatureVector): number {
  if (isDense(a) && isDense(b)) {
    let sum = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) sum += a[i] * b[i];
    return sum;
  }
  if (!isDense(a) && !isDense(b)) return sparseDot(a, b);
  throw new InvalidArgumentError("Cannot compare a dense vector with a sparse vector");
}

function cosineFromParts(dotProduct: number, normA: number, normB: number): number {
  if (normA === 0 || normB === 0) return 0;
  const s = dotProduct / (normA * normB);
  return Math.max(-1, Math.min(1, s));
}

/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector on either side scores
 * 0 against everything.
 */
export function cosineSimilarity(a: FeatureVector, b: FeatureVector): number {
  return cosineFromParts(dot(a, b), magnitude(a), magnitude(b));
}

interface Entry<V extends FeatureVector> {
  readonly id: number;
  readonly vector: V;
  readonly norm: number;
}

/**
 * Exact nearest-neighbour search by cosine similarity. Corpora are a single
 * document's clauses, so a linear scan over precomputed norms is enough.
 */
export class SimilarityIndex<V extends FeatureVector> {
  private readonly entries: readonly Entry<V>[];

  public constructor(vectors: ReadonlyMap<number, V>) {
    this.entries = Object.freeze(
      [...vectors]
        .sort(([a], [b]) => a - b)
        .map(([id, vector]) => ({ id, vector, norm: magnitude(vector) })),
    );
  }

  public get size(): number {
    return this.entries.length;
  }

  public has(id: number): boolean {
    return this.entries.some((e) => e.id === id);
  }

  /** Every stored id with its score, descending; ties by ascending id. */
  public search(query: V): ScoredId[] {
    const qNorm = magnitude(query);
    const scored = this.entries.map((e) => ({
      id: e.id,
      score: cosineFromParts(dot(query, e.vector), qNorm, e.norm),
    }));
    scored.sort((a, b) => b.score - a.score || a.id - b.id);
    return scored;
  }
}
