import type { Clause, DenseVector, FeatureVector, SparseVector, VectorBackend } from "./types";
import { extractTerms } from "./tokenizer";
import { BackendUnavailableError, InvalidArgumentError, describeError } from "./errors";

/**
 * Common contract of the dense and sparse strategies. A vectorizer is bound
 * to one index: it is selected when the index is built and never swapped.
 */
export interface Vectorizer<V extends FeatureVector = FeatureVector> {
  readonly backend: VectorBackend;
  vectorizeCorpus(clauses: readonly Clause[]): Promise<Map<number, V>>;
  vectorizeQuery(text: string): Promise<V>;
}

/** Anything that turns text into a dense embedding (see `Embeddings`). */
export interface TextEmbedder {
  init(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  getModelName(): string;
}

export type ProgressCallback = (done: number, total: number) => void;

// ---------------------------------------------------------------------------
// Dense
// ---------------------------------------------------------------------------

export class DenseVectorizer implements Vectorizer<DenseVector> {
  public readonly backend = "dense";

  public constructor(
    private readonly embedder: TextEmbedder,
    private readonly onProgress?: ProgressCallback,
  ) {}

  public get modelName(): string {
    return this.embedder.getModelName();
  }

  public async vectorizeCorpus(clauses: readonly Clause[]): Promise<Map<number, DenseVector>> {
    const vectors = new Map<number, DenseVector>();
    for (const clause of clauses) {
      try {
        vectors.set(clause.id, await this.embedder.embed(`${clause.title}: ${clause.body}`));
      } catch (e) {
        throw new BackendUnavailableError(
          `Embedding clause ${clause.id} failed: ${describeError(e)}`,
          { cause: e },
        );
      }
      this.onProgress?.(vectors.size, clauses.length);
    }
    return vectors;
  }

  public async vectorizeQuery(text: string): Promise<DenseVector> {
    try {
      return await this.embedder.embed(text);
    } catch (e) {
      throw new BackendUnavailableError(`Embedding query failed: ${describeError(e)}`, {
        cause: e,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Sparse (TF-IDF)
// ---------------------------------------------------------------------------

export interface SparseVectorizerOptions {
  /** Vocabulary cap, most frequent corpus terms first (default 1000). */
  maxFeatures?: number;
  /** Longest n-gram used as a term (default 2). */
  ngramMax?: number;
}

interface TfIdfModel {
  readonly vocabulary: ReadonlyMap<string, number>;
  readonly idf: Float64Array;
}

function countTerms(terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const t of terms) counts.set(t, (counts.get(t) ?? 0) + 1);
  return counts;
}

/**
 * Term-frequency / inverse-document-frequency vectors. The vocabulary is
 * learned from the corpus of one document; query terms outside it carry no
 * weight. Vectors are L2-normalized.
 */
export class SparseVectorizer implements Vectorizer<SparseVector> {
  public readonly backend = "sparse";
  private readonly maxFeatures: number;
  private readonly ngramMax: number;
  private model: TfIdfModel | null = null;

  public constructor(opts: SparseVectorizerOptions = {}) {
    this.maxFeatures = opts.maxFeatures ?? 1000;
    this.ngramMax = opts.ngramMax ?? 2;
    if (!Number.isInteger(this.maxFeatures) || this.maxFeatures < 1) {
      throw new InvalidArgumentError(`maxFeatures must be a positive integer, got ${this.maxFeatures}`);
    }
  }

  /** Number of terms in the fitted vocabulary (0 before fitting). */
  public get vocabularySize(): number {
    return this.model?.vocabulary.size ?? 0;
  }

  public async vectorizeCorpus(clauses: readonly Clause[]): Promise<Map<number, SparseVector>> {
    if (this.model) throw new InvalidArgumentError("SparseVectorizer is already fitted to a corpus");
    const docs = clauses.map((c) => ({
      id: c.id,
      counts: countTerms(extractTerms(`${c.title} ${c.body}`, this.ngramMax)),
    }));

    const totals = new Map<string, number>();
    const docFreq = new Map<string, number>();
    for (const { counts } of docs) {
      for (const [term, n] of counts) {
        totals.set(term, (totals.get(term) ?? 0) + n);
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }

    const kept = [...totals.entries()]
      .sort(([ta, na], [tb, nb]) => nb - na || (ta < tb ? -1 : ta > tb ? 1 : 0))
      .slice(0, this.maxFeatures)
      .map(([term]) => term)
      .sort();
    const vocabulary = new Map(kept.map((term, i) => [term, i] as const));
    const idf = new Float64Array(kept.length);
    const n = docs.length;
    kept.forEach((term, i) => {
      idf[i] = Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1;
    });
    this.model = { vocabulary, idf };

    return new Map(docs.map(({ id, counts }) => [id, this.weigh(counts)] as const));
  }

  public async vectorizeQuery(text: string): Promise<SparseVector> {
    return this.weigh(countTerms(extractTerms(text, this.ngramMax)));
  }

  private weigh(counts: ReadonlyMap<string, number>): SparseVector {
    const out = new Map<number, number>();
    if (!this.model) return out;
    const { vocabulary, idf } = this.model;
    let sumSq = 0;
    for (const [term, tf] of counts) {
      const idx = vocabulary.get(term);
      if (idx === undefined) continue;
      const w = tf * idf[idx];
      out.set(idx, w);
      sumSq += w * w;
    }
    if (sumSq > 0) {
      const norm = Math.sqrt(sumSq);
      for (const [idx, w] of out) out.set(idx, w / norm);
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/** `auto` prefers dense embeddings and degrades to TF-IDF; `sparse` never loads a model. */
export type BackendPreference = "auto" | "sparse";

export interface SelectVectorizerOptions extends SparseVectorizerOptions {
  backend?: BackendPreference;
  embedder?: TextEmbedder;
  onProgress?: ProgressCallback;
}

export interface VectorizerSelection {
  vectorizer: DenseVectorizer | SparseVectorizer;
  /** Why dense mode was not used although it was preferred. */
  fallbackReason?: string;
}

export function createSparseVectorizer(opts: SparseVectorizerOptions = {}): SparseVectorizer {
  return new SparseVectorizer({ maxFeatures: opts.maxFeatures, ngramMax: opts.ngramMax });
}

/**
 * Pick the strategy for a new index. An embedder that cannot initialize is
 * not an error: the caller gets a sparse vectorizer and the reason.
 */
export async function selectVectorizer(
  opts: SelectVectorizerOptions = {},
): Promise<VectorizerSelection> {
  const preference = opts.backend ?? "auto";
  if (preference === "sparse") return { vectorizer: createSparseVectorizer(opts) };
  if (!opts.embedder) {
    return { vectorizer: createSparseVectorizer(opts), fallbackReason: "No embedding backend configured" };
  }
  try {
    await opts.embedder.init();
    return { vectorizer: new DenseVectorizer(opts.embedder, opts.onProgress) };
  } catch (e) {
    const reason = `Embedding model ${opts.embedder.getModelName()} unavailable: ${describeError(e)}`;
    console.error(`[Policy] ${reason}. Falling back to TF-IDF vectors.`);
    return { vectorizer: createSparseVectorizer(opts), fallbackReason: reason };
  }
}
