import { pipeline, FeatureExtractionPipeline } from "@xenova/transformers";
import type { TextEmbedder } from "./vectorizer";

/** Default sentence-embedding model for policy text. */
export const DEFAULT_MODEL_NAME = "Xenova/bge-base-en-v1.5";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Dense text embeddings through a local `@xenova/transformers`
 * feature-extraction pipeline. A single instance is shared by every index
 * built in the process; the model is loaded once.
 */
export class Embeddings implements TextEmbedder {
  private readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  public constructor(modelName?: string) {
    // Resolution precedence: explicit ctor arg > MODEL_NAME env var > default model
    this.modelName = modelName?.trim() || process.env.MODEL_NAME?.trim() || DEFAULT_MODEL_NAME;
  }

  /** @returns Resolved (possibly defaulted) underlying model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Lazily load the pipeline (idempotent; concurrent callers share one load).
   * A failed load is not cached so a later call may retry.
   */
  public async init(): Promise<void> {
    if (this.embedder) return;
    if (!this.loading) {
      console.error(`[Policy] Loading embedding model: ${this.modelName}`);
      this.loading = pipeline("feature-extraction", this.modelName);
    }
    try {
      this.embedder = await this.loading;
      console.error(`[Policy] Model ready: ${this.modelName}`);
    } finally {
      this.loading = null;
    }
  }

  /**
   * Embed one string with mean pooling and L2 normalization.
   *
   * @throws {EmbedderNotInitializedError} If {@link init} has not completed.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    const output = await this.embedder(text, { pooling: "mean", normalize: true });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new TypeError(`Model ${this.modelName} did not return float32 embeddings`);
    }
    return data;
  }
}
