/**
 * Library entry point: the clause engine without the MCP surface.
 *
 *   const clauses = processDocument(pages);
 *   const index = await buildIndex(clauses, { backend: "sparse" });
 *   const top = await retrieve(index, "Is dental treatment covered?", 3);
 */
export type {
  Clause,
  ClauseDraft,
  DenseVector,
  FeatureVector,
  PageText,
  RetrievalResult,
  ScoredId,
  SparseVector,
  VectorBackend,
} from "./types";
export { normalizePageText, normalizeQuery } from "./normalizer";
export { classifyLine, isHeading, isBoilerplateLine, HEADING_RULES } from "./heading-rules";
export type { HeadingKind, HeadingRule, LineKind } from "./heading-rules";
export { segmentPages } from "./segmenter";
export type { SegmentOptions } from "./segmenter";
export { ClauseStore } from "./clause-store";
export { tokenize, extractTerms } from "./tokenizer";
export {
  DenseVectorizer,
  SparseVectorizer,
  selectVectorizer,
  createSparseVectorizer,
} from "./vectorizer";
export type {
  BackendPreference,
  ProgressCallback,
  SelectVectorizerOptions,
  TextEmbedder,
  Vectorizer,
} from "./vectorizer";
export { SimilarityIndex, cosineSimilarity } from "./similarity";
export { ClauseIndex, buildIndex, retrieve } from "./retrieval";
export type { BuildIndexOptions, IndexStatus } from "./retrieval";
export { processDocument, ingestDocument, fingerprintPages } from "./pipeline";
export type { IngestOptions, ProcessDocumentOptions, ProcessedDocument } from "./pipeline";
export { DocumentRegistry } from "./document-registry";
export type { DocumentEntry, IngestMeta, RegistryHooks } from "./document-registry";
export { buildClaimContext } from "./claim-context";
export type { ClaimContext, ClaimContextOptions, ContextClause } from "./claim-context";
export {
  ClauseEngineError,
  InputError,
  BackendUnavailableError,
  InvalidArgumentError,
  IndexBuildError,
} from "./errors";
export type { ClauseEngineErrorCode } from "./errors";
