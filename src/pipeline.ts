import { createHash } from "node:crypto";
import type { Clause, PageText } from "./types";
import { normalizePageText } from "./normalizer";
import { segmentPages, type SegmentOptions } from "./segmenter";
import { buildIndex, type BuildIndexOptions, type ClauseIndex } from "./retrieval";
import { InputError } from "./errors";

export type ProcessDocumentOptions = SegmentOptions;

export interface IngestOptions extends ProcessDocumentOptions, Omit<BuildIndexOptions, "documentId"> {
  /** Overrides the content fingerprint as document id. */
  documentId?: string;
}

export interface ProcessedDocument {
  readonly documentId: string;
  readonly clauses: readonly Clause[];
  readonly index: ClauseIndex;
}

function normalizePages(pages: readonly PageText[]): PageText[] {
  return pages.map((p, i) => {
    if (!Number.isInteger(p.pageNumber) || p.pageNumber < 1) {
      throw new InputError(`Page at position ${i} has invalid page number ${p.pageNumber}`);
    }
    return { pageNumber: p.pageNumber, text: normalizePageText(p.text) };
  });
}

/**
 * SHA-256 over the normalized page texts: re-uploading the same policy yields
 * the same id even if the raw extraction differs in whitespace.
 */
export function fingerprintPages(pages: readonly PageText[]): string {
  const hash = createHash("sha256");
  for (const p of normalizePages(pages)) {
    hash.update(`${p.pageNumber}\u0000${p.text}\u0001`);
  }
  return hash.digest("hex");
}

/**
 * Normalize and segment a document. An empty document (no pages, or pages
 * with no text) yields no clauses rather than an error.
 *
 * @throws {InputError} If a page number is not a positive integer.
 */
export function processDocument(
  pages: readonly PageText[],
  options: ProcessDocumentOptions = {},
): Clause[] {
  return segmentPages(normalizePages(pages), options);
}

/**
 * Full pipeline for one upload: segment, then index.
 *
 * @throws {InputError} "No extractable text" when segmentation found nothing.
 * @throws {IndexBuildError} If vectorization failed in every backend.
 */
export async function ingestDocument(
  pages: readonly PageText[],
  options: IngestOptions = {},
): Promise<ProcessedDocument> {
  const clauses = processDocument(pages, options);
  if (!clauses.length) throw new InputError("No extractable text");
  const documentId = options.documentId ?? fingerprintPages(pages);
  const index = await buildIndex(clauses, { ...options, documentId });
  return { documentId, clauses: index.clauses, index };
}
