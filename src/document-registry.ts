import type { Clause, PageText } from "./types";
import { ingestDocument, type IngestOptions } from "./pipeline";
import { buildIndex, type ClauseIndex } from "./retrieval";
import { InvalidArgumentError } from "./errors";

export interface DocumentEntry {
  readonly documentId: string;
  /** Where the pages came from (file path, upload name). */
  readonly source?: string;
  readonly index: ClauseIndex;
  readonly ingestedAt: string;
}

export interface RegistryHooks {
  /**
   * Called once a new index is built, right before it is registered.
   * `activated` tells whether it is about to become the current document.
   */
  onIndexed?(entry: DocumentEntry, activated: boolean): void;
}

export interface IngestMeta {
  source?: string;
  documentId?: string;
}

/**
 * Owns the indexes of every processed document and the notion of the
 * "current" one. Builds run one at a time; a finished index replaces the
 * current reference in a single assignment, so queries already holding the
 * previous handle complete against that snapshot.
 */
export class DocumentRegistry {
  private readonly documents = new Map<string, DocumentEntry>();
  private current: DocumentEntry | null = null;
  private queue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly defaults: IngestOptions = {},
    private readonly hooks: RegistryHooks = {},
  ) {}

  /** Segment and index a document, then make it current. */
  public ingest(pages: readonly PageText[], meta: IngestMeta = {}): Promise<DocumentEntry> {
    return this.enqueue(async () => {
      const doc = await ingestDocument(pages, { ...this.defaults, documentId: meta.documentId });
      return this.install(doc.documentId, doc.index, meta.source);
    });
  }

  /**
   * Rebuild the index of previously archived clauses. It becomes current
   * unless `activate` is false (used when replaying archives at startup).
   */
  public restore(
    clauses: readonly Clause[],
    meta: { documentId: string; source?: string; activate?: boolean },
  ): Promise<DocumentEntry> {
    return this.enqueue(async () => {
      const index = await buildIndex(clauses, { ...this.defaults, documentId: meta.documentId });
      return this.install(meta.documentId, index, meta.source, meta.activate ?? true);
    });
  }

  public get(documentId: string): DocumentEntry | undefined {
    return this.documents.get(documentId);
  }

  public getCurrent(): DocumentEntry | null {
    return this.current;
  }

  /**
   * The named document, or the current one when no id is given.
   *
   * @throws {InvalidArgumentError} If the document is unknown or nothing was ingested yet.
   */
  public resolve(documentId?: string): DocumentEntry {
    if (documentId) {
      const entry = this.documents.get(documentId);
      if (!entry) throw new InvalidArgumentError(`Unknown document: ${documentId}`);
      return entry;
    }
    if (!this.current) throw new InvalidArgumentError("No policy document has been ingested yet");
    return this.current;
  }

  public list(): DocumentEntry[] {
    return [...this.documents.values()];
  }

  /** Forget a document. Removing the current one leaves no current document. */
  public remove(documentId: string): boolean {
    if (this.current?.documentId === documentId) this.current = null;
    return this.documents.delete(documentId);
  }

  private install(
    documentId: string,
    index: ClauseIndex,
    source: string | undefined,
    activate = true,
  ): DocumentEntry {
    const entry: DocumentEntry = Object.freeze({
      documentId,
      source,
      index,
      ingestedAt: new Date().toISOString(),
    });
    this.hooks.onIndexed?.(entry, activate);
    this.documents.set(documentId, entry);
    if (activate) this.current = entry;
    return entry;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
