import { APP_VERSION } from "./config";
import type { VectorBackend } from "./types";

/**
 * Progress counters of the index build currently (or last) running.
 */
export interface IndexingStatus {
  /** Clauses produced by segmentation for the document being indexed. */
  clausesTotal: number;
  /** Clauses vectorized so far (dense mode reports as it goes). */
  clausesVectorized: number;
}

/**
 * In-memory snapshot of server lifecycle + indexing progress, served on
 * `/health` in HTTP mode.
 *
 * ready = true once at least one document is indexed and queryable.
 */
export interface ServerStatus {
  version: string;
  /** Folder scanned for policy documents. */
  policyRoot: string;
  /** Embedding model name, empty when running TF-IDF only. */
  modelName: string;
  /** Backend of the current index, if any. */
  backend: VectorBackend | null;
  /** Why the current index is not dense although dense was preferred. */
  fallbackReason: string | null;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  building: boolean;
  currentDocumentId: string | null;
  documents: number;
  startedAt: string;
  indexing: IndexingStatus;
}

/**
 * Class wrapper around mutable server status state.
 */
export class StatusManager {
  private readonly data: ServerStatus;
  private buildsInFlight = 0;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      policyRoot: initial?.policyRoot ?? "",
      modelName: initial?.modelName ?? "",
      backend: initial?.backend ?? null,
      fallbackReason: initial?.fallbackReason ?? null,
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      building: initial?.building ?? false,
      currentDocumentId: initial?.currentDocumentId ?? null,
      documents: initial?.documents ?? 0,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? { clausesTotal: 0, clausesVectorized: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setPolicyRoot(root: string) {
    this.data.policyRoot = root;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** A build started; counters restart for the new document. */
  public startBuild(clausesTotal = 0) {
    this.buildsInFlight++;
    this.data.building = true;
    this.data.indexing.clausesTotal = clausesTotal;
    this.data.indexing.clausesVectorized = 0;
  }

  public setProgress(done: number, total: number) {
    this.data.indexing.clausesVectorized = done;
    this.data.indexing.clausesTotal = total;
  }

  /** A build finished (successfully or not). Stays building while others run. */
  public endBuild() {
    this.buildsInFlight = Math.max(0, this.buildsInFlight - 1);
    this.data.building = this.buildsInFlight > 0;
  }

  /** Record the index that just became current. */
  public markIndexed(info: {
    documentId: string;
    backend: VectorBackend;
    fallbackReason?: string;
    clauses: number;
    documents: number;
  }) {
    this.data.currentDocumentId = info.documentId;
    this.data.backend = info.backend;
    this.data.fallbackReason = info.fallbackReason ?? null;
    this.data.documents = info.documents;
    this.data.indexing.clausesTotal = info.clauses;
    this.data.indexing.clausesVectorized = info.clauses;
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (entry point, transports, health checks).
export const statusManager = new StatusManager();
