import fs from "node:fs/promises";
import path from "node:path";
import type { Clause, VectorBackend } from "./types";

/** On-disk shape of one archived document. */
export interface ClauseArchiveRecord {
  documentId: string;
  source?: string;
  backend: VectorBackend;
  savedAt: string;
  clauses: Clause[];
}

export interface SaveParams {
  documentId: string;
  source?: string;
  backend: VectorBackend;
  clauses: readonly Clause[];
}

const ARCHIVE_VERSION = 1;
const DOCUMENT_ID = /^[A-Za-z0-9_-]{1,128}$/;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseClause(raw: unknown, position: number): Clause | null {
  if (!isRecord(raw)) return null;
  const { id, title, body, page } = raw;
  if (
    id !== position ||
    typeof title !== "string" ||
    typeof body !== "string" ||
    typeof page !== "number" ||
    !Number.isInteger(page) ||
    page < 1
  ) {
    return null;
  }
  return { id: position, title, body, page };
}

/**
 * Clause archive: one JSON file per document under a directory. Only clauses
 * are stored; vectors are rebuilt when an archive is restored, so an archive
 * stays valid across model changes.
 */
export class ClauseArchive {
  /** Directory holding `<documentId>.json` files. */
  private readonly dir: string;
  private readonly verbose: boolean;

  /**
   * @param dir     Directory for the archive files (created on first save).
   * @param verbose Whether to emit verbose logging.
   */
  public constructor(dir: string, verbose = false) {
    this.dir = dir;
    this.verbose = verbose;
  }

  private fileFor(documentId: string): string {
    if (!DOCUMENT_ID.test(documentId)) {
      throw new TypeError(`Invalid document id for archive: ${documentId}`);
    }
    return path.join(this.dir, `${documentId}.json`);
  }

  /** Persist the clauses of one document, replacing any earlier archive. */
  public async save(params: SaveParams): Promise<void> {
    const file = this.fileFor(params.documentId);
    const out = {
      version: ARCHIVE_VERSION,
      documentId: params.documentId,
      source: params.source,
      backend: params.backend,
      savedAt: new Date().toISOString(),
      clauses: params.clauses.map((c) => ({ id: c.id, title: c.title, body: c.body, page: c.page })),
    };
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(file, JSON.stringify(out));
    if (this.verbose) console.error(`[Policy][verbose] Archived ${out.clauses.length} clauses to ${file}`);
  }

  /**
   * Load an archived document. Missing, unreadable, or structurally invalid
   * archives yield `null` (the caller re-ingests the source instead).
   */
  public async load(documentId: string): Promise<ClauseArchiveRecord | null> {
    const file = this.fileFor(documentId);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (isRecord(e) && e.code === "ENOENT") return null;
      throw e;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      console.error(`[Policy] Corrupt clause archive at ${file}:`, e);
      return null;
    }
    if (!isRecord(parsed) || parsed.version !== ARCHIVE_VERSION || !Array.isArray(parsed.clauses)) {
      console.error(`[Policy] Unsupported clause archive format at ${file}`);
      return null;
    }
    const { source, backend, savedAt } = parsed;
    const clauses: Clause[] = [];
    for (const [i, c] of parsed.clauses.entries()) {
      const clause = parseClause(c, i);
      if (!clause) {
        console.error(`[Policy] Clause archive ${file} has an invalid clause at position ${i}`);
        return null;
      }
      clauses.push(clause);
    }
    return {
      documentId,
      source: typeof source === "string" ? source : undefined,
      backend: backend === "dense" ? "dense" : "sparse",
      savedAt: typeof savedAt === "string" ? savedAt : "",
      clauses,
    };
  }

  /** Ids of every archived document, sorted. */
  public async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (e) {
      if (isRecord(e) && e.code === "ENOENT") return [];
      throw e;
    }
    return names
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .filter((id) => DOCUMENT_ID.test(id))
      .sort();
  }
}
