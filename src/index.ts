/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration.
 * 2. Point the transformers model cache at a local directory (dense mode only).
 * 3. Try to load the embedding model eagerly so the first ingest is fast; a
 *    failure is logged and every index falls back to TF-IDF.
 * 4. Replay clause archives from CLAUSE_STORE_DIR, if configured, so documents
 *    ingested by an earlier run stay queryable by id.
 * 5. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): enables polling
 *        /health for readiness & status.
 *
 * Exposed tools:
 *  - list_policies       : Policy files available under POLICY_ROOT.
 *  - ingest_policy       : Segment a document into clauses and index them.
 *  - get_clauses         : Clause list of an ingested document.
 *  - query_clauses       : Top-k clauses for a claim query.
 *  - build_claim_context : Top-k clauses formatted as decision evidence.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - POLICY_ROOT          Folder scanned for policy files. Default: working directory.
 *  - ALLOWED_EXT          Comma list of file extensions (no leading dots). Default pdf,txt.
 *  - EXCLUDED_FOLDERS     Comma list of folder names to skip when listing.
 *  - VERBOSE              '1'/'true'/'yes'/'on' enables extra logging.
 *  - VECTOR_BACKEND       'auto' (default) or 'sparse' to never load the model.
 *  - MODEL_NAME           Embedding model id (default Xenova/bge-base-en-v1.5).
 *  - MAX_FEATURES         TF-IDF vocabulary cap (default 1000).
 *  - DEFAULT_TOP_K        Clauses returned when top_k is omitted (default 5).
 *  - MAX_TOP_K            Upper bound for top_k (default 50).
 *  - DROP_BOILERPLATE     Drop page counters, URLs and registration lines before segmenting.
 *  - CONTEXT_MAX_CHARS    Character budget of build_claim_context (default 6000).
 *  - CLAUSE_STORE_DIR     If set, clause archives are written and replayed here.
 *  - MCP_TRANSPORT        'stdio' (default) or 'http'/'streamable-http'.
 *  - MCP_PORT / HOST      HTTP bind address (default 127.0.0.1:3000).
 *  - TRANSFORMERS_CACHE   Directory for model downloads.
 */
import { Embeddings } from "./embeddings";
import { configureTransformersCache } from "./cache";
import { DocumentRegistry } from "./document-registry";
import { PdfExtractor } from "./pdf-extractor";
import { PolicyLibrary } from "./policy-library";
import { ClauseArchive } from "./persistence";
import { createServer } from "./server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import { statusManager } from "./status";
import { getConfig, type Config } from "./config";
import { describeError } from "./errors";

const config: Config = getConfig();
const {
  POLICY_ROOT,
  ALLOWED_EXT,
  EXCLUDED_FOLDERS,
  VERBOSE,
  VECTOR_BACKEND,
  MODEL_NAME,
  MAX_FEATURES,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  DROP_BOILERPLATE,
  CONTEXT_MAX_CHARS,
  CLAUSE_STORE_DIR,
  CACHE_DIR,
  MCP_TRANSPORT,
} = config;

statusManager.setPolicyRoot(POLICY_ROOT);

let embeddings: Embeddings | undefined;
if (VECTOR_BACKEND === "auto") {
  await configureTransformersCache().catch((e: unknown) =>
    console.error("[Policy] Failed to set TRANSFORMERS cache directory:", e),
  );
  embeddings = new Embeddings(MODEL_NAME);
  statusManager.setModelName(embeddings.getModelName());
  // Not fatal: selectVectorizer retries per build and falls back to TF-IDF.
  await embeddings
    .init()
    .catch((e: unknown) =>
      console.error(`[Policy] Embedding model unavailable at startup: ${describeError(e)}`),
    );
} else {
  console.error("[Policy] VECTOR_BACKEND=sparse, using TF-IDF only");
}

const registry = new DocumentRegistry(
  {
    backend: VECTOR_BACKEND,
    embedder: embeddings,
    maxFeatures: MAX_FEATURES,
    dropBoilerplate: DROP_BOILERPLATE,
    verbose: VERBOSE,
    onProgress: (done, total) => statusManager.setProgress(done, total),
  },
  {
    onIndexed: (entry, activated) => {
      if (!activated) return;
      const documents = registry.list().length + (registry.get(entry.documentId) ? 0 : 1);
      statusManager.markIndexed({
        documentId: entry.documentId,
        backend: entry.index.backend,
        fallbackReason: entry.index.fallbackReason,
        clauses: entry.index.size,
        documents,
      });
    },
  },
);

const library = new PolicyLibrary({
  root: POLICY_ROOT,
  allowedExt: ALLOWED_EXT,
  excludedFolders: EXCLUDED_FOLDERS,
  pdfExtractor: new PdfExtractor(CACHE_DIR, VERBOSE),
  verbose: VERBOSE,
});

const archive = CLAUSE_STORE_DIR ? new ClauseArchive(CLAUSE_STORE_DIR, VERBOSE) : undefined;

// Replay archived documents; none becomes current until one is ingested.
if (archive) {
  const ids = await archive.list();
  for (const id of ids) {
    const record = await archive.load(id);
    if (!record?.clauses.length) continue;
    try {
      await registry.restore(record.clauses, {
        documentId: record.documentId,
        source: record.source,
        activate: false,
      });
    } catch (e) {
      console.error(`[Policy] Could not restore archive ${id}: ${describeError(e)}`);
    }
  }
  if (ids.length) console.error(`[Policy] Restored ${registry.list().length} archived document(s)`);
}

const serverFactory = () =>
  createServer({
    registry,
    library,
    archive,
    status: statusManager,
    defaultTopK: DEFAULT_TOP_K,
    maxTopK: MAX_TOP_K,
    contextMaxChars: CONTEXT_MAX_CHARS,
  });

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(serverFactory);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(serverFactory);
}
