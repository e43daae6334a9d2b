/**
 * MCP tool surface over the clause engine.
 *
 * Tool contracts (all results are a single JSON text content block):
 *  list_policies
 *    Input:  {}
 *    Output: { root, policies: Array<{ path, size }> }
 *  ingest_policy
 *    Input:  { path?: string, pages?: Array<{ page_number, text }>, name?: string }
 *    Output: { documentId, source, backend, fallbackReason, status, restoredFromArchive,
 *              clauseCount, outline: Array<{ id, title, page }> }
 *    Errors: InvalidParams unless exactly one of path/pages; InvalidRequest when no text.
 *  get_clauses
 *    Input:  { document_id?: string }
 *    Output: { documentId, clauses: Clause[] }
 *  query_clauses
 *    Input:  { query: string, top_k?: number, document_id?: string }
 *    Output: { documentId, backend, query, matches: Array<{ rank, clauseId, score, title, page, body }> }
 *  build_claim_context
 *    Input:  { query: string, top_k?: number, document_id?: string, max_chars?: number }
 *    Output: ClaimContext
 *
 * Documents default to the most recently ingested one.
 */
import {
  Server,
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
} from "./mcp-sdk";
import type { PageText } from "./types";
import type { DocumentEntry, DocumentRegistry } from "./document-registry";
import type { PolicyLibrary } from "./policy-library";
import type { ClauseArchive } from "./persistence";
import type { StatusManager } from "./status";
import { fingerprintPages } from "./pipeline";
import { buildClaimContext } from "./claim-context";
import { APP_VERSION } from "./config";
import { BackendUnavailableError, InputError, InvalidArgumentError } from "./errors";

export interface ServerDeps {
  registry: DocumentRegistry;
  library?: PolicyLibrary;
  archive?: ClauseArchive;
  status?: StatusManager;
  defaultTopK: number;
  maxTopK: number;
  contextMaxChars: number;
}

type Args = Record<string, unknown>;

function json(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function optionalString(args: Args, key: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new McpError(ErrorCode.InvalidParams, `${key} must be a string`);
  return v;
}

function optionalNumber(args: Args, key: string): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new McpError(ErrorCode.InvalidParams, `${key} must be a number`);
  }
  return v;
}

function requiredQuery(args: Args): string {
  const query = optionalString(args, "query");
  if (query === undefined) throw new McpError(ErrorCode.InvalidParams, "Missing query");
  return query;
}

function parsePages(v: unknown): PageText[] {
  if (!Array.isArray(v)) throw new McpError(ErrorCode.InvalidParams, "pages must be an array");
  return v.map((p: unknown, i) => {
    if (typeof p !== "object" || p === null) {
      throw new McpError(ErrorCode.InvalidParams, `pages[${i}] must be an object`);
    }
    const text = "text" in p ? p.text : undefined;
    if (typeof text !== "string") {
      throw new McpError(ErrorCode.InvalidParams, `pages[${i}].text must be a string`);
    }
    const pageNumber = "page_number" in p ? p.page_number : i + 1;
    if (typeof pageNumber !== "number") {
      throw new McpError(ErrorCode.InvalidParams, `pages[${i}].page_number must be a number`);
    }
    return { pageNumber, text };
  });
}

/**
 * Input errors are caller errors here. A dense index whose model fails while
 * embedding a query surfaces as an internal error; everything else propagates as-is.
 */
function toMcpError(err: unknown): unknown {
  if (err instanceof InputError) return new McpError(ErrorCode.InvalidRequest, err.message);
  if (err instanceof InvalidArgumentError) return new McpError(ErrorCode.InvalidParams, err.message);
  if (err instanceof BackendUnavailableError) {
    return new McpError(ErrorCode.InternalError, `Embedding backend unavailable: ${err.message}`);
  }
  return err;
}

function summarize(entry: DocumentEntry, restoredFromArchive: boolean) {
  const { index } = entry;
  return {
    documentId: entry.documentId,
    source: entry.source ?? null,
    backend: index.backend,
    fallbackReason: index.fallbackReason ?? null,
    status: index.status,
    restoredFromArchive,
    clauseCount: index.size,
    outline: index.clauses.map((c) => ({ id: c.id, title: c.title, page: c.page })),
  };
}

/**
 * Factory for an MCP Server with the clause tools registered. A fresh server
 * is created per transport session; the registry (and with it every index)
 * is shared.
 */
export function createServer(deps: ServerDeps): Server {
  const { registry, library, archive, status } = deps;

  const clampTopK = (args: Args) => {
    const k = optionalNumber(args, "top_k") ?? deps.defaultTopK;
    return Math.max(1, Math.min(deps.maxTopK, Math.floor(k)));
  };

  async function ingest(args: Args): Promise<CallToolResult> {
    const relPath = optionalString(args, "path");
    const hasPages = args.pages !== undefined && args.pages !== null;
    if ((relPath === undefined) === !hasPages) {
      throw new McpError(ErrorCode.InvalidParams, "Provide exactly one of 'path' or 'pages'");
    }
    let pages: PageText[];
    let source = optionalString(args, "name");
    if (relPath !== undefined) {
      if (!library) throw new McpError(ErrorCode.InvalidRequest, "No policy folder configured");
      pages = await library.loadPages(relPath);
      source ??= relPath;
    } else {
      pages = parsePages(args.pages);
    }

    status?.startBuild();
    try {
      const documentId = fingerprintPages(pages);
      const archived = archive ? await archive.load(documentId) : null;
      if (archived?.clauses.length) {
        const entry = await registry.restore(archived.clauses, {
          documentId,
          source: source ?? archived.source,
        });
        return json(summarize(entry, true));
      }
      const entry = await registry.ingest(pages, { documentId, source });
      await archive?.save({
        documentId,
        source,
        backend: entry.index.backend,
        clauses: entry.index.clauses,
      });
      return json(summarize(entry, false));
    } finally {
      status?.endBuild();
    }
  }

  async function query(args: Args): Promise<CallToolResult> {
    const q = requiredQuery(args);
    const entry = registry.resolve(optionalString(args, "document_id"));
    const results = await entry.index.retrieve(q, clampTopK(args));
    return json({
      documentId: entry.documentId,
      backend: entry.index.backend,
      query: q,
      matches: results.map((r) => ({
        rank: r.rank,
        clauseId: r.clauseId,
        score: Number(r.score.toFixed(4)),
        title: r.clause.title,
        page: r.clause.page,
        body: r.clause.body,
      })),
    });
  }

  async function context(args: Args): Promise<CallToolResult> {
    const q = requiredQuery(args);
    const entry = registry.resolve(optionalString(args, "document_id"));
    const results = await entry.index.retrieve(q, clampTopK(args));
    const maxChars = optionalNumber(args, "max_chars") ?? deps.contextMaxChars;
    return json({
      documentId: entry.documentId,
      ...buildClaimContext(q, results, { maxChars: Math.floor(maxChars) }),
    });
  }

  const server = new Server(
    { name: "policy-clause-retriever", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "list_policies",
          description: "List policy documents (PDF or text) available in the configured policy folder.",
          inputSchema: { type: "object", properties: {} },
        },
        {
          name: "ingest_policy",
          description:
            "Segment a policy document into clauses and build its retrieval index. The document becomes the default for later queries.",
          inputSchema: {
            type: "object",
            properties: {
              path: {
                type: "string",
                description: "Policy file path relative to the policy folder (use forward slashes).",
              },
              pages: {
                type: "array",
                description: "Already extracted page text, in reading order.",
                items: {
                  type: "object",
                  properties: {
                    page_number: { type: "number", minimum: 1 },
                    text: { type: "string" },
                  },
                  required: ["text"],
                },
              },
              name: { type: "string", description: "Display name for the document." },
            },
          },
        },
        {
          name: "get_clauses",
          description: "Return the clauses (id, title, body, page) of an ingested policy.",
          inputSchema: {
            type: "object",
            properties: {
              document_id: {
                type: "string",
                description: "Document id from ingest_policy. Defaults to the latest document.",
              },
            },
          },
        },
        {
          name: "query_clauses",
          description:
            "Rank the clauses of an ingested policy by relevance to a free-text claim query.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Claim description or coverage question." },
              top_k: {
                type: "number",
                description: `Maximum number of clauses to return (1-${deps.maxTopK}). Defaults to ${deps.defaultTopK}.`,
                minimum: 1,
                maximum: deps.maxTopK,
              },
              document_id: { type: "string" },
            },
            required: ["query"],
          },
        },
        {
          name: "build_claim_context",
          description:
            "Retrieve the clauses relevant to a claim query and format them as evidence for a coverage decision.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string" },
              top_k: { type: "number", minimum: 1, maximum: deps.maxTopK },
              document_id: { type: "string" },
              max_chars: {
                type: "number",
                description: `Character budget for the context text. Defaults to ${deps.contextMaxChars}.`,
                minimum: 1,
              },
            },
            required: ["query"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const args: Args = req.params.arguments ?? {};
    try {
      switch (req.params.name) {
        case "list_policies": {
          if (!library) return json({ root: null, policies: [] });
          const files = await library.discover();
          return json({
            root: library.getRoot(),
            policies: files.map((f) => ({ path: f.rel, size: f.size })),
          });
        }
        case "ingest_policy":
          return await ingest(args);
        case "get_clauses": {
          const entry = registry.resolve(optionalString(args, "document_id"));
          return json({ documentId: entry.documentId, clauses: entry.index.clauses });
        }
        case "query_clauses":
          return await query(args);
        case "build_claim_context":
          return await context(args);
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (err) {
      throw toMcpError(err);
    }
  });

  return server;
}
