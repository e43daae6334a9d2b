import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Client, ErrorCode, InMemoryTransport } from "./mcp-sdk";
import { createServer, type ServerDeps } from "./server";
import { DocumentRegistry } from "./document-registry";
import { ClauseArchive } from "./persistence";
import { StatusManager } from "./status";
import { fingerprintPages } from "./pipeline";
import { FakeEmbedder, POLICY_TEXT, policyPages } from "../test/factories";

const PAGES = [{ page_number: 1, text: POLICY_TEXT }];

async function connect(deps: Partial<ServerDeps> = {}): Promise<Client> {
  const server = createServer({
    registry: new DocumentRegistry({ backend: "sparse" }),
    defaultTopK: 5,
    maxTopK: 10,
    contextMaxChars: 6000,
    ...deps,
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "policy-test-client", version: "0.0.0" });
  await client.connect(clientTransport);
  return client;
}

async function callJson(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = "content" in result ? result.content : undefined;
  if (!Array.isArray(content)) throw new Error("tool returned no content");
  const first: unknown = content[0];
  if (typeof first !== "object" || first === null || !("text" in first)) {
    throw new Error("tool returned no text content");
  }
  const text: unknown = first.text;
  if (typeof text !== "string") throw new Error("tool returned no text content");
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

describe("MCP tools", () => {
  let client: Client;

  beforeEach(async () => {
    client = await connect();
  });

  afterEach(async () => {
    await client.close();
  });

  it("lists the clause tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual([
      "list_policies",
      "ingest_policy",
      "get_clauses",
      "query_clauses",
      "build_claim_context",
    ]);
  });

  it("ingests pages and returns the clause outline", async () => {
    expect(await callJson(client, "ingest_policy", { pages: PAGES, name: "dental.pdf" })).toEqual({
      documentId: fingerprintPages(policyPages()),
      source: "dental.pdf",
      backend: "sparse",
      fallbackReason: null,
      status: "ready",
      restoredFromArchive: false,
      clauseCount: 2,
      outline: [
        { id: 0, title: "1. Coverage", page: 1 },
        { id: 1, title: "2. Exclusions", page: 1 },
      ],
    });
  });

  it("answers a claim query with the most relevant clause", async () => {
    await callJson(client, "ingest_policy", { pages: PAGES });
    const payload = await callJson(client, "query_clauses", {
      query: "Is dental treatment covered?",
      top_k: 1,
    });
    expect(payload).toMatchObject({
      backend: "sparse",
      query: "Is dental treatment covered?",
      matches: [
        {
          rank: 0,
          clauseId: 0,
          title: "1. Coverage",
          page: 1,
          body: "Dental treatment is covered up to Rs 50000 per year.",
        },
      ],
    });
  });

  it("clamps top_k to the configured maximum", async () => {
    await callJson(client, "ingest_policy", { pages: PAGES });
    const payload = await callJson(client, "query_clauses", { query: "dental", top_k: 1000 });
    expect(payload).toMatchObject({ matches: [{ clauseId: 0 }, { clauseId: 1 }] });
  });

  it("returns the clauses of the current document", async () => {
    await callJson(client, "ingest_policy", { pages: PAGES });
    expect(await callJson(client, "get_clauses")).toMatchObject({
      clauses: [
        { id: 0, title: "1. Coverage" },
        { id: 1, title: "2. Exclusions", body: "Pre-existing conditions excluded.", page: 1 },
      ],
    });
  });

  it("builds a claim context", async () => {
    await callJson(client, "ingest_policy", { pages: PAGES });
    expect(
      await callJson(client, "build_claim_context", { query: "dental treatment", top_k: 1 }),
    ).toMatchObject({
      query: "dental treatment",
      text: "Clause 1: 1. Coverage (Page 1)\nDental treatment is covered up to Rs 50000 per year.",
      truncated: false,
    });
  });

  it("reports an empty policy folder when none is configured", async () => {
    expect(await callJson(client, "list_policies")).toEqual({ root: null, policies: [] });
  });

  it("rejects bad requests", async () => {
    await expect(client.callTool({ name: "query_clauses", arguments: { query: "x" } })).rejects.toThrow(
      "No policy document has been ingested yet",
    );
    await expect(client.callTool({ name: "query_clauses", arguments: {} })).rejects.toThrow(
      "Missing query",
    );
    await expect(client.callTool({ name: "ingest_policy", arguments: {} })).rejects.toThrow(
      "Provide exactly one of 'path' or 'pages'",
    );
    await expect(
      client.callTool({ name: "ingest_policy", arguments: { pages: [{ text: "   " }] } }),
    ).rejects.toThrow("No extractable text");
    await expect(
      client.callTool({ name: "ingest_policy", arguments: { path: "a.pdf" } }),
    ).rejects.toThrow("No policy folder configured");
    await expect(client.callTool({ name: "no_such_tool", arguments: {} })).rejects.toThrow(
      "Unknown tool: no_such_tool",
    );
  });
});

describe("MCP tools on a dense index", () => {
  it("reports a query the embedding model cannot embed as an internal error", async () => {
    const registry = new DocumentRegistry({ embedder: new FakeEmbedder({ failOn: "cancel" }) });
    const client = await connect({ registry });
    try {
      expect(await callJson(client, "ingest_policy", { pages: PAGES })).toMatchObject({ backend: "dense" });
      const call = client.callTool({ name: "query_clauses", arguments: { query: "cancel my policy" } });
      await expect(call).rejects.toThrow("Embedding backend unavailable: Embedding query failed");
      await expect(
        client.callTool({ name: "query_clauses", arguments: { query: "cancel my policy" } }),
      ).rejects.toMatchObject({ code: ErrorCode.InternalError });
    } finally {
      await client.close();
    }
  });
});

describe("MCP tools with a clause archive", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "clause-server-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("restores a re-uploaded document from its archive", async () => {
    const status = new StatusManager();
    const client = await connect({ archive: new ClauseArchive(dir), status });
    try {
      expect(await callJson(client, "ingest_policy", { pages: PAGES })).toMatchObject({
        restoredFromArchive: false,
      });
      expect(await callJson(client, "ingest_policy", { pages: PAGES })).toMatchObject({
        restoredFromArchive: true,
        clauseCount: 2,
      });
      expect(status.getStatus().building).toBe(false);
    } finally {
      await client.close();
    }
  });
});
