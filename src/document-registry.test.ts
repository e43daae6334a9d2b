import { describe, it, expect } from "vitest";
import { DocumentRegistry, type DocumentEntry } from "./document-registry";
import { InvalidArgumentError } from "./errors";
import { FakeEmbedder, policyPages } from "../test/factories";

const VISION_TEXT = "1. Vision Care\nSpectacles are covered once a year.\n2. Cancellation\nNotice of thirty days.";

describe("DocumentRegistry", () => {
  it("makes the latest ingested document current", async () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    const first = await registry.ingest(policyPages(), { documentId: "dental" });
    expect(registry.getCurrent()).toBe(first);
    const second = await registry.ingest(policyPages(VISION_TEXT), { documentId: "vision" });
    expect(registry.getCurrent()).toBe(second);
    expect(registry.list().map((e) => e.documentId)).toEqual(["dental", "vision"]);
    expect(registry.resolve()).toBe(second);
    expect(registry.resolve("dental")).toBe(first);
  });

  it("leaves handles taken before a swap answering from their own snapshot", async () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    const before = await registry.ingest(policyPages(), { documentId: "dental" });
    await registry.ingest(policyPages(VISION_TEXT), { documentId: "vision" });
    const [top] = await before.index.retrieve("dental treatment", 1);
    expect(top.clause.title).toBe("1. Coverage");
  });

  it("runs builds one at a time in submission order", async () => {
    const order: string[] = [];
    const registry = new DocumentRegistry(
      { embedder: new FakeEmbedder({ slowMs: 30 }) },
      { onIndexed: (entry: DocumentEntry) => order.push(entry.documentId) },
    );
    const slow = registry.ingest(policyPages("1. Slow Clause\nTakes a while."), { documentId: "slow" });
    const fast = registry.ingest(policyPages(), { documentId: "fast" });
    await Promise.all([slow, fast]);
    expect(order).toEqual(["slow", "fast"]);
    expect(registry.getCurrent()?.documentId).toBe("fast");
  });

  it("keeps serving after a failed build", async () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    const ok = await registry.ingest(policyPages(), { documentId: "dental" });
    await expect(registry.ingest([])).rejects.toThrow("No extractable text");
    expect(registry.getCurrent()).toBe(ok);
    await expect(registry.ingest(policyPages(VISION_TEXT))).resolves.toBeDefined();
  });

  it("restores archived clauses with or without activating them", async () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    const clauses = [{ id: 0, title: "1. Coverage", body: "Dental is covered.", page: 1 }];
    const activated: boolean[] = [];
    const hooked = new DocumentRegistry(
      { backend: "sparse" },
      { onIndexed: (_entry, isCurrent) => activated.push(isCurrent) },
    );
    await hooked.restore(clauses, { documentId: "archived", activate: false });
    await hooked.restore(clauses, { documentId: "latest" });
    expect(activated).toEqual([false, true]);
    expect(hooked.getCurrent()?.documentId).toBe("latest");

    const entry = await registry.restore(clauses, { documentId: "archived", activate: false });
    expect(registry.getCurrent()).toBeNull();
    expect(registry.get("archived")).toBe(entry);
    expect(entry.index.size).toBe(1);
  });

  it("rejects unknown documents and queries before any ingest", () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    expect(() => registry.resolve()).toThrow("No policy document has been ingested yet");
    expect(() => registry.resolve("missing")).toThrow(InvalidArgumentError);
  });

  it("clears the current document when it is removed", async () => {
    const registry = new DocumentRegistry({ backend: "sparse" });
    await registry.ingest(policyPages(), { documentId: "dental" });
    expect(registry.remove("dental")).toBe(true);
    expect(registry.getCurrent()).toBeNull();
    expect(registry.remove("dental")).toBe(false);
  });
});
