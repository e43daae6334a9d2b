import { describe, it, expect } from "vitest";
import { buildIndex, processDocument, retrieve, InputError, ingestDocument } from "./engine";
import { policyPages } from "../test/factories";

describe("engine entry point", () => {
  it("segments, indexes and retrieves through the public API", async () => {
    const clauses = processDocument(policyPages());
    const index = await buildIndex(clauses, { backend: "sparse" });
    const [top] = await retrieve(index, "Is dental treatment covered?", 3);
    expect(top.clause.title).toBe("1. Coverage");
  });

  it("treats an empty document as an empty index", async () => {
    const index = await buildIndex(processDocument([]), { backend: "sparse" });
    expect(await retrieve(index, "dental", 5)).toEqual([]);
    await expect(ingestDocument([])).rejects.toBeInstanceOf(InputError);
  });
});
