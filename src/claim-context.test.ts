import { describe, it, expect } from "vitest";
import { buildClaimContext } from "./claim-context";
import { InvalidArgumentError } from "./errors";
import type { RetrievalResult } from "./types";

const RESULTS: RetrievalResult[] = [
  {
    clauseId: 0,
    score: 0.9,
    rank: 0,
    clause: { id: 0, title: "1. Coverage", body: "Dental is covered.", page: 1 },
  },
  {
    clauseId: 2,
    score: 0.4,
    rank: 1,
    clause: { id: 2, title: "3. Limits", body: "Up to Rs 50000.", page: 2 },
  },
];

// "Clause 1: 1. Coverage (Page 1)" is 30 characters, the first block 49
const FIRST_BLOCK = "Clause 1: 1. Coverage (Page 1)\nDental is covered.";

describe("buildClaimContext", () => {
  it("renders ranked clauses with titles and pages", () => {
    const ctx = buildClaimContext("Root canal claim", RESULTS);
    expect(ctx.text).toBe(`${FIRST_BLOCK}\n\nClause 2: 3. Limits (Page 2)\nUp to Rs 50000.`);
    expect(ctx.truncated).toBe(false);
    expect(ctx.query).toBe("Root canal claim");
    expect(ctx.clauses.map((c) => [c.rank, c.clauseId, c.title, c.page])).toEqual([
      [0, 0, "1. Coverage", 1],
      [1, 2, "3. Limits", 2],
    ]);
  });

  it("stops before a clause that would overflow the budget", () => {
    const ctx = buildClaimContext("q", RESULTS, { maxChars: 60 });
    expect(ctx.text).toBe(FIRST_BLOCK);
    expect(ctx.clauses).toHaveLength(1);
    expect(ctx.truncated).toBe(true);
  });

  it("cuts the body of a top clause that alone exceeds the budget", () => {
    const ctx = buildClaimContext("q", RESULTS, { maxChars: 40 });
    expect(ctx.text).toBe("Clause 1: 1. Coverage (Page 1)\nDental is");
    expect(ctx.text).toHaveLength(40);
    expect(ctx.clauses[0].body).toBe("Dental is");
    expect(ctx.truncated).toBe(true);
  });

  it("renders a clause without body as its header", () => {
    const ctx = buildClaimContext("q", [
      { clauseId: 0, score: 1, rank: 0, clause: { id: 0, title: "GENERAL CONDITIONS", body: "", page: 4 } },
    ]);
    expect(ctx.text).toBe("Clause 1: GENERAL CONDITIONS (Page 4)");
  });

  it("returns an empty context for no results", () => {
    expect(buildClaimContext("q", [])).toEqual({ query: "q", clauses: [], text: "", truncated: false });
  });

  it("rejects a non-positive budget", () => {
    expect(() => buildClaimContext("q", RESULTS, { maxChars: 0 })).toThrow(InvalidArgumentError);
  });
});
