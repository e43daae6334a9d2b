import { describe, it, expect } from "vitest";
import { segmentPages } from "./segmenter";
import type { Clause } from "./types";

const POLICY_PAGE =
  "1. Coverage\nDental treatment is covered up to Rs 50000 per year.\n2. Exclusions\nPre-existing conditions excluded.";

describe("segmentPages", () => {
  it("splits a page at numbered headings", () => {
    expect(segmentPages([{ pageNumber: 1, text: POLICY_PAGE }])).toEqual([
      {
        id: 0,
        title: "1. Coverage",
        body: "Dental treatment is covered up to Rs 50000 per year.",
        page: 1,
      },
      { id: 1, title: "2. Exclusions", body: "Pre-existing conditions excluded.", page: 1 },
    ]);
  });

  it("returns no clauses for no pages", () => {
    expect(segmentPages([])).toEqual([]);
  });

  it("gives text before the first heading a positional title", () => {
    const clauses = segmentPages([
      { pageNumber: 1, text: "This policy is issued by the insurer.\n1. Coverage\nDental is covered." },
    ]);
    expect(clauses.map((c) => [c.title, c.body])).toEqual([
      ["Section 1", "This policy is issued by the insurer."],
      ["1. Coverage", "Dental is covered."],
    ]);
  });

  it("carries a clause across a page break", () => {
    const clauses = segmentPages([
      { pageNumber: 1, text: "1. Coverage\nDental is covered." },
      { pageNumber: 2, text: "Vision is covered too.\n2. Exclusions\nCosmetic surgery." },
    ]);
    expect(clauses).toEqual([
      { id: 0, title: "1. Coverage", body: "Dental is covered.\n\nVision is covered too.", page: 1 },
      { id: 1, title: "2. Exclusions", body: "Cosmetic surgery.", page: 2 },
    ]);
  });

  it("makes one clause per non-empty page when no heading is found", () => {
    const clauses = segmentPages([
      { pageNumber: 1, text: "just some text here." },
      { pageNumber: 2, text: "" },
      { pageNumber: 3, text: "more text on page three." },
    ]);
    expect(clauses).toEqual([
      { id: 0, title: "Section 1", body: "just some text here.", page: 1 },
      { id: 1, title: "Section 2", body: "more text on page three.", page: 3 },
    ]);
  });

  it("keeps a heading without body text", () => {
    const clauses = segmentPages([{ pageNumber: 1, text: "GENERAL CONDITIONS\n1. Renewal\nRenewal is annual." }]);
    expect(clauses.map((c) => [c.title, c.body])).toEqual([
      ["GENERAL CONDITIONS", ""],
      ["1. Renewal", "Renewal is annual."],
    ]);
  });

  it("drops running headers and footers when asked", () => {
    const page = { pageNumber: 1, text: "Page 1 of 2\n1. Coverage\nDental is covered.\nwww.example.com" };
    expect(segmentPages([page], { dropBoilerplate: true })).toEqual([
      { id: 0, title: "1. Coverage", body: "Dental is covered.", page: 1 },
    ]);
    expect(segmentPages([page]).map((c) => [c.title, c.body])).toEqual([
      ["Section 1", "Page 1 of 2"],
      ["1. Coverage", "Dental is covered.\nwww.example.com"],
    ]);
  });

  it("partitions every non-empty line into exactly one clause, in order", () => {
    const pages = [
      { pageNumber: 1, text: "1. Definitions\nHospital means a registered facility.\n\nDay care is included." },
      { pageNumber: 2, text: "2. Coverage\nIn-patient care.\nEXCLUSIONS\nCosmetic surgery.\nWaiting Period\nThirty days." },
    ];
    const flatten = (c: Clause) => [c.title, ...c.body.split("\n").filter(Boolean)];
    const input = pages.flatMap((p) => p.text.split("\n").filter(Boolean));
    const clauses = segmentPages(pages);
    expect(clauses.flatMap(flatten)).toEqual(input);
    expect(clauses.map((c) => c.id)).toEqual([0, 1, 2, 3]);
  });
});
