import { describe, it, expect } from "vitest";
import { STOP_WORDS, extractTerms, tokenize } from "./tokenizer";

describe("tokenize", () => {
  it("lower-cases, drops stop words and single characters", () => {
    expect(tokenize("The insurer's liability is LIMITED to Rs. 5 lakh")).toEqual([
      "insurers",
      "liability",
      "limited",
      "rs",
      "lakh",
    ]);
  });

  it("keeps negations", () => {
    expect(STOP_WORDS.has("not")).toBe(false);
    expect(tokenize("not covered")).toEqual(["not", "covered"]);
  });
});

describe("extractTerms", () => {
  it("appends bigrams over the filtered tokens", () => {
    expect(extractTerms("dental and vision cover")).toEqual([
      "dental",
      "vision",
      "cover",
      "dental vision",
      "vision cover",
    ]);
  });

  it("returns unigrams only when maxN is 1", () => {
    expect(extractTerms("dental and vision cover", 1)).toEqual(["dental", "vision", "cover"]);
  });

  it("returns nothing for stop-word-only text", () => {
    expect(extractTerms("is it to the")).toEqual([]);
  });
});
