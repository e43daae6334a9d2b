import { describe, it, expect } from "vitest";
import { normalizePageText, normalizeQuery } from "./normalizer";

describe("normalizePageText", () => {
  it("returns an empty string for non-string or empty input", () => {
    expect(normalizePageText(undefined)).toBe("");
    expect(normalizePageText(null)).toBe("");
    expect(normalizePageText(42)).toBe("");
    expect(normalizePageText("")).toBe("");
  });

  it("collapses spaces, trims lines and keeps one blank line between paragraphs", () => {
    expect(normalizePageText("  a  \t b  \r\n\r\n\r\n c ")).toBe("a b\n\nc");
  });

  it("drops leading and trailing blank lines", () => {
    expect(normalizePageText("\n\n  Coverage \n\n")).toBe("Coverage");
  });

  it("rejoins words split by a hyphenated line break", () => {
    expect(normalizePageText("cover-\nage is provided")).toBe("coverage is provided");
  });

  it("keeps a hyphen followed by a capitalized line", () => {
    expect(normalizePageText("Self-\nInsured")).toBe("Self-\nInsured");
  });

  it("removes zero-width and control characters", () => {
    expect(normalizePageText("co\u200Bver\u00ADage")).toBe("coverage");
    expect(normalizePageText("a\u0007b")).toBe("ab");
  });

  it("maps no-break spaces and compatibility forms", () => {
    expect(normalizePageText("Rs\u00A050000")).toBe("Rs 50000");
    expect(normalizePageText("\uFB01le")).toBe("file");
  });

  it("turns form feed and vertical tab into line breaks", () => {
    expect(normalizePageText("Coverage\fDental care\u000Bis covered")).toBe(
      "Coverage\nDental care\nis covered",
    );
  });

  it("turns NEL and the Unicode line and paragraph separators into line breaks", () => {
    expect(normalizePageText("a \u2028 b")).toBe("a\nb");
    expect(normalizePageText("a\u2029b")).toBe("a\nb");
    expect(normalizePageText("a\u0085b")).toBe("a\nb");
  });

  it("maps the ogham space mark to a single space", () => {
    expect(normalizePageText("a \u1680 b")).toBe("a b");
  });
});

describe("normalizeQuery", () => {
  it("flattens the query to a single trimmed line", () => {
    expect(normalizeQuery("  dental\n\ncover  ")).toBe("dental cover");
  });

  it("yields an empty string for blank input", () => {
    expect(normalizeQuery(" \n\t ")).toBe("");
  });
});

