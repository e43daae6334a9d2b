/**
 * Cleanup for text coming out of the PDF text layer.
 *
 * Output guarantees: no control characters besides `\n`, single spaces only,
 * lines trimmed, at most one blank line between paragraphs, no leading or
 * trailing whitespace, and words split by a hyphenated line break rejoined.
 */

// Form feed, vertical tab, NEL and the Unicode line/paragraph separators end a line.
const LINE_BREAKS = /[\f\v\u0085\u2028\u2029]/g;
// Everything below U+0020 except TAB (\x09) and LF (\x0A), plus DEL and C1 controls.
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;
const INLINE_SPACE = /[\t\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g;
const ZERO_WIDTH = /[\u200B-\u200D\uFEFF\u00AD]/g;
// "cover-\nage" -> "coverage": a letter, a hyphen at the end of the line and a
// lower-case continuation on the next one.
const HYPHEN_BREAK = /(\p{L})-[ \t]*\n[ \t]*(\p{Ll})/gu;

/**
 * Normalize the raw text of one page. Never throws: anything that is not a
 * non-empty string yields `""`.
 */
export function normalizePageText(raw: unknown): string {
  if (typeof raw !== "string" || raw.length === 0) return "";

  let text = raw.normalize("NFKC").replace(/\r\n?/g, "\n").replace(LINE_BREAKS, "\n");
  text = text.replace(ZERO_WIDTH, "").replace(CONTROL_CHARS, "").replace(INLINE_SPACE, " ");
  text = text.replace(HYPHEN_BREAK, "$1$2");

  const lines = text.split("\n").map((line) => line.replace(/ {2,}/g, " ").trim());
  const out: string[] = [];
  for (const line of lines) {
    // keep a single blank line as the paragraph boundary
    if (line === "" && (out.length === 0 || out[out.length - 1] === "")) continue;
    out.push(line);
  }
  while (out.length && out[out.length - 1] === "") out.pop();
  return out.join("\n");
}

/** Normalize a free-text query to a single trimmed line. */
export function normalizeQuery(raw: unknown): string {
  return normalizePageText(raw).replace(/\n+/g, " ");
}
