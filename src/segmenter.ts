import type { Clause, PageText } from "./types";
import { ClauseStore } from "./clause-store";
import { isBoilerplateLine, isHeading } from "./heading-rules";

export interface SegmentOptions {
  /** Drop running headers/footers before segmentation (default false). */
  dropBoilerplate?: boolean;
}

interface OpenClause {
  /** `null` until a heading names it; a positional label is used then. */
  title: string | null;
  page: number;
  lines: string[];
}

/** Join body lines, keeping at most one blank line between paragraphs. */
function joinBody(lines: readonly string[]): string {
  const out: string[] = [];
  for (const line of lines) {
    if (line === "" && (out.length === 0 || out[out.length - 1] === "")) continue;
    out.push(line);
  }
  while (out.length && out[out.length - 1] === "") out.pop();
  return out.join("\n");
}

function positionalTitle(store: ClauseStore): string {
  return `Section ${store.size + 1}`;
}

function flush(store: ClauseStore, open: OpenClause | null): void {
  if (!open) return;
  const body = joinBody(open.lines);
  if (open.title === null && !body) return;
  store.append({ title: open.title ?? positionalTitle(store), body, page: open.page });
}

/**
 * Partition normalized page text into clauses.
 *
 * Lines between two headings become the body of the first one. Text ahead of
 * the first heading gets a positional title, and a clause runs across page
 * boundaries until the next heading. A document in which no heading is
 * detected at all yields one clause per non-empty page.
 */
export function segmentPages(pages: readonly PageText[], options: SegmentOptions = {}): Clause[] {
  const store = new ClauseStore();
  const prepared = pages.map((p) => ({
    page: p.pageNumber,
    lines: p.text
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => !(options.dropBoilerplate && isBoilerplateLine(l))),
  }));

  if (!prepared.some((p) => p.lines.some((l) => l !== "" && isHeading(l)))) {
    for (const p of prepared) {
      const body = joinBody(p.lines);
      if (body) store.append({ title: positionalTitle(store), body, page: p.page });
    }
    return [...store.all()];
  }

  let open: OpenClause | null = null;
  for (const { page, lines } of prepared) {
    // paragraph break where a clause carries over from the previous page
    if (open) open.lines.push("");
    for (const line of lines) {
      if (line !== "" && isHeading(line)) {
        flush(store, open);
        open = { title: line, page, lines: [] };
        continue;
      }
      if (!open) {
        if (line === "") continue;
        open = { title: null, page, lines: [] };
      }
      open.lines.push(line);
    }
  }
  flush(store, open);
  return [...store.all()];
}
