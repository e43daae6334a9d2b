import type { RetrievalResult } from "./types";
import { InvalidArgumentError } from "./errors";

export interface ContextClause {
  rank: number;
  clauseId: number;
  title: string;
  page: number;
  score: number;
  body: string;
}

/** Evidence handed to the reasoning service alongside the claim query. */
export interface ClaimContext {
  query: string;
  clauses: ContextClause[];
  /** Clauses rendered as prompt text, best match first. */
  text: string;
  /** True when clauses were dropped or cut to respect the budget. */
  truncated: boolean;
}

export interface ClaimContextOptions {
  /** Character budget for `text` (default 6000). */
  maxChars?: number;
}

function header(r: RetrievalResult): string {
  return `Clause ${r.rank + 1}: ${r.clause.title} (Page ${r.clause.page})`;
}

/**
 * Pack ranked clauses into a bounded context block. Clauses are added in rank
 * order until the next one would overflow the budget; the top clause is
 * always included, with its body cut if it alone is too long.
 */
export function buildClaimContext(
  query: string,
  results: readonly RetrievalResult[],
  opts: ClaimContextOptions = {},
): ClaimContext {
  const maxChars = opts.maxChars ?? 6000;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new InvalidArgumentError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  const blocks: string[] = [];
  const clauses: ContextClause[] = [];
  let used = 0;
  let truncated = false;

  for (const r of results) {
    const head = header(r);
    let body = r.clause.body;
    const sep = blocks.length ? 2 : 0;
    let block = body ? `${head}\n${body}` : head;
    if (used + sep + block.length > maxChars) {
      truncated = true;
      if (blocks.length) break;
      body = body.slice(0, Math.max(0, maxChars - head.length - 1)).trimEnd();
      block = body ? `${head}\n${body}` : head.slice(0, maxChars);
    }
    blocks.push(block);
    used += sep + block.length;
    clauses.push({
      rank: r.rank,
      clauseId: r.clauseId,
      title: r.clause.title,
      page: r.clause.page,
      score: r.score,
      body,
    });
    if (truncated) break;
  }

  return { query, clauses, text: blocks.join("\n\n"), truncated };
}
