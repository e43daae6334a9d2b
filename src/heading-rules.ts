import sectionKeywordList from "../data/section-keywords.json" with { type: "json" };
import { STOP_WORDS } from "./tokenizer";

export type HeadingKind = "numbered" | "uppercase" | "keyword";
export type LineKind = HeadingKind | "body";

/** A pure predicate over one normalized line, tagged with the kind it detects. */
export interface HeadingRule {
  readonly kind: HeadingKind;
  matches(line: string): boolean;
}

/** Longest line still considered a heading. */
export const HEADING_MAX_LENGTH = 120;
/** Most words a heading may have. */
export const HEADING_MAX_WORDS = 12;
/** Most words a keyword heading ("Coverage Details") may have. */
export const KEYWORD_HEADING_MAX_WORDS = 8;

const SECTION_KEYWORDS: readonly string[] = sectionKeywordList;

// "1." "2)" "1.2" "1.2." "A." "iv)" "(a)" "(iii)" followed by an upper-case word.
const NUMBERED_HEADING =
  /^(?:\((?:\d{1,3}|[A-Za-z]|[ivxlc]{1,6}|[IVXLC]{1,6})\)|\d{1,3}(?:\.\d{1,3})+\.?|(?:\d{1,3}|[A-Za-z]|[ivxlc]{1,6}|[IVXLC]{1,6})[.):])\s+\p{Lu}/u;
const SENTENCE_END = /[.?!;,]$/;

function wordCount(line: string): number {
  return line.split(/\s+/).filter(Boolean).length;
}

/** Length, word count and punctuation limits shared by every rule. */
function headingShaped(line: string, maxWords = HEADING_MAX_WORDS): boolean {
  return (
    line.length > 0 &&
    line.length <= HEADING_MAX_LENGTH &&
    wordCount(line) <= maxWords &&
    !SENTENCE_END.test(line)
  );
}

function isNumberedHeading(line: string): boolean {
  return headingShaped(line) && NUMBERED_HEADING.test(line);
}

function isUppercaseHeading(line: string): boolean {
  if (!headingShaped(line)) return false;
  if (!/\p{Lu}/u.test(line) || /\p{Ll}/u.test(line)) return false;
  // "AND / OR", "RS 500" and the like are not headings
  return line
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .some((w) => w.length >= 3 && !STOP_WORDS.has(w));
}

function isKeywordHeading(line: string): boolean {
  const label = line.replace(/\s*:$/, "");
  if (!headingShaped(label, KEYWORD_HEADING_MAX_WORDS)) return false;
  if (!/^\p{Lu}/u.test(label)) return false;
  const lower = label.toLowerCase();
  return SECTION_KEYWORDS.some((keyword) => {
    if (lower === keyword) return true;
    if (!lower.startsWith(`${keyword} `)) return false;
    // "Coverage Details" but not "Coverage is provided for all members"
    return label
      .split(/\s+/)
      .every((w) => w.length < 4 || /^[\p{Lu}\p{N}(]/u.test(w));
  });
}

/** Heading rules in precedence order; the first match wins. */
export const HEADING_RULES: readonly HeadingRule[] = [
  { kind: "numbered", matches: isNumberedHeading },
  { kind: "uppercase", matches: isUppercaseHeading },
  { kind: "keyword", matches: isKeywordHeading },
];

export function classifyLine(line: string): LineKind {
  const trimmed = line.trim();
  for (const rule of HEADING_RULES) {
    if (rule.matches(trimmed)) return rule.kind;
  }
  return "body";
}

export function isHeading(line: string): boolean {
  return classifyLine(line) !== "body";
}

const BOILERPLATE_MARKERS = [
  "uin:",
  "irda",
  "regn. no.",
  "reg. no.",
  "cin:",
  "gstin",
  "subject matter of solicitation",
  "trade logo",
  "corporate office",
  "registered office",
  "toll-free",
  "toll free",
  "website:",
  "e-mail:",
  "internal use only",
];
const PAGE_COUNTER = /^(?:page\s*\d+(?:\s*(?:of|\/)\s*\d+)?|\d+\s*(?:of|\/)\s*\d+)$/i;
const WEB_OR_MAIL = /(?:\bwww\.|https?:\/\/|\b[\w.+-]+@[\w-]+\.[\w.]+)/i;

/**
 * Running headers and footers: page counters, regulator registration lines,
 * addresses of the insurer's offices, web and e-mail lines.
 */
export function isBoilerplateLine(line: string): boolean {
  const lower = line.trim().toLowerCase();
  if (!lower) return false;
  if (PAGE_COUNTER.test(lower)) return true;
  if (WEB_OR_MAIL.test(lower)) return true;
  return BOILERPLATE_MARKERS.some((marker) => lower.includes(marker));
}
