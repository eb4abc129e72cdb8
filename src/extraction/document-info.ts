import path from "node:path";
import type { Metadata, MetadataValue } from "../types";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];
const MONTH = `(${MONTHS.join("|")})`;

const HEADING = /^#{1,6}[ \t]+(.+?)[ \t#]*$/m;
const YEAR_IN_NAME = /(?:^|\D)((?:19|20)\d{2})(?:\D|$)/;

interface DatePattern {
  regex: RegExp;
  /** Capture group numbers of year, month and day. */
  groups: [number, number, number];
}

const DATE_PATTERNS: readonly DatePattern[] = [
  { regex: /\b(\d{4})-(\d{2})-(\d{2})\b/, groups: [1, 2, 3] },
  { regex: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)? (?:of )?${MONTH},? (\\d{4})\\b`, "i"), groups: [3, 2, 1] },
  { regex: new RegExp(`\\b${MONTH} (\\d{1,2})(?:st|nd|rd|th)?,? (\\d{4})\\b`, "i"), groups: [3, 1, 2] },
];

function monthNumber(raw: string): number {
  const named = MONTHS.indexOf(raw.toLowerCase());
  return named >= 0 ? named + 1 : Number(raw);
}

interface FoundDate {
  at: number;
  iso: string;
  year: number;
}

function matchDate(text: string, { regex, groups }: DatePattern): FoundDate | undefined {
  const m = regex.exec(text);
  if (!m) return undefined;
  const year = Number(m[groups[0]]);
  const month = monthNumber(m[groups[1]]);
  const day = Number(m[groups[2]]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return { at: m.index, iso: date.toISOString().slice(0, 10), year };
}

/** First calendar date written in `text` (ISO, "5 March 2021" or "March 5, 2021"). */
export function detectDate(text: string): { iso: string; year: number } | undefined {
  let first: FoundDate | undefined;
  for (const pattern of DATE_PATTERNS) {
    const found = matchDate(text, pattern);
    if (found && (!first || found.at < first.at)) first = found;
  }
  return first && { iso: first.iso, year: first.year };
}

/**
 * Metadata detected from a source file: a `title` (first Markdown heading,
 * else the file name without extension), the first `date` in the text as
 * YYYY-MM-DD, and its `year` (or a year found in the file name).
 */
export function describeDocument(sourcePath: string, text: string): Metadata {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const info: Record<string, MetadataValue> = { title: HEADING.exec(text)?.[1] ?? stem };
  const date = detectDate(text);
  if (date) {
    info.date = date.iso;
    info.year = date.year;
  } else {
    const year = YEAR_IN_NAME.exec(stem)?.[1];
    if (year) info.year = Number(year);
  }
  return info;
}
