import { ParseError } from "../errors.js";
import type { SeqRange, Span } from "./types.js";

/** Largest sequence number or UID IMAP allows (RFC 3501 nz-number). */
export const MAX_MESSAGE_NUMBER = 4294967295;

function parsePositive(token: string, text: string): number {
  if (!/^\d+$/.test(token)) {
    throw new ParseError(`Invalid sequence number "${token}" in range "${text}"`, token);
  }
  const n = parseInt(token, 10);
  if (n < 1) {
    throw new ParseError(`Sequence numbers start at 1, got "${token}"`, token);
  }
  if (n > MAX_MESSAGE_NUMBER) {
    throw new ParseError(
      `Sequence number "${token}" exceeds the IMAP maximum ${MAX_MESSAGE_NUMBER}`,
      token
    );
  }
  return n;
}

/**
 * Sort spans and merge the ones that overlap or touch.
 */
function normalize(spans: Iterable<Span>): Span[] {
  const sorted = [...spans].sort((a, b) => a[0] - b[0]);
  const merged: Span[] = [];

  for (const [start, end] of sorted) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1] + 1) {
      merged[merged.length - 1] = [last[0], Math.max(last[1], end)];
    } else {
      merged.push([start, end]);
    }
  }

  return merged;
}

/**
 * Parse a sequence range such as `"1,3:5,9"` into ascending, disjoint
 * spans.
 *
 * Each comma-separated token is either a number or an inclusive
 * `start:end` span. Empty input and spans with start > end are errors.
 */
export function parseRange(text: string): SeqRange {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ParseError("Empty sequence range", text);
  }

  const spans: Span[] = [];
  for (const raw of trimmed.split(",")) {
    const token = raw.trim();
    if (!token) {
      throw new ParseError(`Empty token in range "${text}"`, raw);
    }

    const colon = token.indexOf(":");
    if (colon === -1) {
      const n = parsePositive(token, text);
      spans.push([n, n]);
      continue;
    }

    const start = parsePositive(token.slice(0, colon).trim(), text);
    const end = parsePositive(token.slice(colon + 1).trim(), text);
    if (start > end) {
      throw new ParseError(`Range start is after its end: "${token}"`, token);
    }
    spans.push([start, end]);
  }

  return normalize(spans);
}

/**
 * The range holding exactly the given message numbers.
 */
export function rangeOf(numbers: Iterable<number>): SeqRange {
  const spans: Span[] = [];
  for (const n of numbers) {
    spans.push([n, n]);
  }
  return normalize(spans);
}

/**
 * Format a range in IMAP sequence-set syntax: `[[1, 1], [3, 5], [9, 9]]`
 * becomes `"1,3:5,9"`.
 */
export function formatRange(range: SeqRange): string {
  return normalize(range)
    .map(([start, end]) => (start === end ? String(start) : `${start}:${end}`))
    .join(",");
}

/**
 * Format explicit message numbers as a sequence set.
 */
export function formatNumbers(numbers: Iterable<number>): string {
  return formatRange(rangeOf(numbers));
}

/**
 * Number of members in the range.
 */
export function rangeSize(range: SeqRange): number {
  return normalize(range).reduce((total, [start, end]) => total + end - start + 1, 0);
}

/**
 * Members of `range` missing from `present`, as spans.
 */
export function missingFrom(range: SeqRange, present: Iterable<number>): SeqRange {
  const have = [...new Set(present)].sort((a, b) => a - b);
  const missing: Span[] = [];

  let i = 0;
  for (const [start, end] of normalize(range)) {
    while (i < have.length && have[i] < start) i++;

    let next = start;
    while (i < have.length && have[i] <= end) {
      if (have[i] > next) missing.push([next, have[i] - 1]);
      next = have[i] + 1;
      i++;
    }
    if (next <= end) missing.push([next, end]);
  }

  return missing;
}
