import type { SearchObject } from "imapflow";
import { ParseError } from "../errors.js";
import { formatRange, parseRange } from "./range.js";

type FlagKey = "seen" | "answered" | "flagged" | "deleted" | "draft";

const FLAG_CRITERIA: Record<string, [FlagKey, boolean]> = {
  SEEN: ["seen", true],
  UNSEEN: ["seen", false],
  ANSWERED: ["answered", true],
  UNANSWERED: ["answered", false],
  FLAGGED: ["flagged", true],
  UNFLAGGED: ["flagged", false],
  DELETED: ["deleted", true],
  UNDELETED: ["deleted", false],
  DRAFT: ["draft", true],
  UNDRAFT: ["draft", false],
};

type StringKey = "from" | "to" | "cc" | "bcc" | "subject" | "body" | "keyword" | "unKeyword";

const STRING_CRITERIA: Record<string, StringKey> = {
  FROM: "from",
  TO: "to",
  CC: "cc",
  BCC: "bcc",
  SUBJECT: "subject",
  BODY: "body",
  KEYWORD: "keyword",
  UNKEYWORD: "unKeyword",
};

type DateKey = "since" | "before" | "on" | "sentSince" | "sentBefore" | "sentOn";

const DATE_CRITERIA: Record<string, DateKey> = {
  SINCE: "since",
  BEFORE: "before",
  ON: "on",
  SENTSINCE: "sentSince",
  SENTBEFORE: "sentBefore",
  SENTON: "sentOn",
};

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

/**
 * Split a query into words, keeping double-quoted strings together.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const re = /"((?:[^"\\]|\\.)*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    if (match[1] !== undefined) {
      tokens.push(match[1].replace(/\\(.)/g, "$1"));
    } else if (match[2].includes('"')) {
      throw new ParseError(`Unterminated quote in query "${text}"`, match[2]);
    } else {
      tokens.push(match[2]);
    }
  }
  return tokens;
}

/**
 * Parse an IMAP date (`15-Jan-2024`) or an ISO date (`2024-01-15`) as
 * midnight UTC.
 */
export function parseSearchDate(value: string): Date {
  let year: number;
  let month: number;
  let day: number;

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  const imap = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/.exec(value);
  if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]) - 1;
    day = Number(iso[3]);
  } else if (imap) {
    day = Number(imap[1]);
    month = MONTHS.indexOf(imap[2].toLowerCase());
    year = Number(imap[3]);
  } else {
    throw new ParseError(`Invalid date "${value}" (use YYYY-MM-DD or DD-Mon-YYYY)`, value);
  }

  const date = new Date(Date.UTC(year, month, day));
  if (month < 0 || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new ParseError(`Invalid date "${value}"`, value);
  }
  return date;
}

function parseSize(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`Invalid size "${value}"`, value);
  }
  return parseInt(value, 10);
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

/**
 * Set one key of a search object. A search object holds one value per
 * key, so a repeated criterion must agree with the one already there.
 */
function assign<K extends keyof SearchObject>(
  into: SearchObject,
  key: K,
  value: SearchObject[K],
  word: string
): void {
  const current = into[key];
  if (current !== undefined && !sameValue(current, value)) {
    throw new ParseError(
      `Conflicting ${word.toUpperCase()} criteria at one level; combine them with OR or NOT`,
      word
    );
  }
  into[key] = value;
}

class QueryReader {
  private pos = 0;

  constructor(private readonly tokens: string[]) {}

  done(): boolean {
    return this.pos >= this.tokens.length;
  }

  next(criterion: string): string {
    if (this.done()) {
      throw new ParseError(`Missing argument for ${criterion}`, criterion);
    }
    return this.tokens[this.pos++];
  }

  /** One criterion, merged into `into`. */
  criterion(into: SearchObject): void {
    const word = this.next("query");
    const key = word.toUpperCase();

    const flag = FLAG_CRITERIA[key];
    if (flag) {
      assign(into, flag[0], flag[1], word);
      return;
    }

    const stringKey = STRING_CRITERIA[key];
    if (stringKey) {
      assign(into, stringKey, this.next(key), word);
      return;
    }

    const dateKey = DATE_CRITERIA[key];
    if (dateKey) {
      assign(into, dateKey, parseSearchDate(this.next(key)), word);
      return;
    }

    switch (key) {
      case "ALL":
        assign(into, "all", true, word);
        return;
      case "NEW":
        assign(into, "new", true, word);
        return;
      case "OLD":
        assign(into, "old", true, word);
        return;
      case "RECENT":
        assign(into, "recent", true, word);
        return;
      case "LARGER":
        assign(into, "larger", parseSize(this.next(key)), word);
        return;
      case "SMALLER":
        assign(into, "smaller", parseSize(this.next(key)), word);
        return;
      case "UID":
        assign(into, "uid", formatRange(parseRange(this.next(key))), word);
        return;
      case "HEADER": {
        const name = this.next(key);
        const value = this.next(key) || true;
        const previous = into.header?.[name];
        if (previous !== undefined && previous !== value) {
          throw new ParseError(
            `Conflicting HEADER ${name} criteria at one level; combine them with OR or NOT`,
            word
          );
        }
        into.header = { ...(into.header || {}), [name]: value };
        return;
      }
      case "NOT": {
        if (into.not) {
          throw new ParseError("Only one NOT per level; wrap the others in OR", word);
        }
        const inner: SearchObject = {};
        this.criterion(inner);
        into.not = inner;
        return;
      }
      case "OR": {
        if (into.or) {
          throw new ParseError("Only one OR per level; nest the others inside it", word);
        }
        const left: SearchObject = {};
        const right: SearchObject = {};
        this.criterion(left);
        this.criterion(right);
        into.or = [left, right];
        return;
      }
    }

    throw new ParseError(`Unknown search criterion "${word}"`, word);
  }
}

/**
 * Parse IMAP SEARCH criteria text (e.g. `UNSEEN FROM alice SINCE 2024-01-01`)
 * into an imapflow search object. Juxtaposed criteria are ANDed; an empty
 * query matches every message.
 */
export function parseQuery(text: string): SearchObject {
  const reader = new QueryReader(tokenize(text));
  if (reader.done()) {
    return { all: true };
  }

  const query: SearchObject = {};
  while (!reader.done()) {
    reader.criterion(query);
  }
  return query;
}
