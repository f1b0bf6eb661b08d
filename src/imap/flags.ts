import type { MailboxSession } from "./client.js";
import type { FlagSet, SeqRange } from "./types.js";
import { formatRange } from "./range.js";
import { ParseError, toProtocolError } from "../errors.js";
import { log } from "../logger.js";

/** IMAP system flags, keyed by lowercase name without the backslash. */
const SYSTEM_FLAGS: Partial<Record<string, string>> = {
  seen: "\\Seen",
  answered: "\\Answered",
  flagged: "\\Flagged",
  deleted: "\\Deleted",
  draft: "\\Draft",
  recent: "\\Recent",
};

/**
 * Parse a whitespace- or comma-separated flag list.
 *
 * System flags match case-insensitively, with or without the leading
 * backslash (`seen`, `\Seen`, `SEEN` all give `\Seen`). Anything else is
 * kept as a custom keyword.
 */
export function parseFlags(text: string): FlagSet {
  const tokens = text.split(/[\s,]+/).filter(Boolean);
  if (tokens.length === 0) {
    throw new ParseError("No flags given", text);
  }

  const flags = new Map<string, string>();
  for (const token of tokens) {
    const bare = token.replace(/^\\/, "");
    if (!bare) {
      throw new ParseError(`Invalid flag "${token}"`, token);
    }
    const system = SYSTEM_FLAGS[bare.toLowerCase()];
    const key = (system ?? bare).toLowerCase();
    if (!flags.has(key)) {
      flags.set(key, system ?? bare);
    }
  }

  return new Set(flags.values());
}

export function formatFlags(flags: FlagSet): string {
  return [...flags].join(" ");
}

/** Flags of `base` plus those of `added`. */
export function unionFlags(base: FlagSet, added: FlagSet): FlagSet {
  const result = new Set(base);
  for (const flag of added) {
    result.add(flag);
  }
  return result;
}

/** Flags of `base` without those of `removed`. */
export function differenceFlags(base: FlagSet, removed: FlagSet): FlagSet {
  const result = new Set(base);
  for (const flag of removed) {
    result.delete(flag);
  }
  return result;
}

/**
 * Compact listing markers: `*` unseen, `R` answered, `!` flagged.
 */
export function flagSymbols(flags: FlagSet): string {
  return [
    flags.has("\\Seen") ? " " : "*",
    flags.has("\\Answered") ? "R" : " ",
    flags.has("\\Flagged") ? "!" : " ",
  ].join("");
}

type FlagMutation = "set" | "add" | "remove";

async function storeFlags(
  session: MailboxSession,
  mutation: FlagMutation,
  range: SeqRange,
  flags: FlagSet
): Promise<void> {
  const { client, mailbox } = session.selected();
  const seqs = formatRange(range);
  const list = [...flags];

  log.debug(`${mutation} flags ${formatFlags(flags)} on ${mailbox}:${seqs}`);
  try {
    // A single STORE per call: each message changes in one step.
    switch (mutation) {
      case "set":
        await client.messageFlagsSet(seqs, list);
        break;
      case "add":
        await client.messageFlagsAdd(seqs, list);
        break;
      case "remove":
        await client.messageFlagsRemove(seqs, list);
        break;
    }
  } catch (error) {
    throw toProtocolError(error);
  }
}

/**
 * Replace the flags of every addressed message.
 */
export async function setFlags(
  session: MailboxSession,
  range: SeqRange,
  flags: FlagSet
): Promise<void> {
  await storeFlags(session, "set", range, flags);
}

/**
 * Add flags to every addressed message. Flags already present are left alone.
 */
export async function addFlags(
  session: MailboxSession,
  range: SeqRange,
  flags: FlagSet
): Promise<void> {
  await storeFlags(session, "add", range, flags);
}

/**
 * Remove flags from every addressed message. Absent flags are ignored.
 */
export async function removeFlags(
  session: MailboxSession,
  range: SeqRange,
  flags: FlagSet
): Promise<void> {
  await storeFlags(session, "remove", range, flags);
}
