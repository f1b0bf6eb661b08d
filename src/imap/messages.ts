import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  FetchMessageObject,
  FetchQueryObject,
  MessageAddressObject,
  MessageStructureObject,
  SearchObject,
} from "imapflow";
import type { MailboxSession } from "./client.js";
import type {
  Address,
  FetchDetail,
  FlagSet,
  MessageSummary,
  ResidentMsg,
} from "./types.js";
import { formatNumbers } from "./range.js";
import { flagSymbols } from "./flags.js";
import { parseQuery } from "./query.js";
import { displayName, parseMessage, toCrlf } from "../compose/mime.js";
import { NotFoundError, ProtocolError, toProtocolError } from "../errors.js";
import { log } from "../logger.js";

const HEADER_QUERY: FetchQueryObject = {
  uid: true,
  flags: true,
  envelope: true,
  bodyStructure: true,
  size: true,
};

const FULL_QUERY: FetchQueryObject = {
  uid: true,
  flags: true,
  envelope: true,
  size: true,
  source: true,
};

function envelopeAddresses(list: MessageAddressObject[] | undefined): Address[] {
  return (list || []).flatMap((addr) =>
    addr.address ? [{ name: addr.name || "", address: addr.address }] : []
  );
}

/**
 * True when any MIME part of the structure is an attachment.
 */
export function hasAttachments(node: MessageStructureObject | undefined): boolean {
  if (!node) return false;
  if (node.disposition === "attachment") return true;
  return (node.childNodes || []).some(hasAttachments);
}

/**
 * Build a ResidentMsg from a fetch response. With a source, the MIME
 * content is parsed; otherwise only the envelope is used.
 */
export async function toResidentMsg(msg: FetchMessageObject): Promise<ResidentMsg> {
  const flags: FlagSet = new Set(msg.flags || []);
  const envelope = msg.envelope;

  const base: ResidentMsg = {
    seq: msg.seq,
    uid: msg.uid,
    flags,
    size: msg.size,
    from: envelopeAddresses(envelope?.from),
    to: envelopeAddresses(envelope?.to),
    cc: envelopeAddresses(envelope?.cc),
    bcc: envelopeAddresses(envelope?.bcc),
    replyTo: envelopeAddresses(envelope?.replyTo),
    subject: envelope?.subject || "",
    date: envelope?.date,
    messageId: envelope?.messageId,
    inReplyTo: envelope?.inReplyTo,
    references: [],
    attachments: [],
  };

  if (!msg.source) {
    return base;
  }

  const parsed = await parseMessage(msg.source);
  return {
    ...parsed,
    seq: base.seq,
    uid: base.uid,
    flags,
    size: base.size,
    subject: parsed.subject || base.subject,
    date: parsed.date || base.date,
    messageId: parsed.messageId || base.messageId,
    source: msg.source,
  };
}

function toSummary(msg: FetchMessageObject): MessageSummary {
  const flags: FlagSet = new Set(msg.flags || []);
  return {
    seq: msg.seq,
    uid: msg.uid,
    flags: flagSymbols(flags),
    subject: msg.envelope?.subject || "(no subject)",
    from: displayName(envelopeAddresses(msg.envelope?.from)),
    date: msg.envelope?.date?.toISOString() || "",
    hasAttachments: hasAttachments(msg.bodyStructure),
  };
}

/**
 * Search the selected mailbox. Accepts IMAP SEARCH criteria text or an
 * imapflow search object. Returns matching sequence numbers, ascending;
 * an empty result is not an error.
 */
export async function searchMessages(
  session: MailboxSession,
  query: string | SearchObject
): Promise<number[]> {
  const { client } = session.selected();
  const criteria = typeof query === "string" ? parseQuery(query) : query;

  let result: number[] | false;
  try {
    result = await client.search(criteria);
  } catch (error) {
    throw toProtocolError(error);
  }

  return [...new Set(result || [])].sort((a, b) => a - b);
}

/**
 * Fetch the addressed messages in ascending sequence order.
 * `"headers"` retrieves envelope and flags; `"full"` the parsed content.
 */
export async function fetchMessages(
  session: MailboxSession,
  seqs: readonly number[],
  detail: FetchDetail = "headers"
): Promise<ResidentMsg[]> {
  if (seqs.length === 0) return [];
  const { client } = session.selected();

  const results: ResidentMsg[] = [];
  try {
    for await (const msg of client.fetch(
      formatNumbers(seqs),
      detail === "full" ? FULL_QUERY : HEADER_QUERY
    )) {
      results.push(await toResidentMsg(msg));
    }
  } catch (error) {
    throw toProtocolError(error);
  }

  return results.sort((a, b) => a.seq - b.seq);
}

/**
 * Fetch messages by UID, ascending.
 */
export async function fetchByUid(
  session: MailboxSession,
  uids: readonly number[],
  detail: FetchDetail = "headers"
): Promise<ResidentMsg[]> {
  if (uids.length === 0) return [];
  const { client } = session.selected();

  const results: ResidentMsg[] = [];
  try {
    for await (const msg of client.fetch(
      formatNumbers(uids),
      detail === "full" ? FULL_QUERY : HEADER_QUERY,
      { uid: true }
    )) {
      results.push(await toResidentMsg(msg));
    }
  } catch (error) {
    throw toProtocolError(error);
  }

  return results.sort((a, b) => a.uid - b.uid);
}

/**
 * Fetch a single message by sequence number.
 */
export async function fetchMessage(
  session: MailboxSession,
  seq: number,
  detail: FetchDetail = "full"
): Promise<ResidentMsg> {
  const { client, mailbox } = session.selected();

  let msg: FetchMessageObject | false;
  try {
    msg = await client.fetchOne(String(seq), detail === "full" ? FULL_QUERY : HEADER_QUERY);
  } catch (error) {
    throw toProtocolError(error);
  }

  if (!msg) {
    throw new NotFoundError(`Message ${seq} not found in ${mailbox}`);
  }
  return toResidentMsg(msg);
}

/**
 * UIDs of every message in the selected mailbox.
 */
export async function uidSnapshot(session: MailboxSession): Promise<Set<number>> {
  const { client } = session.selected();
  try {
    const uids = await client.search({ all: true }, { uid: true });
    return new Set(uids || []);
  } catch (error) {
    throw toProtocolError(error);
  }
}

async function summarize(session: MailboxSession, seqs: number[]): Promise<MessageSummary[]> {
  if (seqs.length === 0) return [];
  const { client } = session.selected();

  const results: MessageSummary[] = [];
  try {
    for await (const msg of client.fetch(formatNumbers(seqs), HEADER_QUERY)) {
      results.push(toSummary(msg));
    }
  } catch (error) {
    throw toProtocolError(error);
  }

  // Newest (highest sequence number) first
  return results.sort((a, b) => b.seq - a.seq);
}

function pageOf(seqs: readonly number[], pageSize: number, page: number): number[] {
  const newestFirst = [...seqs].sort((a, b) => b - a);
  return newestFirst.slice(page * pageSize, (page + 1) * pageSize);
}

/**
 * One page of message summaries, newest first. Page 0 is the newest.
 */
export async function listPage(
  session: MailboxSession,
  pageSize: number,
  page: number = 0
): Promise<MessageSummary[]> {
  const all = await searchMessages(session, { all: true });
  return summarize(session, pageOf(all, pageSize, page));
}

/**
 * One page of summaries of the messages matching `query`, newest first.
 */
export async function searchPage(
  session: MailboxSession,
  query: string,
  pageSize: number,
  page: number = 0
): Promise<MessageSummary[]> {
  const matches = await searchMessages(session, query);
  return summarize(session, pageOf(matches, pageSize, page));
}

export interface ReadOptions {
  /** Which body part to show */
  mime: "plain" | "html";
  /** Return the raw RFC 5322 source instead of a body part */
  raw: boolean;
}

/**
 * The readable content of a message: its plain or HTML body, or its raw
 * source.
 */
export async function readMessage(
  session: MailboxSession,
  seq: number,
  options: ReadOptions = { mime: "plain", raw: false }
): Promise<string> {
  const msg = await fetchMessage(session, seq, "full");

  if (options.raw) {
    return msg.source ? msg.source.toString("utf-8") : "";
  }
  if (options.mime === "html") {
    return msg.html || "";
  }
  return msg.text || "";
}

/**
 * Append a transient message to a mailbox, with line endings rewritten
 * as CRLF. Returns the new UID when the server reports it.
 */
export async function saveMessage(
  session: MailboxSession,
  mailbox: string,
  raw: string | Buffer,
  flags: FlagSet = new Set(["\\Seen"])
): Promise<number | undefined> {
  const client = session.getClient();
  const content = toCrlf(raw);

  let result: { uid?: number } | false;
  try {
    result = await client.append(mailbox, content, [...flags]);
  } catch (error) {
    throw toProtocolError(error);
  }
  if (!result) {
    throw new ProtocolError(`APPEND to ${mailbox} failed`);
  }

  log.debug(`saved message to ${mailbox}`);
  return result.uid;
}

/**
 * Write every attachment of a message into `dir`. Returns the written
 * paths; an empty list when the message has none.
 */
export async function downloadAttachments(
  session: MailboxSession,
  seq: number,
  dir: string
): Promise<string[]> {
  const msg = await fetchMessage(session, seq, "full");
  if (msg.attachments.length === 0) return [];

  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const att of msg.attachments) {
    const target = path.join(dir, path.basename(att.filename));
    await writeFile(target, att.content);
    written.push(target);
  }
  return written;
}
