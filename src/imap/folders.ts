import type { ImapFlow } from "imapflow";
import type { MailboxSession } from "./client.js";
import type { SeqRange } from "./types.js";
import { formatRange, missingFrom, rangeSize } from "./range.js";
import { NotFoundError, ProtocolError, toProtocolError } from "../errors.js";
import { log } from "../logger.js";

export interface MailboxEntry {
  /** Full path of the mailbox (e.g. "INBOX/Receipts") */
  path: string;
  /** Display name (e.g. "Receipts") */
  name: string;
  /** Path delimiter used by the server (e.g. "/" or ".") */
  delimiter: string;
  /** Special-use attribute such as "\\Sent", when the server reports one */
  specialUse?: string;
}

export interface TransferResult {
  /** Number of messages copied or moved */
  count: number;
  destination: string;
}

/**
 * List all mailboxes in the account.
 */
export async function listMailboxes(session: MailboxSession): Promise<MailboxEntry[]> {
  const client = session.getClient();
  try {
    const mailboxes = await client.list();
    return mailboxes.map((mb) => ({
      path: mb.path,
      name: mb.name,
      delimiter: mb.delimiter,
      ...(mb.specialUse ? { specialUse: mb.specialUse } : {}),
    }));
  } catch (error) {
    throw toProtocolError(error);
  }
}

/**
 * Find a mailbox by special-use attribute (e.g. "\\Sent"), falling back to
 * a mailbox named `fallback` (case-insensitive).
 */
export async function findMailbox(
  session: MailboxSession,
  specialUse: string,
  fallback: string
): Promise<string> {
  const mailboxes = await listMailboxes(session);

  for (const mb of mailboxes) {
    if (mb.specialUse === specialUse) {
      return mb.path;
    }
  }

  for (const mb of mailboxes) {
    if (mb.name.toLowerCase() === fallback.toLowerCase()) {
      return mb.path;
    }
  }

  throw new NotFoundError(
    `Could not find a ${specialUse} mailbox. Available mailboxes can be listed with "tern mailboxes".`
  );
}

async function assertMailboxExists(session: MailboxSession, path: string): Promise<void> {
  const mailboxes = await listMailboxes(session);
  if (!mailboxes.some((mb) => mb.path === path)) {
    throw new NotFoundError(`Mailbox "${path}" not found`);
  }
}

/**
 * Check that every member of the range exists in the selected mailbox.
 * Sequence numbers are dense, so the present set is 1..EXISTS.
 */
async function assertPresent(client: ImapFlow, mailbox: string, range: SeqRange): Promise<void> {
  let present: number[] | false;
  try {
    present = await client.search({ all: true });
  } catch (error) {
    throw toProtocolError(error);
  }

  const missing = missingFrom(range, present || []);
  if (missing.length > 0) {
    throw new NotFoundError(
      `Message(s) ${formatRange(missing)} not found in ${mailbox}; nothing was changed`
    );
  }
}

/**
 * Copy messages to another mailbox. All-or-nothing: if any addressed
 * message is absent, nothing is copied.
 */
export async function copyMessages(
  session: MailboxSession,
  range: SeqRange,
  destination: string
): Promise<TransferResult> {
  const { client, mailbox } = session.selected();
  await assertPresent(client, mailbox, range);
  await assertMailboxExists(session, destination);

  let result: unknown;
  try {
    result = await client.messageCopy(formatRange(range), destination);
  } catch (error) {
    throw toProtocolError(error);
  }
  if (!result) {
    throw new ProtocolError(`COPY to ${destination} failed`);
  }

  const count = rangeSize(range);
  log.info(`copied ${count} message(s) from ${mailbox} to ${destination}`);
  return { count, destination };
}

/**
 * Move messages to another mailbox. All-or-nothing like `copyMessages`.
 * Uses MOVE when the server has it, otherwise copy, flag \Deleted and
 * expunge.
 */
export async function moveMessages(
  session: MailboxSession,
  range: SeqRange,
  destination: string
): Promise<TransferResult> {
  const { client, mailbox } = session.selected();
  await assertPresent(client, mailbox, range);
  await assertMailboxExists(session, destination);

  let result: unknown;
  try {
    result = await client.messageMove(formatRange(range), destination);
  } catch (error) {
    throw toProtocolError(error);
  }
  if (!result) {
    throw new ProtocolError(`MOVE to ${destination} failed`);
  }

  const count = rangeSize(range);
  log.info(`moved ${count} message(s) from ${mailbox} to ${destination}`);
  return { count, destination };
}

/**
 * Flag messages \Deleted and expunge them. All-or-nothing like
 * `copyMessages`.
 */
export async function deleteMessages(
  session: MailboxSession,
  range: SeqRange
): Promise<number> {
  const { client, mailbox } = session.selected();
  await assertPresent(client, mailbox, range);

  let deleted: boolean;
  try {
    deleted = await client.messageDelete(formatRange(range));
  } catch (error) {
    throw toProtocolError(error);
  }
  if (!deleted) {
    throw new ProtocolError(`DELETE in ${mailbox} failed`);
  }

  const count = rangeSize(range);
  log.info(`deleted ${count} message(s) from ${mailbox}`);
  return count;
}
