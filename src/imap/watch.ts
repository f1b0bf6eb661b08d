import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { MailboxSession } from "./client.js";
import type { ResidentMsg } from "./types.js";
import { fetchByUid, uidSnapshot } from "./messages.js";
import { displayName } from "../compose/mime.js";
import { NotifyError, TernError } from "../errors.js";
import { log } from "../logger.js";

const execFileAsync = promisify(execFile);

/** Called once for every newly arrived message. */
export type NotifyHook = (msg: ResidentMsg) => Promise<void>;

export interface LoopOptions {
  /** Stops the loop before the next IDLE */
  signal?: AbortSignal;
}

/**
 * Keep the selected mailbox in IDLE, re-issuing it after every wake-up.
 * Runs until `signal` is aborted or an error occurs.
 */
export async function watch(
  session: MailboxSession,
  keepaliveMs: number,
  options: LoopOptions = {}
): Promise<void> {
  const { mailbox } = session.selected();
  log.info(`watching ${mailbox}`);

  while (!options.signal?.aborted) {
    await session.idle(keepaliveMs);
    log.debug(`woke up in ${mailbox}`);
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One notification pass: fetch the messages whose UIDs are not in
 * `seen`, call `hook` for each in ascending UID order and return the new
 * snapshot. Expunged UIDs simply drop out of the snapshot; UIDs are
 * never reused, so a message is never reported twice. A failing hook
 * ends the pass with a NotifyError.
 */
export async function notifyCycle(
  session: MailboxSession,
  seen: ReadonlySet<number>,
  hook: NotifyHook
): Promise<Set<number>> {
  const current = await uidSnapshot(session);
  const fresh = [...current].filter((uid) => !seen.has(uid)).sort((a, b) => a - b);

  if (fresh.length > 0) {
    log.debug(`${fresh.length} new message(s)`);
    for (const msg of await fetchByUid(session, fresh, "headers")) {
      try {
        await hook(msg);
      } catch (error) {
        if (error instanceof TernError) throw error;
        throw new NotifyError(`Notification for UID ${msg.uid} failed: ${reasonOf(error)}`, {
          cause: error,
        });
      }
    }
  }

  return current;
}

/**
 * Like `watch`, but calls `hook` for each message that arrives after the
 * loop starts. Messages present at start are not reported.
 */
export async function notify(
  session: MailboxSession,
  keepaliveMs: number,
  hook: NotifyHook,
  options: LoopOptions = {}
): Promise<void> {
  const { mailbox } = session.selected();
  let seen = await uidSnapshot(session);
  log.info(`notifying on ${mailbox} (${seen.size} message(s) present)`);

  while (!options.signal?.aborted) {
    await session.idle(keepaliveMs);
    seen = await notifyCycle(session, seen, hook);
  }
}

/**
 * A hook that runs `command` with a title naming the sender and the
 * subject as its two arguments, e.g. `notify-send "📫 Alice" "Lunch?"`.
 */
export function commandHook(command: string): NotifyHook {
  return async (msg) => {
    const sender = displayName(msg.from) || "unknown sender";
    try {
      await execFileAsync(command, [`📫 ${sender}`, msg.subject || "(no subject)"]);
    } catch (error) {
      throw new NotifyError(`Notify command "${command}" failed: ${reasonOf(error)}`, {
        cause: error,
      });
    }
  };
}
