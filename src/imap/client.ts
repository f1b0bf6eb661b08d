import { ImapFlow } from "imapflow";
import type { MailboxLockObject } from "imapflow";
import type { Account, ImapConfig } from "./types.js";
import { ConnectionError, InvalidStateError, toProtocolError } from "../errors.js";
import { log } from "../logger.js";

/** Longest delay a Node.js timer holds; larger values fire at once. */
export const MAX_KEEPALIVE_MS = 2_147_483_647;

/**
 * Classify an IMAP/network error into a ConnectionError with an
 * actionable message. Inspects error properties set by ImapFlow and
 * Node.js to determine the cause.
 */
export function classifyImapError(error: unknown, config: ImapConfig): ConnectionError {
  if (!(error instanceof Error)) {
    return new ConnectionError(`IMAP error: ${String(error)}`);
  }

  const err = error as Error & {
    authenticationFailed?: boolean;
    code?: string;
  };

  if (err.authenticationFailed) {
    return new ConnectionError(
      "IMAP authentication failed — check IMAP_USER and IMAP_PASS credentials.",
      { cause: error }
    );
  }

  if (err.code === "ECONNREFUSED") {
    return new ConnectionError(
      `Cannot reach IMAP server at ${config.host}:${config.port} — connection refused. Is the server running?`,
      { cause: error }
    );
  }

  if (err.code === "ENOTFOUND") {
    return new ConnectionError(
      `Cannot resolve IMAP server hostname '${config.host}' — check IMAP_HOST.`,
      { cause: error }
    );
  }

  if (err.code === "ETIMEDOUT" || err.code === "CONNECT_TIMEOUT") {
    return new ConnectionError(
      "Connection to IMAP server timed out — server may be slow or unreachable.",
      { cause: error }
    );
  }

  if (
    err.code?.startsWith("ERR_TLS") ||
    /tls|certificate/i.test(err.message)
  ) {
    return new ConnectionError(
      "TLS/SSL error connecting to IMAP server — check IMAP_SECURE setting.",
      { cause: error }
    );
  }

  return new ConnectionError(`IMAP error: ${err.message}`, { cause: error });
}

export type SessionState =
  | { kind: "disconnected" }
  | { kind: "connected" }
  | { kind: "selected"; mailbox: string };

/**
 * A single IMAP connection and its state:
 * disconnected -> connected -> selected(mailbox) -> disconnected.
 *
 * Sequence-addressed operations go through `selected()`, which refuses
 * to hand out the connection before a mailbox is selected. `logout()`
 * may be called any number of times.
 */
export class MailboxSession {
  private client: ImapFlow | null = null;
  private lock: MailboxLockObject | null = null;
  private current: SessionState = { kind: "disconnected" };
  private config: ImapConfig;

  constructor(config: ImapConfig) {
    this.config = config;
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * Open and authenticate the connection. Fails with ConnectionError,
   * without retrying.
   */
  async connect(): Promise<ImapFlow> {
    if (this.client) {
      return this.client;
    }

    const flow = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: this.config.auth,
      logger: false,
      disableAutoIdle: true,
      tls: {
        rejectUnauthorized: this.config.tlsRejectUnauthorized,
      },
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    flow.on("error", (error: unknown) => {
      log.error(classifyImapError(error, this.config).message);
    });

    try {
      await flow.connect();
    } catch (error) {
      throw classifyImapError(error, this.config);
    }

    log.debug(`connected to ${this.config.host}:${this.config.port}`);
    this.client = flow;
    this.current = { kind: "connected" };
    return flow;
  }

  /**
   * Select a mailbox, releasing the previously selected one.
   */
  async select(mailbox: string = "INBOX"): Promise<void> {
    const client = this.getClient();
    if (this.lock) {
      this.lock.release();
      this.lock = null;
    }

    try {
      this.lock = await client.getMailboxLock(mailbox);
    } catch (error) {
      this.current = { kind: "connected" };
      throw toProtocolError(error);
    }
    log.debug(`selected ${mailbox}`);
    this.current = { kind: "selected", mailbox };
  }

  /**
   * The connection, for operations that need no selected mailbox.
   */
  getClient(): ImapFlow {
    if (!this.client) {
      throw new InvalidStateError("IMAP session not connected. Call connect() first.");
    }
    return this.client;
  }

  /**
   * The connection and selected mailbox, for sequence-addressed operations.
   */
  selected(): { client: ImapFlow; mailbox: string } {
    const state = this.current;
    if (state.kind !== "selected" || !this.client) {
      throw new InvalidStateError("No mailbox selected. Call select() first.");
    }
    return { client: this.client, mailbox: state.mailbox };
  }

  /**
   * Block until the server reports mailbox activity or until
   * `keepaliveMs` elapses, whichever comes first. Either way IDLE is
   * ended cleanly so the caller can re-issue it.
   */
  async idle(keepaliveMs: number): Promise<void> {
    const { client } = this.selected();
    if (!Number.isInteger(keepaliveMs) || keepaliveMs < 1 || keepaliveMs > MAX_KEEPALIVE_MS) {
      throw new InvalidStateError(
        `Keepalive must be between 1 and ${MAX_KEEPALIVE_MS} ms, got ${keepaliveMs}`
      );
    }

    let woken = false;
    const wake = () => {
      if (woken) return;
      woken = true;
      clearTimeout(timer);
      // Any command ends IDLE; NOOP is the cheapest one.
      client.noop().catch((error: unknown) => {
        log.warn(`NOOP after IDLE failed: ${toProtocolError(error).message}`);
      });
    };
    const timer = setTimeout(wake, keepaliveMs);

    client.on("exists", wake);
    try {
      await client.idle();
    } catch (error) {
      throw toProtocolError(error);
    } finally {
      woken = true;
      clearTimeout(timer);
      client.off("exists", wake);
    }
  }

  /**
   * Release the mailbox and log out. A no-op when already disconnected.
   */
  async logout(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }

    this.client = null;
    this.current = { kind: "disconnected" };
    if (this.lock) {
      this.lock.release();
      this.lock = null;
    }

    if (!client.usable) {
      return;
    }
    try {
      await client.logout();
    } catch (error) {
      throw toProtocolError(error);
    }
    log.debug("logged out");
  }
}

/**
 * Run `fn` against a connected session with the account's mailbox (or
 * `mailbox`) selected, and log out on every exit path.
 *
 * When `fn` fails, a logout failure is logged and the original error
 * propagates.
 */
export async function withMailboxSession<T>(
  account: Account,
  fn: (session: MailboxSession) => Promise<T>,
  mailbox: string = account.defaultMailbox
): Promise<T> {
  const session = new MailboxSession(account.imap);

  let result: T;
  try {
    await session.connect();
    await session.select(mailbox);
    result = await fn(session);
  } catch (error) {
    await session.logout().catch((logoutError: unknown) => {
      log.warn(`logout failed: ${toProtocolError(logoutError).message}`);
    });
    throw error;
  }

  await session.logout();
  return result;
}
