/**
 * Configuration for connecting to an IMAP server.
 */
export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  tlsRejectUnauthorized: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

/**
 * Configuration for submitting mail over SMTP.
 */
export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

/**
 * A mail account: identity plus both protocol endpoints.
 * Loaded once per invocation and never mutated.
 */
export interface Account {
  /** Display name used in From headers */
  name: string;
  /** Address used in From headers and to drop self from reply-all */
  email: string;
  imap: ImapConfig;
  smtp: SmtpConfig;
  defaultMailbox: string;
  /** Mailbox receiving a copy of every sent message */
  sentMailbox: string;
  downloadsDir: string;
  signature?: string;
  /** Executable run once per new message by `notify` */
  notifyCmd: string;
}

/** Inclusive `[start, end]` run of message numbers. */
export type Span = readonly [start: number, end: number];

/**
 * A set of positive message numbers (sequence numbers or UIDs) held as
 * ascending, disjoint spans. Build it with `parseRange` or `rangeOf`.
 */
export type SeqRange = readonly Span[];

/** Normalized flag names, e.g. `\Seen` or a custom keyword. */
export type FlagSet = ReadonlySet<string>;

export interface Address {
  name: string;
  address: string;
}

export interface Attachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

/**
 * A message. Built locally it is transient; fetched from a mailbox it is
 * a `ResidentMsg`.
 */
export interface Msg {
  from: Address[];
  to: Address[];
  cc: Address[];
  bcc: Address[];
  replyTo: Address[];
  subject: string;
  date?: Date;
  messageId?: string;
  inReplyTo?: string;
  references: string[];
  /** Plain text body */
  text?: string;
  /** HTML body */
  html?: string;
  attachments: Attachment[];
}

/**
 * A message addressed on the selected mailbox.
 */
export interface ResidentMsg extends Msg {
  /** Sequence number: position in the mailbox, changes on expunge */
  seq: number;
  /** IMAP UID — stable identifier within this mailbox */
  uid: number;
  flags: FlagSet;
  /** Size in bytes as reported by the server */
  size?: number;
  /** Raw RFC 5322 source, only for full fetches */
  source?: Buffer;
}

/** How much of each message a fetch retrieves. */
export type FetchDetail = "headers" | "full";

export type TemplateKind = "new" | "reply" | "reply-all" | "forward";

/**
 * A draft produced from an account and, for replies and forwards, a
 * source message. Edited locally before it is sent.
 */
export interface Template extends Msg {
  kind: TemplateKind;
}

/**
 * Lightweight listing entry, the row type of `list` and `search`.
 */
export interface MessageSummary {
  seq: number;
  uid: number;
  /** Compact flag markers, see `flagSymbols` */
  flags: string;
  subject: string;
  /** Sender display name, or address when the name is empty */
  from: string;
  /** ISO 8601 date string */
  date: string;
  hasAttachments: boolean;
}

export function emptyMsg(): Msg {
  return {
    from: [],
    to: [],
    cc: [],
    bcc: [],
    replyTo: [],
    subject: "",
    references: [],
    attachments: [],
  };
}
