import { convert } from "html-to-text";
import type { Account, Address, Msg, Template } from "../imap/types.js";
import { emptyMsg } from "../imap/types.js";
import { formatAddressList, parseMessage } from "./mime.js";

export const FORWARD_SEPARATOR = "-------- Forwarded Message --------";

/** The account's From address. */
export function identity(account: Account): Address {
  return { name: account.name, address: account.email };
}

function sameAddress(a: Address, b: string): boolean {
  return a.address.toLowerCase() === b.toLowerCase();
}

function uniqueAddresses(list: Address[]): Address[] {
  const seen = new Set<string>();
  return list.filter((addr) => {
    const key = addr.address.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Add `prefix` to a subject unless `already` matches its start
 * (case-insensitive). Never produces a double prefix.
 */
export function prefixSubject(subject: string, prefix: string, already: RegExp): string {
  const trimmed = subject.trim();
  return already.test(trimmed) ? trimmed : `${prefix} ${trimmed}`;
}

export function replySubject(subject: string): string {
  return prefixSubject(subject, "Re:", /^re:/i);
}

export function forwardSubject(subject: string): string {
  return prefixSubject(subject, "Fwd:", /^fwd?:/i);
}

/**
 * The plain body of a message, converting HTML when there is no text
 * part. Empty when neither part decodes.
 */
export function plainBody(msg: Msg): string {
  if (msg.text) return msg.text;
  if (msg.html) return convert(msg.html, { wordwrap: false });
  return "";
}

function sender(msg: Msg): string {
  return formatAddressList(msg.from) || "unknown sender";
}

/**
 * `On <date>, <sender> wrote:`, or `<sender> wrote:` for undated messages.
 */
export function attribution(msg: Msg): string {
  return msg.date
    ? `On ${msg.date.toUTCString()}, ${sender(msg)} wrote:`
    : `${sender(msg)} wrote:`;
}

export function quote(text: string): string {
  return text
    .replace(/\s+$/, "")
    .split(/\r?\n/)
    .map((line) => `> ${line}`)
    .join("\n");
}

function withSignature(body: string, account: Account): string {
  return account.signature ? `${body}\n\n${account.signature}` : body;
}

/**
 * A blank message from the account.
 */
export function newTemplate(account: Account): Template {
  return {
    ...emptyMsg(),
    kind: "new",
    from: [identity(account)],
    text: withSignature("", account),
  };
}

/**
 * A reply to `source`. The reply goes to the source's Reply-To, or its
 * From. With `all`, the source's To and Cc are added and the account's
 * own address removed.
 */
export function replyTemplate(
  source: Msg,
  account: Account,
  options: { all?: boolean } = {}
): Template {
  const primary = source.replyTo.length > 0 ? source.replyTo : source.from;

  let to = uniqueAddresses(primary);
  if (options.all) {
    const everyone = uniqueAddresses([...primary, ...source.to, ...source.cc]).filter(
      (addr) => !sameAddress(addr, account.email)
    );
    if (everyone.length > 0) {
      to = everyone;
    }
  }

  const references = source.messageId
    ? [...source.references.filter((ref) => ref !== source.messageId), source.messageId]
    : [...source.references];

  const text = plainBody(source);
  const lines = ["", attribution(source)];
  if (text.trim()) {
    lines.push(quote(text));
  }

  return {
    ...emptyMsg(),
    kind: options.all ? "reply-all" : "reply",
    from: [identity(account)],
    to,
    subject: replySubject(source.subject),
    inReplyTo: source.messageId,
    references,
    text: withSignature(lines.join("\n"), account),
  };
}

/**
 * A forward of `source` with its body unquoted below a header block.
 * Attachments are carried over only with `attachments`.
 */
export function forwardTemplate(
  source: Msg,
  account: Account,
  options: { attachments?: boolean } = {}
): Template {
  const lines = ["", FORWARD_SEPARATOR, `From: ${sender(source)}`];
  if (source.date) {
    lines.push(`Date: ${source.date.toUTCString()}`);
  }
  lines.push(`Subject: ${source.subject}`);
  if (source.to.length > 0) {
    lines.push(`To: ${formatAddressList(source.to)}`);
  }

  const text = plainBody(source);
  if (text.trim()) {
    lines.push("", text.replace(/\s+$/, ""));
  }

  return {
    ...emptyMsg(),
    kind: "forward",
    from: [identity(account)],
    subject: forwardSubject(source.subject),
    text: withSignature(lines.join("\n"), account),
    attachments: options.attachments ? [...source.attachments] : [],
  };
}

/**
 * Render a template as editable text: header lines, an empty line, the
 * body. Attachments are not rendered.
 */
export function renderTemplate(tpl: Msg): string {
  const headers = [`From: ${formatAddressList(tpl.from)}`, `To: ${formatAddressList(tpl.to)}`];
  if (tpl.cc.length > 0) headers.push(`Cc: ${formatAddressList(tpl.cc)}`);
  if (tpl.bcc.length > 0) headers.push(`Bcc: ${formatAddressList(tpl.bcc)}`);
  headers.push(`Subject: ${tpl.subject}`);
  if (tpl.inReplyTo) headers.push(`In-Reply-To: ${tpl.inReplyTo}`);
  if (tpl.references.length > 0) headers.push(`References: ${tpl.references.join(" ")}`);

  return `${headers.join("\n")}\n\n${tpl.text ?? ""}`;
}

/**
 * Parse edited template text back into a message. Attachments of the
 * original template are carried over.
 */
export async function parseTemplate(text: string, original?: Msg): Promise<Msg> {
  const msg = await parseMessage(text);
  return {
    ...msg,
    attachments: [...(original?.attachments ?? []), ...msg.attachments],
  };
}
