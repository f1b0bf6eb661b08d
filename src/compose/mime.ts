import { simpleParser } from "mailparser";
import type { AddressObject, EmailAddress } from "mailparser";
import { createMimeMessage } from "mimetext";
import type { Address, Msg } from "../imap/types.js";
import { ParseError } from "../errors.js";

function flattenAddresses(entries: EmailAddress[]): Address[] {
  const result: Address[] = [];
  for (const entry of entries) {
    if (entry.group) {
      result.push(...flattenAddresses(entry.group));
    } else if (entry.address) {
      result.push({ name: entry.name || "", address: entry.address });
    }
  }
  return result;
}

/**
 * Convert a mailparser address field (single object or list) into a flat
 * address list. Groups are expanded.
 */
export function toAddresses(field: AddressObject | AddressObject[] | undefined): Address[] {
  if (!field) return [];
  const objects = Array.isArray(field) ? field : [field];
  return objects.flatMap((obj) => flattenAddresses(obj.value));
}

/**
 * Format an address for a header: `"Name" <addr>` or a bare address.
 */
export function formatAddress(addr: Address): string {
  if (!addr.name) return addr.address;
  const name = /[",;:<>@()[\]\\]/.test(addr.name)
    ? `"${addr.name.replace(/(["\\])/g, "\\$1")}"`
    : addr.name;
  return `${name} <${addr.address}>`;
}

export function formatAddressList(list: Address[]): string {
  return list.map(formatAddress).join(", ");
}

/** Display name, or the address when there is no name. */
export function displayName(list: Address[]): string {
  const first = list[0];
  if (!first) return "";
  return first.name || first.address;
}

/**
 * Parse a raw RFC 5322 message into a transient Msg.
 */
export async function parseMessage(source: Buffer | string): Promise<Msg> {
  const parsed = await simpleParser(source);

  const references = parsed.references
    ? Array.isArray(parsed.references)
      ? parsed.references
      : parsed.references.split(/\s+/).filter(Boolean)
    : [];

  return {
    from: toAddresses(parsed.from),
    to: toAddresses(parsed.to),
    cc: toAddresses(parsed.cc),
    bcc: toAddresses(parsed.bcc),
    replyTo: toAddresses(parsed.replyTo),
    subject: parsed.subject || "",
    date: parsed.date,
    messageId: parsed.messageId,
    inReplyTo: parsed.inReplyTo,
    references,
    text: parsed.text,
    html: parsed.html || undefined,
    attachments: parsed.attachments.map((att, index) => ({
      filename: att.filename || `attachment-${index}`,
      contentType: att.contentType || "application/octet-stream",
      content: att.content,
    })),
  };
}

function toMailbox(addr: Address): { addr: string; name?: string } {
  return addr.name ? { addr: addr.address, name: addr.name } : { addr: addr.address };
}

/**
 * Build a raw RFC 5322 message from a Msg, with CRLF line endings.
 *
 * Bcc recipients are written only when `includeBcc` is set (drafts);
 * outgoing mail carries them in the SMTP envelope instead.
 */
export function buildMessage(msg: Msg, options: { includeBcc?: boolean } = {}): string {
  const sender = msg.from[0];
  if (!sender) {
    throw new ParseError("Message has no sender", "From");
  }

  const mime = createMimeMessage();
  try {
    mime.setSender(toMailbox(sender));
    if (msg.to.length > 0) mime.setTo(msg.to.map(toMailbox));
    if (msg.cc.length > 0) mime.setCc(msg.cc.map(toMailbox));
    if (options.includeBcc && msg.bcc.length > 0) mime.setBcc(msg.bcc.map(toMailbox));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid address: ${reason}`, formatAddressList([...msg.to, ...msg.cc]));
  }

  mime.setSubject(msg.subject);
  if (msg.replyTo.length > 0) {
    mime.setHeader("Reply-To", formatAddressList(msg.replyTo));
  }
  if (msg.date) {
    mime.setHeader("Date", msg.date.toUTCString());
  }
  if (msg.messageId) {
    mime.setHeader("Message-ID", msg.messageId);
  }
  if (msg.inReplyTo) {
    mime.setHeader("In-Reply-To", msg.inReplyTo);
  }
  if (msg.references.length > 0) {
    mime.setHeader("References", msg.references.join(" "));
  }

  if (msg.text !== undefined || msg.html === undefined) {
    mime.addMessage({ contentType: "text/plain", data: msg.text ?? "" });
  }
  if (msg.html !== undefined) {
    mime.addMessage({ contentType: "text/html", data: msg.html });
  }

  for (const att of msg.attachments) {
    mime.addAttachment({
      filename: att.filename,
      contentType: att.contentType,
      data: att.content.toString("base64"),
    });
  }

  // mimetext writes an empty subject as an empty encoded-word
  const raw = mime.asRaw().replace(/^Subject: =\?utf-8\?B\?\?=(?=\r?\n)/m, "Subject: ");
  return raw.replace(/\r?\n/g, "\r\n");
}

/**
 * Rewrite bare LF line endings as CRLF. Other bytes are left as they are.
 */
export function toCrlf(raw: string | Buffer): Buffer {
  const bytes = typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw;
  return Buffer.from(bytes.toString("latin1").replace(/\r?\n/g, "\r\n"), "latin1");
}

/**
 * All envelope recipients of a message: to, cc and bcc.
 */
export function recipients(msg: Msg): string[] {
  return [...new Set([...msg.to, ...msg.cc, ...msg.bcc].map((a) => a.address))];
}
