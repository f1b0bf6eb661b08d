import * as nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import type { Account, Msg, SmtpConfig } from "../imap/types.js";
import { buildMessage, parseMessage, recipients } from "../compose/mime.js";
import { DeliveryError } from "../errors.js";
import { log } from "../logger.js";

export interface SendResult {
  messageId: string;
  accepted: string[];
  rejected: string[];
  /** The submitted RFC 5322 text, for saving a sent copy */
  raw: string | Buffer;
}

interface Envelope {
  from: string;
  to: string[];
}

function addressList(list: (string | { address: string })[]): string[] {
  return list.map((entry) => (typeof entry === "string" ? entry : entry.address));
}

/**
 * Classify an SMTP failure into a DeliveryError with a readable message.
 */
export function classifySmtpError(error: unknown, config: SmtpConfig): DeliveryError {
  if (!(error instanceof Error)) {
    return new DeliveryError(`SMTP error: ${String(error)}`);
  }

  const err = error as Error & { code?: string; responseCode?: number; response?: string };

  if (err.code === "EAUTH") {
    return new DeliveryError(
      "SMTP authentication failed — check SMTP_USER and SMTP_PASS credentials.",
      { cause: error }
    );
  }
  if (err.code === "ECONNECTION" || err.code === "ECONNREFUSED") {
    return new DeliveryError(
      `Cannot reach SMTP server at ${config.host}:${config.port}.`,
      { cause: error }
    );
  }
  if (err.code === "EENVELOPE") {
    return new DeliveryError(`SMTP server rejected the recipients: ${err.message}`, {
      cause: error,
    });
  }
  if (err.responseCode && err.response) {
    return new DeliveryError(`SMTP error ${err.responseCode}: ${err.response}`, { cause: error });
  }
  return new DeliveryError(`SMTP error: ${err.message}`, { cause: error });
}

/**
 * Outgoing mail over SMTP. The transport is created on the first send
 * and closed by `close()`, which may be called any number of times.
 */
export class DeliverySession {
  private transport: Transporter<SMTPTransport.SentMessageInfo> | null = null;
  private config: SmtpConfig;

  constructor(config: SmtpConfig) {
    this.config = config;
  }

  private connect(): Transporter<SMTPTransport.SentMessageInfo> {
    if (!this.transport) {
      this.transport = nodemailer.createTransport({
        host: this.config.host,
        port: this.config.port,
        secure: this.config.secure,
        auth: {
          user: this.config.auth.user,
          pass: this.config.auth.pass,
        },
      });
      log.debug(`SMTP transport for ${this.config.host}:${this.config.port}`);
    }
    return this.transport;
  }

  private envelope(msg: Msg): Envelope {
    const sender = msg.from[0];
    const to = recipients(msg);
    if (!sender) {
      throw new DeliveryError("Cannot send a message without a From address");
    }
    if (to.length === 0) {
      throw new DeliveryError("Cannot send a message without recipients");
    }
    return { from: sender.address, to };
  }

  private async submit(envelope: Envelope, raw: string | Buffer): Promise<SendResult> {
    const transport = this.connect();
    try {
      const info = await transport.sendMail({ envelope, raw });
      log.info(`sent ${info.messageId} to ${envelope.to.join(", ")}`);
      return {
        messageId: info.messageId,
        accepted: addressList(info.accepted),
        rejected: addressList(info.rejected),
        raw,
      };
    } catch (error) {
      throw classifySmtpError(error, this.config);
    }
  }

  /**
   * Build a message and send it. The envelope sender is the first From
   * address; recipients are every To, Cc and Bcc address. Bcc stays out
   * of the headers.
   */
  async send(msg: Msg): Promise<SendResult> {
    return this.submit(this.envelope(msg), buildMessage(msg));
  }

  /**
   * Send raw message text as it is. Its headers only decide the envelope.
   */
  async sendRaw(raw: string | Buffer): Promise<SendResult> {
    return this.submit(this.envelope(await parseMessage(raw)), raw);
  }

  close(): void {
    if (this.transport) {
      this.transport.close();
      this.transport = null;
    }
  }
}

/**
 * Run `fn` with a delivery session and close it on every exit path.
 */
export async function withDeliverySession<T>(
  account: Account,
  fn: (session: DeliverySession) => Promise<T>
): Promise<T> {
  const session = new DeliverySession(account.smtp);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
