import os from "node:os";
import path from "node:path";
import type { Account } from "./imap/types.js";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} environment variable is required`);
  }
  return value;
}

function port(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ConfigError(`${name} must be a port number, got "${raw}"`);
  }
  return value;
}

/**
 * Load the account from environment variables (`.env` is loaded by the
 * entry point through dotenv).
 *
 * IMAP_HOST, IMAP_USER, IMAP_PASS and SMTP_HOST are required. SMTP
 * credentials default to the IMAP ones; the sender address defaults to
 * IMAP_USER.
 */
export function createAccountFromEnv(env: Env = process.env): Account {
  const imapHost = required(env, "IMAP_HOST");
  const imapUser = required(env, "IMAP_USER");
  const imapPass = required(env, "IMAP_PASS");
  const smtpHost = required(env, "SMTP_HOST");

  return {
    name: env.MAIL_NAME || "",
    email: env.MAIL_ADDRESS || imapUser,
    imap: {
      host: imapHost,
      port: port(env, "IMAP_PORT", 993),
      secure: env.IMAP_SECURE !== "false",
      tlsRejectUnauthorized: env.IMAP_TLS_REJECT_UNAUTHORIZED !== "false",
      auth: { user: imapUser, pass: imapPass },
    },
    smtp: {
      host: smtpHost,
      port: port(env, "SMTP_PORT", 465),
      secure: env.SMTP_SECURE !== "false",
      auth: {
        user: env.SMTP_USER || imapUser,
        pass: env.SMTP_PASS || imapPass,
      },
    },
    defaultMailbox: env.MAIL_MAILBOX || "INBOX",
    sentMailbox: env.MAIL_SENT || "Sent",
    downloadsDir: env.MAIL_DOWNLOADS || path.join(os.homedir(), "Downloads"),
    signature: env.MAIL_SIGNATURE || undefined,
    notifyCmd: env.MAIL_NOTIFY_CMD || "notify-send",
  };
}
