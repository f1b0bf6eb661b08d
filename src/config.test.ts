import { describe, it, expect } from "vitest";
import os from "node:os";
import path from "node:path";
import { createAccountFromEnv } from "./config.js";
import { ConfigError } from "./errors.js";

const BASE = {
  IMAP_HOST: "imap.example.com",
  IMAP_USER: "user@example.com",
  IMAP_PASS: "test-secret",
  SMTP_HOST: "smtp.example.com",
};

describe("createAccountFromEnv", () => {
  it("throws when IMAP_HOST is missing", () => {
    expect(() => createAccountFromEnv({ ...BASE, IMAP_HOST: undefined })).toThrow(
      "IMAP_HOST environment variable is required"
    );
  });

  it("throws when SMTP_HOST is missing", () => {
    expect(() => createAccountFromEnv({ ...BASE, SMTP_HOST: "" })).toThrow(ConfigError);
  });

  it("applies defaults", () => {
    const account = createAccountFromEnv(BASE);

    expect(account).toEqual({
      name: "",
      email: "user@example.com",
      imap: {
        host: "imap.example.com",
        port: 993,
        secure: true,
        tlsRejectUnauthorized: true,
        auth: { user: "user@example.com", pass: "test-secret" },
      },
      smtp: {
        host: "smtp.example.com",
        port: 465,
        secure: true,
        auth: { user: "user@example.com", pass: "test-secret" },
      },
      defaultMailbox: "INBOX",
      sentMailbox: "Sent",
      downloadsDir: path.join(os.homedir(), "Downloads"),
      signature: undefined,
      notifyCmd: "notify-send",
    });
  });

  it("reads overrides", () => {
    const account = createAccountFromEnv({
      ...BASE,
      IMAP_PORT: "143",
      IMAP_SECURE: "false",
      SMTP_PORT: "587",
      SMTP_SECURE: "false",
      SMTP_USER: "smtp-user",
      SMTP_PASS: "smtp-secret",
      MAIL_NAME: "Example User",
      MAIL_ADDRESS: "me@example.com",
      MAIL_SENT: "Sent Items",
      MAIL_SIGNATURE: "-- \nme",
    });

    expect(account.imap.port).toBe(143);
    expect(account.imap.secure).toBe(false);
    expect(account.smtp).toEqual({
      host: "smtp.example.com",
      port: 587,
      secure: false,
      auth: { user: "smtp-user", pass: "smtp-secret" },
    });
    expect(account.name).toBe("Example User");
    expect(account.email).toBe("me@example.com");
    expect(account.sentMailbox).toBe("Sent Items");
    expect(account.signature).toBe("-- \nme");
  });

  it("rejects an invalid port", () => {
    expect(() => createAccountFromEnv({ ...BASE, IMAP_PORT: "imap" })).toThrow(
      'IMAP_PORT must be a port number, got "imap"'
    );
  });
});
