import { describe, it, expect } from "vitest";
import { resolveMailto } from "./mailto.js";
import type { Account } from "../imap/types.js";
import { ParseError } from "../errors.js";

const account: Account = {
  name: "Me",
  email: "me@example.com",
  imap: {
    host: "imap.example.com",
    port: 993,
    secure: true,
    tlsRejectUnauthorized: true,
    auth: { user: "me@example.com", pass: "test-secret" },
  },
  smtp: {
    host: "smtp.example.com",
    port: 465,
    secure: true,
    auth: { user: "me@example.com", pass: "test-secret" },
  },
  defaultMailbox: "INBOX",
  sentMailbox: "Sent",
  downloadsDir: "/tmp/downloads",
  notifyCmd: "notify-send",
};

describe("resolveMailto", () => {
  it("resolves the recipient and a percent-encoded subject", () => {
    const tpl = resolveMailto("mailto:a@x.com?subject=Hi%20there", account);

    expect(tpl.kind).toBe("new");
    expect(tpl.from).toEqual([{ name: "Me", address: "me@example.com" }]);
    expect(tpl.to).toEqual([{ name: "", address: "a@x.com" }]);
    expect(tpl.subject).toBe("Hi there");
    expect(tpl.text).toBe("");
  });

  it("splits comma-separated recipients in the path", () => {
    const tpl = resolveMailto("mailto:a@x.com,%20b@x.com", account);
    expect(tpl.to.map((a) => a.address)).toEqual(["a@x.com", "b@x.com"]);
  });

  it("reads to, cc, bcc and body keys case-insensitively", () => {
    const tpl = resolveMailto(
      "mailto:a@x.com?TO=b@x.com&Cc=c@x.com&bcc=d@x.com&Body=line%20one%0Aline%20two",
      account
    );

    expect(tpl.to.map((a) => a.address)).toEqual(["a@x.com", "b@x.com"]);
    expect(tpl.cc.map((a) => a.address)).toEqual(["c@x.com"]);
    expect(tpl.bcc.map((a) => a.address)).toEqual(["d@x.com"]);
    expect(tpl.text).toBe("line one\nline two");
  });

  it("ignores unknown keys", () => {
    const tpl = resolveMailto("mailto:a@x.com?x-priority=1&subject=ok", account);
    expect(tpl.subject).toBe("ok");
  });

  it("keeps a plus sign literal", () => {
    const tpl = resolveMailto("mailto:a+tag@x.com?subject=1+1", account);
    expect(tpl.to).toEqual([{ name: "", address: "a+tag@x.com" }]);
    expect(tpl.subject).toBe("1+1");
  });

  it("accepts an empty path", () => {
    const tpl = resolveMailto("mailto:?to=a@x.com", account);
    expect(tpl.to).toEqual([{ name: "", address: "a@x.com" }]);
  });

  it("puts the body above the signature", () => {
    const tpl = resolveMailto("mailto:a@x.com?body=hello", {
      ...account,
      signature: "-- \nMe",
    });
    expect(tpl.text).toBe("hello\n\n-- \nMe");
  });

  it("accepts an upper-case scheme", () => {
    expect(resolveMailto("MAILTO:a@x.com", account).to).toHaveLength(1);
  });

  it("rejects other schemes", () => {
    expect(() => resolveMailto("https://x.com", account)).toThrow(ParseError);
  });

  it("rejects invalid percent-encoding", () => {
    expect(() => resolveMailto("mailto:a@x.com?subject=%E0%A4%A", account)).toThrow(
      ParseError
    );
  });
});
