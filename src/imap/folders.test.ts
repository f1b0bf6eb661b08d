import { describe, it, expect, vi } from "vitest";
import {
  listMailboxes,
  findMailbox,
  copyMessages,
  moveMessages,
  deleteMessages,
} from "./folders.js";
import type { MailboxSession } from "./client.js";
import { parseRange } from "./range.js";
import { NotFoundError, ProtocolError } from "../errors.js";

const MAILBOXES = [
  { path: "INBOX", name: "INBOX", delimiter: "/", flags: new Set() },
  { path: "INBOX/Receipts", name: "Receipts", delimiter: "/", flags: new Set() },
  {
    path: "Sent Items",
    name: "Sent Items",
    delimiter: "/",
    flags: new Set(["\\Sent"]),
    specialUse: "\\Sent",
  },
  { path: "Archive", name: "Archive", delimiter: "/", flags: new Set() },
];

/**
 * A session with INBOX selected holding messages 1..`exists`.
 */
function createMockSession(exists: number, mailboxes: Record<string, unknown>[] = MAILBOXES) {
  const mockClient = {
    list: vi.fn().mockResolvedValue(mailboxes),
    search: vi.fn().mockResolvedValue(Array.from({ length: exists }, (_, i) => i + 1)),
    messageCopy: vi.fn().mockResolvedValue({ path: "INBOX", destination: "Archive" }),
    messageMove: vi.fn().mockResolvedValue({ path: "INBOX", destination: "Archive" }),
    messageDelete: vi.fn().mockResolvedValue(true),
  };

  const session = {
    getClient: vi.fn().mockReturnValue(mockClient),
    selected: vi.fn().mockReturnValue({ client: mockClient, mailbox: "INBOX" }),
  } as unknown as MailboxSession;

  return { session, mockClient };
}

// ---------------------------------------------------------------------------
// listMailboxes
// ---------------------------------------------------------------------------

describe("listMailboxes", () => {
  it("returns empty array when no mailboxes exist", async () => {
    const { session } = createMockSession(0, []);
    expect(await listMailboxes(session)).toEqual([]);
  });

  it("maps mailbox properties and keeps the special-use attribute", async () => {
    const { session } = createMockSession(0);

    const result = await listMailboxes(session);

    expect(result).toHaveLength(4);
    expect(result[1]).toEqual({ path: "INBOX/Receipts", name: "Receipts", delimiter: "/" });
    expect(result[2]).toEqual({
      path: "Sent Items",
      name: "Sent Items",
      delimiter: "/",
      specialUse: "\\Sent",
    });
  });

  it("handles dot delimiter servers", async () => {
    const { session } = createMockSession(0, [
      { path: "INBOX", name: "INBOX", delimiter: "." },
      { path: "INBOX.Archive", name: "Archive", delimiter: "." },
    ]);

    const result = await listMailboxes(session);
    expect(result[1]).toEqual({ path: "INBOX.Archive", name: "Archive", delimiter: "." });
  });

  it("wraps server errors", async () => {
    const { session, mockClient } = createMockSession(0);
    mockClient.list.mockRejectedValue(new Error("LIST failed"));
    await expect(listMailboxes(session)).rejects.toThrow(ProtocolError);
  });
});

describe("findMailbox", () => {
  it("prefers the special-use attribute", async () => {
    const { session } = createMockSession(0);
    expect(await findMailbox(session, "\\Sent", "Sent")).toBe("Sent Items");
  });

  it("falls back to a case-insensitive name match", async () => {
    const { session } = createMockSession(0);
    expect(await findMailbox(session, "\\Archive", "archive")).toBe("Archive");
  });

  it("throws NotFoundError when neither matches", async () => {
    const { session } = createMockSession(0);
    await expect(findMailbox(session, "\\Drafts", "Drafts")).rejects.toThrow(NotFoundError);
  });
});

// ---------------------------------------------------------------------------
// copy / move / delete
// ---------------------------------------------------------------------------

describe("copyMessages", () => {
  it("copies the range in one command", async () => {
    const { session, mockClient } = createMockSession(10);

    const result = await copyMessages(session, parseRange("1,3:5"), "Archive");

    expect(mockClient.messageCopy).toHaveBeenCalledWith("1,3:5", "Archive");
    expect(result).toEqual({ count: 4, destination: "Archive" });
  });

  it("copies nothing when a message is absent", async () => {
    const { session, mockClient } = createMockSession(3);

    await expect(copyMessages(session, parseRange("2,4"), "Archive")).rejects.toThrow(
      "Message(s) 4 not found in INBOX; nothing was changed"
    );
    expect(mockClient.messageCopy).not.toHaveBeenCalled();
  });

  it("rejects an unknown destination", async () => {
    const { session, mockClient } = createMockSession(3);

    await expect(copyMessages(session, parseRange("1"), "Nowhere")).rejects.toThrow(
      'Mailbox "Nowhere" not found'
    );
    expect(mockClient.messageCopy).not.toHaveBeenCalled();
  });

  it("reports a refused COPY", async () => {
    const { session, mockClient } = createMockSession(3);
    mockClient.messageCopy.mockResolvedValue(false);

    await expect(copyMessages(session, parseRange("1"), "Archive")).rejects.toThrow(
      "COPY to Archive failed"
    );
  });
});

describe("moveMessages", () => {
  it("moves the range in one command", async () => {
    const { session, mockClient } = createMockSession(10);

    const result = await moveMessages(session, parseRange("2:3"), "INBOX/Receipts");

    expect(mockClient.messageMove).toHaveBeenCalledWith("2:3", "INBOX/Receipts");
    expect(result).toEqual({ count: 2, destination: "INBOX/Receipts" });
  });

  it("mutates nothing when a member of the range is absent", async () => {
    const { session, mockClient } = createMockSession(5);

    const error = await moveMessages(session, parseRange("4:7"), "Archive").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty(
      "message",
      "Message(s) 6:7 not found in INBOX; nothing was changed"
    );
    expect(mockClient.messageMove).not.toHaveBeenCalled();
    expect(mockClient.messageCopy).not.toHaveBeenCalled();
    expect(mockClient.messageDelete).not.toHaveBeenCalled();
  });

  it("passes the server's rejection text through", async () => {
    const { session, mockClient } = createMockSession(5);
    mockClient.messageMove.mockRejectedValue(
      Object.assign(new Error("Command failed"), { responseText: "[OVERQUOTA] Quota exceeded" })
    );

    await expect(moveMessages(session, parseRange("1"), "Archive")).rejects.toThrow(
      "[OVERQUOTA] Quota exceeded"
    );
  });
});

describe("deleteMessages", () => {
  it("deletes and expunges the range", async () => {
    const { session, mockClient } = createMockSession(10);

    expect(await deleteMessages(session, parseRange("7:9"))).toBe(3);
    expect(mockClient.messageDelete).toHaveBeenCalledWith("7:9");
  });

  it("deletes nothing when a message is absent", async () => {
    const { session, mockClient } = createMockSession(2);

    await expect(deleteMessages(session, parseRange("1:3"))).rejects.toThrow(NotFoundError);
    expect(mockClient.messageDelete).not.toHaveBeenCalled();
  });

  it("reports a refused delete", async () => {
    const { session, mockClient } = createMockSession(2);
    mockClient.messageDelete.mockResolvedValue(false);

    await expect(deleteMessages(session, parseRange("1"))).rejects.toThrow(
      "DELETE in INBOX failed"
    );
  });

  it("names the missing tail of a range wider than the mailbox", async () => {
    const { session, mockClient } = createMockSession(5);

    await expect(deleteMessages(session, parseRange("1:4294967295"))).rejects.toThrow(
      "Message(s) 6:4294967295 not found in INBOX; nothing was changed"
    );
    expect(mockClient.messageDelete).not.toHaveBeenCalled();
  });
});
