import { describe, it, expect, vi } from "vitest";
import {
  parseFlags,
  formatFlags,
  unionFlags,
  differenceFlags,
  flagSymbols,
  setFlags,
  addFlags,
  removeFlags,
} from "./flags.js";
import type { MailboxSession } from "./client.js";
import { parseRange } from "./range.js";
import { InvalidStateError, ParseError, ProtocolError } from "../errors.js";

function createMockSession() {
  const mockClient = {
    messageFlagsSet: vi.fn().mockResolvedValue(true),
    messageFlagsAdd: vi.fn().mockResolvedValue(true),
    messageFlagsRemove: vi.fn().mockResolvedValue(true),
  };

  const session = {
    selected: vi.fn().mockReturnValue({ client: mockClient, mailbox: "INBOX" }),
  } as unknown as MailboxSession;

  return { session, mockClient };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseFlags", () => {
  it("normalizes system flags case-insensitively", () => {
    expect([...parseFlags("seen ANSWERED \\Flagged")]).toEqual([
      "\\Seen",
      "\\Answered",
      "\\Flagged",
    ]);
  });

  it("accepts commas as separators", () => {
    expect([...parseFlags("seen,draft, deleted")]).toEqual([
      "\\Seen",
      "\\Draft",
      "\\Deleted",
    ]);
  });

  it("keeps unknown tokens as custom keywords", () => {
    expect([...parseFlags("seen $Important todo")]).toEqual([
      "\\Seen",
      "$Important",
      "todo",
    ]);
  });

  it("de-duplicates, keeping the first spelling of a keyword", () => {
    expect([...parseFlags("Todo seen todo \\SEEN")]).toEqual(["Todo", "\\Seen"]);
  });

  it("rejects an empty list", () => {
    expect(() => parseFlags("  ,  ")).toThrow(ParseError);
  });

  it("rejects a lone backslash", () => {
    expect(() => parseFlags("seen \\")).toThrow(/Invalid flag/);
  });
});

describe("formatFlags", () => {
  it("joins flags with spaces", () => {
    expect(formatFlags(new Set(["\\Seen", "todo"]))).toBe("\\Seen todo");
  });
});

// ---------------------------------------------------------------------------
// Flag algebra
// ---------------------------------------------------------------------------

describe("flag algebra", () => {
  const base = new Set(["\\Seen", "work"]);
  const extra = parseFlags("flagged answered");

  it("adding twice equals adding once", () => {
    const once = unionFlags(base, extra);
    const twice = unionFlags(once, extra);
    expect(twice).toEqual(once);
  });

  it("adding a present flag is a no-op", () => {
    expect(unionFlags(base, new Set(["\\Seen"]))).toEqual(base);
  });

  it("removing an absent flag is a no-op", () => {
    expect(differenceFlags(base, new Set(["\\Deleted"]))).toEqual(base);
  });

  it("removing what was added restores the original set", () => {
    expect(differenceFlags(unionFlags(base, extra), extra)).toEqual(base);
  });

  it("does not mutate its inputs", () => {
    unionFlags(base, extra);
    differenceFlags(base, base);
    expect([...base]).toEqual(["\\Seen", "work"]);
  });
});

describe("flagSymbols", () => {
  it("marks unseen messages", () => {
    expect(flagSymbols(new Set())).toBe("*  ");
  });

  it("marks answered and flagged messages", () => {
    expect(flagSymbols(new Set(["\\Seen", "\\Answered", "\\Flagged"]))).toBe(" R!");
  });
});

// ---------------------------------------------------------------------------
// Session mutations
// ---------------------------------------------------------------------------

describe("setFlags", () => {
  it("replaces flags with a single STORE over the normalized range", async () => {
    const { session, mockClient } = createMockSession();

    await setFlags(session, parseRange("1,3:5"), parseFlags("seen flagged"));

    expect(mockClient.messageFlagsSet).toHaveBeenCalledTimes(1);
    expect(mockClient.messageFlagsSet).toHaveBeenCalledWith("1,3:5", [
      "\\Seen",
      "\\Flagged",
    ]);
  });
});

describe("addFlags", () => {
  it("adds flags to the addressed messages", async () => {
    const { session, mockClient } = createMockSession();

    await addFlags(session, parseRange("2"), parseFlags("answered"));

    expect(mockClient.messageFlagsAdd).toHaveBeenCalledWith("2", ["\\Answered"]);
  });

  it("wraps server rejections as ProtocolError", async () => {
    const { session, mockClient } = createMockSession();
    mockClient.messageFlagsAdd.mockRejectedValue(new Error("STORE failed"));

    await expect(addFlags(session, parseRange("2"), parseFlags("seen"))).rejects.toThrow(ProtocolError);
  });

  it("requires a selected mailbox", async () => {
    const session = {
      selected: vi.fn(() => {
        throw new InvalidStateError("No mailbox selected. Call select() first.");
      }),
    } as unknown as MailboxSession;

    await expect(addFlags(session, parseRange("1"), parseFlags("seen"))).rejects.toThrow(
      InvalidStateError
    );
  });
});

describe("removeFlags", () => {
  it("removes flags from the addressed messages", async () => {
    const { session, mockClient } = createMockSession();

    await removeFlags(session, parseRange("7:8"), parseFlags("seen"));

    expect(mockClient.messageFlagsRemove).toHaveBeenCalledWith("7:8", ["\\Seen"]);
  });
});
