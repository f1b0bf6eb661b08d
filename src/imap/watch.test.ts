import { describe, it, expect, vi, beforeEach } from "vitest";
import { execFile } from "node:child_process";
import { watch, notify, notifyCycle, commandHook } from "./watch.js";
import type { MailboxSession } from "./client.js";
import type { ResidentMsg } from "./types.js";
import { emptyMsg } from "./types.js";
import { NotifyError } from "../errors.js";

vi.mock("node:child_process", () => ({
  execFile: vi.fn(),
}));

function headerMsg(uid: number) {
  return {
    seq: uid,
    uid,
    flags: new Set<string>(),
    envelope: {
      subject: `message ${uid}`,
      from: [{ name: "Alice", address: "alice@example.com" }],
    },
  };
}

/**
 * A session whose UID set grows by one message on each IDLE wake-up.
 */
function createMockSession(initial: number[], arrivals: number[][] = []) {
  let uids = [...initial];
  const mockClient = {
    search: vi.fn(async () => [...uids]),
    fetch: vi.fn().mockImplementation(async function* (range: string) {
      for (const part of range.split(",")) {
        const [start, end = start] = part.split(":").map(Number);
        for (let uid = start; uid <= end; uid++) yield headerMsg(uid);
      }
    }),
  };

  const session = {
    selected: vi.fn().mockReturnValue({ client: mockClient, mailbox: "INBOX" }),
    idle: vi.fn(async () => {
      uids = arrivals.shift() ?? uids;
    }),
  };

  return {
    session: session as unknown as MailboxSession,
    idle: session.idle,
    mockClient,
  };
}

// ---------------------------------------------------------------------------
// notifyCycle
// ---------------------------------------------------------------------------

describe("notifyCycle", () => {
  it("fires once for a new UID and not again on the next cycle", async () => {
    const { session } = createMockSession([1, 2, 3]);
    const hook = vi.fn(async (_msg: ResidentMsg) => {});

    const next = await notifyCycle(session, new Set([1, 2]), hook);

    expect(hook).toHaveBeenCalledTimes(1);
    expect(hook.mock.calls[0][0].uid).toBe(3);
    expect(hook.mock.calls[0][0].subject).toBe("message 3");
    expect([...next]).toEqual([1, 2, 3]);

    await notifyCycle(session, next, hook);
    expect(hook).toHaveBeenCalledTimes(1);
  });

  it("reports several arrivals in ascending UID order", async () => {
    const { session, mockClient } = createMockSession([9, 1, 7]);
    const seenUids: number[] = [];

    await notifyCycle(session, new Set([1]), async (msg) => {
      seenUids.push(msg.uid);
    });

    expect(mockClient.fetch.mock.calls[0][0]).toBe("7,9");
    expect(mockClient.fetch.mock.calls[0][2]).toEqual({ uid: true });
    expect(seenUids).toEqual([7, 9]);
  });

  it("drops expunged UIDs from the snapshot without firing", async () => {
    const { session, mockClient } = createMockSession([2]);
    const hook = vi.fn(async () => {});

    const next = await notifyCycle(session, new Set([1, 2]), hook);

    expect(hook).not.toHaveBeenCalled();
    expect(mockClient.fetch).not.toHaveBeenCalled();
    expect([...next]).toEqual([2]);
  });

  it("stops with a NotifyError when a hook fails", async () => {
    const { session } = createMockSession([1, 2]);
    const hook = vi
      .fn<(msg: ResidentMsg) => Promise<void>>()
      .mockRejectedValueOnce(new Error("no display"))
      .mockResolvedValue(undefined);

    const error = await notifyCycle(session, new Set(), hook).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotifyError);
    expect(error).toHaveProperty("message", "Notification for UID 1 failed: no display");
    expect(hook).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Loops
// ---------------------------------------------------------------------------

describe("notify", () => {
  it("reports only messages that arrive after it starts", async () => {
    const { session, idle } = createMockSession([1, 2], [[1, 2, 3], [1, 2, 3]]);
    const controller = new AbortController();
    const reported: number[] = [];
    const grow = idle.getMockImplementation();
    idle.mockImplementation(async () => {
      await grow?.();
      if (idle.mock.calls.length === 2) controller.abort();
    });

    await notify(
      session,
      1000,
      async (msg) => {
        reported.push(msg.uid);
      },
      { signal: controller.signal }
    );

    expect(idle).toHaveBeenCalledTimes(2);
    expect(idle).toHaveBeenCalledWith(1000);
    expect(reported).toEqual([3]);
  });

  it("ends the loop when a notification fails", async () => {
    const { session, idle } = createMockSession([1], [[1, 2]]);
    const hook = vi.fn(async () => {
      throw new NotifyError('Notify command "notify" failed: exit 1');
    });

    await expect(notify(session, 1000, hook)).rejects.toThrow(
      'Notify command "notify" failed: exit 1'
    );
    expect(idle).toHaveBeenCalledTimes(1);
  });
});

describe("watch", () => {
  it("re-issues IDLE until aborted", async () => {
    const { session, idle } = createMockSession([]);
    const controller = new AbortController();
    idle.mockImplementation(async () => {
      if (idle.mock.calls.length === 3) controller.abort();
    });

    await watch(session, 500, { signal: controller.signal });

    expect(idle).toHaveBeenCalledTimes(3);
  });

  it("does not IDLE when already aborted", async () => {
    const { session, idle } = createMockSession([]);
    const controller = new AbortController();
    controller.abort();

    await watch(session, 500, { signal: controller.signal });

    expect(idle).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// commandHook
// ---------------------------------------------------------------------------

describe("commandHook", () => {
  const execFileMock = vi.mocked(execFile);

  beforeEach(() => {
    execFileMock.mockReset();
    execFileMock.mockImplementation(((
      _cmd: string,
      _args: string[],
      callback: (error: Error | null, result: { stdout: string; stderr: string }) => void
    ) => {
      callback(null, { stdout: "", stderr: "" });
    }) as unknown as typeof execFile);
  });

  it("runs the command with the sender and subject", async () => {
    const msg: ResidentMsg = {
      ...emptyMsg(),
      seq: 3,
      uid: 3,
      flags: new Set(),
      from: [{ name: "Alice", address: "alice@example.com" }],
      subject: "Lunch?",
    };

    await commandHook("notify-send")(msg);

    expect(execFileMock.mock.calls[0][0]).toBe("notify-send");
    expect(execFileMock.mock.calls[0][1]).toEqual(["📫 Alice", "Lunch?"]);
  });

  it("falls back to the address and a placeholder subject", async () => {
    const msg: ResidentMsg = {
      ...emptyMsg(),
      seq: 1,
      uid: 1,
      flags: new Set(),
      from: [{ name: "", address: "bob@example.com" }],
    };

    await commandHook("notify")(msg);

    expect(execFileMock.mock.calls[0][1]).toEqual(["📫 bob@example.com", "(no subject)"]);
  });

  it("rejects when the command fails", async () => {
    execFileMock.mockImplementation(((
      _cmd: string,
      _args: string[],
      callback: (error: Error | null) => void
    ) => {
      callback(new Error("spawn notify ENOENT"));
    }) as unknown as typeof execFile);

    const msg: ResidentMsg = { ...emptyMsg(), seq: 1, uid: 1, flags: new Set() };
    await expect(commandHook("notify")(msg)).rejects.toThrow(
      'Notify command "notify" failed: spawn notify ENOENT'
    );
  });
});
