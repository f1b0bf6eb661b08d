import { Command as Program } from "commander";
import type { FlagSet, SeqRange } from "../imap/types.js";
import { parseRange } from "../imap/range.js";
import { parseFlags } from "../imap/flags.js";
import { MAX_KEEPALIVE_MS } from "../imap/client.js";
import { ParseError } from "../errors.js";
import { isOutputFormat } from "./output.js";
import type { OutputFormat } from "./output.js";

export const DEFAULT_PAGE_SIZE = 10;
export const DEFAULT_KEEPALIVE_SECONDS = 500;
export const MAX_KEEPALIVE_SECONDS = Math.floor(MAX_KEEPALIVE_MS / 1000);

export type FlagOperation = "set" | "add" | "remove";

export type TemplateSource =
  | { kind: "new" }
  | { kind: "reply"; seq: number; all: boolean }
  | { kind: "forward"; seq: number; attachments: boolean };

/** One top-level operation, fully parsed. */
export type Command =
  | { kind: "mailboxes" }
  | { kind: "list"; pageSize: number; page: number }
  | { kind: "search"; query: string; pageSize: number; page: number }
  | { kind: "read"; seq: number; html: boolean; raw: boolean }
  | { kind: "attachments"; seq: number }
  | { kind: "write"; attach: string[] }
  | { kind: "reply"; seq: number; all: boolean; attach: string[] }
  | { kind: "forward"; seq: number; attachments: boolean; attach: string[] }
  | { kind: "mailto"; uri: string }
  | { kind: "send"; raw?: string }
  | { kind: "save"; mailbox: string; raw?: string }
  | { kind: "copy"; range: SeqRange; target: string }
  | { kind: "move"; range: SeqRange; target: string }
  | { kind: "delete"; range: SeqRange }
  | { kind: "flag"; op: FlagOperation; range: SeqRange; flags: FlagSet }
  | { kind: "template"; source: TemplateSource }
  | { kind: "watch"; keepaliveMs: number }
  | { kind: "notify"; keepaliveMs: number };

export interface Invocation {
  /** `--mailbox`, when given */
  mailbox?: string;
  output: OutputFormat;
  command: Command;
}

export interface ProgramIO {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

/**
 * True when the first argument is a `mailto:` URI. Desktop environments
 * pass the URI as the only argument, so it must be recognized before
 * subcommand parsing, which would reject it.
 */
export function isMailtoArgument(arg: string | undefined): arg is string {
  return arg !== undefined && /^mailto:/i.test(arg);
}

export function parseSeq(text: string): number {
  if (!/^\d+$/.test(text) || parseInt(text, 10) < 1) {
    throw new ParseError(`Invalid sequence number "${text}"`, text);
  }
  return parseInt(text, 10);
}

function parseCount(text: string, name: string, min: number, max?: number): number {
  if (!/^\d+$/.test(text) || parseInt(text, 10) < min) {
    throw new ParseError(
      `${name} must be a whole number of at least ${min}, got "${text}"`,
      text
    );
  }
  const n = parseInt(text, 10);
  if (max !== undefined && n > max) {
    throw new ParseError(`${name} must be at most ${max}, got "${text}"`, text);
  }
  return n;
}

/**
 * Join query words back into criteria text, re-quoting words the shell
 * unquoted so `search subject "team lunch"` keeps the phrase together.
 */
export function joinQuery(words: string[]): string {
  return words.map((w) => (/\s/.test(w) ? `"${w.replace(/"/g, '\\"')}"` : w)).join(" ");
}

interface PageOptions {
  size: string;
  page: string;
}

interface KeepaliveOptions {
  keepalive: string;
}

function pageOf(opts: PageOptions): { pageSize: number; page: number } {
  return {
    pageSize: parseCount(opts.size, "Page size", 1),
    page: parseCount(opts.page, "Page", 0),
  };
}

function keepaliveOf(opts: KeepaliveOptions): number {
  return parseCount(opts.keepalive, "Keepalive", 1, MAX_KEEPALIVE_SECONDS) * 1000;
}

/**
 * Build the commander program. Each action records its Command through
 * `emit` instead of running anything.
 */
export function buildProgram(emit: (command: Command) => void, io?: ProgramIO): Program {
  const program = new Program();
  program
    .name("tern")
    .description("Command-line email client over IMAP and SMTP")
    .version("0.1.0")
    .exitOverride()
    .option("-m, --mailbox <mbox>", "Mailbox to operate on (default: MAIL_MAILBOX or INBOX)")
    .option("-o, --output <format>", "Output format: plain or json", "plain")
    .addHelpText(
      "after",
      `
EXAMPLES
  tern list -s 20                  20 newest messages
  tern search unseen from alice    Unread messages from alice
  tern read 42                     Read message 42
  tern move 3:5,9 Archive          Move messages 3, 4, 5 and 9
  tern flag add 1:10 seen          Mark messages 1 to 10 as read
  tern "mailto:a@x.com?subject=Hi" Compose from a mailto link
`
    );
  if (io) {
    program.configureOutput(io);
  }

  program
    .command("mailboxes")
    .description("List mailboxes")
    .action(() => emit({ kind: "mailboxes" }));

  program
    .command("list", { isDefault: true })
    .description("List messages, newest first")
    .allowExcessArguments(false)
    .option("-s, --size <n>", "Page size", String(DEFAULT_PAGE_SIZE))
    .option("-p, --page <n>", "Page number, 0 is the newest", "0")
    .action((opts: PageOptions) => emit({ kind: "list", ...pageOf(opts) }));

  program
    .command("search <query...>")
    .description("Search messages with IMAP SEARCH criteria")
    .option("-s, --size <n>", "Page size", String(DEFAULT_PAGE_SIZE))
    .option("-p, --page <n>", "Page number, 0 is the newest", "0")
    .action((query: string[], opts: PageOptions) =>
      emit({ kind: "search", query: joinQuery(query), ...pageOf(opts) })
    );

  program
    .command("read <seq>")
    .description("Read a message")
    .option("--html", "Show the HTML part instead of the plain text")
    .option("--raw", "Show the raw message source")
    .action((seq: string, opts: { html?: boolean; raw?: boolean }) =>
      emit({ kind: "read", seq: parseSeq(seq), html: opts.html === true, raw: opts.raw === true })
    );

  program
    .command("attachments <seq>")
    .description("Download the attachments of a message")
    .action((seq: string) => emit({ kind: "attachments", seq: parseSeq(seq) }));

  program
    .command("write")
    .description("Write a new message in $EDITOR and send it")
    .option("-a, --attachment <files...>", "Files to attach")
    .action((opts: { attachment?: string[] }) =>
      emit({ kind: "write", attach: opts.attachment ?? [] })
    );

  program
    .command("reply <seq>")
    .description("Reply to a message")
    .option("-A, --all", "Reply to all recipients")
    .option("-a, --attachment <files...>", "Files to attach")
    .action((seq: string, opts: { all?: boolean; attachment?: string[] }) =>
      emit({
        kind: "reply",
        seq: parseSeq(seq),
        all: opts.all === true,
        attach: opts.attachment ?? [],
      })
    );

  program
    .command("forward <seq>")
    .description("Forward a message")
    .option("--attachments", "Include the original attachments")
    .option("-a, --attachment <files...>", "Files to attach")
    .action((seq: string, opts: { attachments?: boolean; attachment?: string[] }) =>
      emit({
        kind: "forward",
        seq: parseSeq(seq),
        attachments: opts.attachments === true,
        attach: opts.attachment ?? [],
      })
    );

  program
    .command("send [raw]")
    .description("Send a raw message (from the argument or stdin)")
    .action((raw: string | undefined) => emit({ kind: "send", raw }));

  program
    .command("save <mbox> [raw]")
    .description("Save a raw message (from the argument or stdin) to a mailbox")
    .action((mailbox: string, raw: string | undefined) => emit({ kind: "save", mailbox, raw }));

  program
    .command("copy <range> <target>")
    .description("Copy messages to another mailbox")
    .action((range: string, target: string) =>
      emit({ kind: "copy", range: parseRange(range), target })
    );

  program
    .command("move <range> <target>")
    .description("Move messages to another mailbox")
    .action((range: string, target: string) =>
      emit({ kind: "move", range: parseRange(range), target })
    );

  program
    .command("delete <range>")
    .description("Delete messages")
    .action((range: string) => emit({ kind: "delete", range: parseRange(range) }));

  const flag = program.command("flag").description("Change message flags");
  for (const op of ["set", "add", "remove"] as const) {
    flag
      .command(`${op} <range> <flags...>`)
      .description(`${op} flags, e.g. "seen flagged"`)
      .action((range: string, flags: string[]) =>
        emit({ kind: "flag", op, range: parseRange(range), flags: parseFlags(flags.join(" ")) })
      );
  }

  const template = program.command("template").description("Print a template without sending");
  template
    .command("new")
    .description("Template for a new message")
    .action(() => emit({ kind: "template", source: { kind: "new" } }));
  template
    .command("reply <seq>")
    .description("Template for a reply")
    .option("-A, --all", "Reply to all recipients")
    .action((seq: string, opts: { all?: boolean }) =>
      emit({
        kind: "template",
        source: { kind: "reply", seq: parseSeq(seq), all: opts.all === true },
      })
    );
  template
    .command("forward <seq>")
    .description("Template for a forward")
    .option("--attachments", "Include the original attachments")
    .action((seq: string, opts: { attachments?: boolean }) =>
      emit({
        kind: "template",
        source: { kind: "forward", seq: parseSeq(seq), attachments: opts.attachments === true },
      })
    );

  program
    .command("watch")
    .description("Keep the mailbox in IDLE until interrupted")
    .option("-k, --keepalive <seconds>", "Re-issue IDLE after", String(DEFAULT_KEEPALIVE_SECONDS))
    .action((opts: KeepaliveOptions) => emit({ kind: "watch", keepaliveMs: keepaliveOf(opts) }));

  program
    .command("notify")
    .description("Run MAIL_NOTIFY_CMD for every new message until interrupted")
    .option("-k, --keepalive <seconds>", "Re-issue IDLE after", String(DEFAULT_KEEPALIVE_SECONDS))
    .action((opts: KeepaliveOptions) => emit({ kind: "notify", keepaliveMs: keepaliveOf(opts) }));

  return program;
}

/**
 * Parse command-line arguments (without the node and script entries)
 * into an Invocation. Help and version output surface as a
 * CommanderError from commander's exit override. `mailto:` arguments
 * are not handled here; see `isMailtoArgument`.
 */
export function parseInvocation(argv: readonly string[], io?: ProgramIO): Invocation {
  const parsed: { command?: Command } = {};
  const program = buildProgram((command) => {
    parsed.command = command;
  }, io);
  program.parse([...argv], { from: "user" });

  const opts = program.opts<{ mailbox?: string; output: string }>();
  if (!isOutputFormat(opts.output)) {
    throw new ParseError(
      `Unknown output format "${opts.output}", expected plain or json`,
      opts.output
    );
  }
  if (!parsed.command) {
    throw new ParseError("No command given", argv.join(" "));
  }

  return {
    ...(opts.mailbox ? { mailbox: opts.mailbox } : {}),
    output: opts.output,
    command: parsed.command,
  };
}
