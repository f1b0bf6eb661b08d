import chalk from "chalk";
import type { MailboxEntry } from "../imap/folders.js";
import type { MessageSummary } from "../imap/types.js";

export type OutputFormat = "plain" | "json";

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "plain" || value === "json";
}

/**
 * Everything a command prints to stdout. Diagnostics go to the logger,
 * errors to `printError`.
 */
export interface Output {
  mailboxes(entries: MailboxEntry[]): void;
  messages(summaries: MessageSummary[]): void;
  /** A message body, raw source or rendered template */
  text(content: string): void;
  paths(written: string[]): void;
  success(message: string): void;
}

type Cell = string | number | boolean | undefined | null;

export function table(headers: string[], rows: Cell[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((r) => String(r[i] ?? "").length))
  );

  console.log(headers.map((h, i) => chalk.bold(h.padEnd(widths[i] ?? 0))).join("  "));
  console.log(widths.map((w) => "─".repeat(w)).join("  "));

  for (const row of rows) {
    console.log(row.map((cell, i) => String(cell ?? "").padEnd(widths[i] ?? 0)).join("  "));
  }
}

/** `2024-01-15T10:30:00.000Z` -> `2024-01-15 10:30` */
function shortDate(iso: string): string {
  return iso ? iso.slice(0, 16).replace("T", " ") : "";
}

const plain: Output = {
  mailboxes(entries) {
    table(
      ["Path", "Delimiter", "Special use"],
      entries.map((mb) => [mb.path, mb.delimiter, mb.specialUse])
    );
  },

  messages(summaries) {
    if (summaries.length === 0) {
      console.log(chalk.dim("No messages."));
      return;
    }
    table(
      ["Seq", "Flags", "Subject", "From", "Date"],
      summaries.map((m) => [
        m.seq,
        m.flags + (m.hasAttachments ? "@" : " "),
        m.subject,
        m.from,
        shortDate(m.date),
      ])
    );
  },

  text(content) {
    console.log(content);
  },

  paths(written) {
    if (written.length === 0) {
      console.log(chalk.dim("No attachments."));
      return;
    }
    for (const file of written) {
      console.log(file);
    }
  },

  success(message) {
    console.log(chalk.green(message));
  },
};

function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

const structured: Output = {
  mailboxes: (entries) => json(entries),
  messages: (summaries) => json(summaries),
  text: (content) => json({ content }),
  paths: (written) => json(written),
  success: (message) => json({ message }),
};

export function createOutput(format: OutputFormat): Output {
  return format === "json" ? structured : plain;
}

export function printError(text: string): void {
  console.error(chalk.red(`Error: ${text}`));
}
