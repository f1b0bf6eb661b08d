import {
  withMailboxSession,
  listMailboxes,
  findMailbox,
  listPage,
  searchPage,
  readMessage,
  fetchMessage,
  downloadAttachments,
  saveMessage,
  copyMessages,
  moveMessages,
  deleteMessages,
  setFlags,
  addFlags,
  removeFlags,
  formatRange,
  rangeOf,
  formatFlags,
  watch,
  notify,
  commandHook,
} from "../imap/index.js";
import type { Account, MailboxSession, Msg, Template } from "../imap/index.js";
import { withDeliverySession } from "../smtp/delivery.js";
import type { SendResult } from "../smtp/delivery.js";
import {
  newTemplate,
  replyTemplate,
  forwardTemplate,
  renderTemplate,
  parseTemplate,
} from "../compose/template.js";
import { resolveMailto } from "../compose/mailto.js";
import { InvalidStateError } from "../errors.js";
import { log } from "../logger.js";
import type { Command, FlagOperation, TemplateSource } from "./commands.js";
import type { Output } from "./output.js";
import { readAttachments } from "./editor.js";

export interface HandlerContext {
  account: Account;
  /** Mailbox to select for sequence-addressed commands */
  mailbox: string;
  output: Output;
  /** Let the user edit a rendered template */
  edit: (text: string) => Promise<string>;
  /** Raw message text when none was given on the command line */
  readInput: () => Promise<string>;
  /** Stops watch and notify */
  signal?: AbortSignal;
}

const STORE = {
  set: setFlags,
  add: addFlags,
  remove: removeFlags,
} satisfies Record<FlagOperation, typeof setFlags>;

const STORE_VERB: Record<FlagOperation, string> = {
  set: "set on",
  add: "added to",
  remove: "removed from",
};

async function sentMailbox(session: MailboxSession, account: Account): Promise<string> {
  return findMailbox(session, "\\Sent", account.sentMailbox);
}

/**
 * Send a message and keep a copy in `sent`, which the caller resolves
 * before anything goes out.
 */
async function deliver(
  session: MailboxSession,
  sent: string,
  send: () => Promise<SendResult>
): Promise<SendResult> {
  const result = await send();
  await saveMessage(session, sent, result.raw);
  log.debug(`saved a copy of ${result.messageId} to ${sent}`);
  return result;
}

/**
 * Edit a template, attach files and send the result.
 */
async function composeAndSend(
  session: MailboxSession,
  ctx: HandlerContext,
  tpl: Template,
  attach: string[]
): Promise<SendResult> {
  const sent = await sentMailbox(session, ctx.account);
  const edited = await ctx.edit(renderTemplate(tpl));
  const parsed = await parseTemplate(edited, tpl);
  const msg: Msg = {
    ...parsed,
    attachments: [...parsed.attachments, ...(await readAttachments(attach))],
  };

  return deliver(session, sent, () =>
    withDeliverySession(ctx.account, (delivery) => delivery.send(msg))
  );
}

async function buildTemplate(
  session: MailboxSession,
  account: Account,
  source: TemplateSource
): Promise<Template> {
  switch (source.kind) {
    case "new":
      return newTemplate(account);
    case "reply":
      return replyTemplate(await fetchMessage(session, source.seq), account, { all: source.all });
    case "forward":
      return forwardTemplate(await fetchMessage(session, source.seq), account, {
        attachments: source.attachments,
      });
  }
}

function sentMessage(result: SendResult): string {
  return `Message sent to ${result.accepted.join(", ")}`;
}

/**
 * Run one command against fresh sessions. Every session is released
 * before this returns or throws.
 */
export async function runCommand(command: Command, ctx: HandlerContext): Promise<void> {
  const { account, output } = ctx;
  const inMailbox = <T>(fn: (session: MailboxSession) => Promise<T>) =>
    withMailboxSession(account, fn, ctx.mailbox);

  switch (command.kind) {
    case "mailboxes":
      output.mailboxes(await inMailbox(listMailboxes));
      return;

    case "list":
      output.messages(
        await inMailbox((session) => listPage(session, command.pageSize, command.page))
      );
      return;

    case "search":
      output.messages(
        await inMailbox((session) =>
          searchPage(session, command.query, command.pageSize, command.page)
        )
      );
      return;

    case "read":
      output.text(
        await inMailbox((session) =>
          readMessage(session, command.seq, {
            mime: command.html ? "html" : "plain",
            raw: command.raw,
          })
        )
      );
      return;

    case "attachments":
      output.paths(
        await inMailbox((session) =>
          downloadAttachments(session, command.seq, account.downloadsDir)
        )
      );
      return;

    case "write": {
      const result = await inMailbox((session) =>
        composeAndSend(session, ctx, newTemplate(account), command.attach)
      );
      output.success(sentMessage(result));
      return;
    }

    case "mailto": {
      const tpl = resolveMailto(command.uri, account);
      const result = await inMailbox((session) => composeAndSend(session, ctx, tpl, []));
      output.success(sentMessage(result));
      return;
    }

    case "reply": {
      const result = await inMailbox(async (session) => {
        const source = await fetchMessage(session, command.seq);
        const tpl = replyTemplate(source, account, { all: command.all });
        const sent = await composeAndSend(session, ctx, tpl, command.attach);
        await addFlags(session, rangeOf([command.seq]), new Set(["\\Answered"]));
        return sent;
      });
      output.success(sentMessage(result));
      return;
    }

    case "forward": {
      const result = await inMailbox(async (session) => {
        const source = await fetchMessage(session, command.seq);
        const tpl = forwardTemplate(source, account, { attachments: command.attachments });
        return composeAndSend(session, ctx, tpl, command.attach);
      });
      output.success(sentMessage(result));
      return;
    }

    case "send": {
      const raw = command.raw ?? (await ctx.readInput());
      const result = await inMailbox(async (session) =>
        deliver(session, await sentMailbox(session, account), () =>
          withDeliverySession(account, (delivery) => delivery.sendRaw(raw))
        )
      );
      output.success(sentMessage(result));
      return;
    }

    case "save": {
      const raw = command.raw ?? (await ctx.readInput());
      await inMailbox((session) => saveMessage(session, command.mailbox, raw));
      output.success(`Message saved to ${command.mailbox}`);
      return;
    }

    case "copy": {
      const result = await inMailbox((session) =>
        copyMessages(session, command.range, command.target)
      );
      output.success(`Copied ${result.count} message(s) to ${result.destination}`);
      return;
    }

    case "move": {
      const result = await inMailbox((session) =>
        moveMessages(session, command.range, command.target)
      );
      output.success(`Moved ${result.count} message(s) to ${result.destination}`);
      return;
    }

    case "delete": {
      const count = await inMailbox((session) => deleteMessages(session, command.range));
      output.success(`Deleted ${count} message(s)`);
      return;
    }

    case "flag":
      await inMailbox((session) => STORE[command.op](session, command.range, command.flags));
      output.success(
        `Flag(s) ${formatFlags(command.flags)} ${STORE_VERB[command.op]} ` +
          formatRange(command.range)
      );
      return;

    case "template": {
      const source = command.source;
      const tpl =
        source.kind === "new"
          ? newTemplate(account)
          : await inMailbox((session) => buildTemplate(session, account, source));
      output.text(renderTemplate(tpl));
      return;
    }

    case "watch":
      await inMailbox((session) => watch(session, command.keepaliveMs, { signal: ctx.signal }));
      return;

    case "notify":
      await inMailbox((session) =>
        notify(session, command.keepaliveMs, commandHook(account.notifyCmd), {
          signal: ctx.signal,
        })
      );
      return;

    default: {
      const unreachable: never = command;
      throw new InvalidStateError(`Unhandled command ${JSON.stringify(unreachable)}`);
    }
  }
}
