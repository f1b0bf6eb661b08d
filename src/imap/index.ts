export { MailboxSession, classifyImapError, withMailboxSession } from "./client.js";
export type { SessionState } from "./client.js";
export {
  parseRange,
  rangeOf,
  formatRange,
  formatNumbers,
  rangeSize,
  missingFrom,
  MAX_MESSAGE_NUMBER,
} from "./range.js";
export {
  parseFlags,
  formatFlags,
  unionFlags,
  differenceFlags,
  flagSymbols,
  setFlags,
  addFlags,
  removeFlags,
} from "./flags.js";
export { parseQuery, parseSearchDate, tokenize } from "./query.js";
export {
  searchMessages,
  fetchMessages,
  fetchByUid,
  fetchMessage,
  uidSnapshot,
  listPage,
  searchPage,
  readMessage,
  saveMessage,
  downloadAttachments,
} from "./messages.js";
export type { ReadOptions } from "./messages.js";
export {
  listMailboxes,
  findMailbox,
  copyMessages,
  moveMessages,
  deleteMessages,
} from "./folders.js";
export type { MailboxEntry, TransferResult } from "./folders.js";
export { watch, notify, notifyCycle, commandHook } from "./watch.js";
export type { NotifyHook, LoopOptions } from "./watch.js";
export type {
  Account,
  ImapConfig,
  SmtpConfig,
  Address,
  Attachment,
  Msg,
  ResidentMsg,
  Template,
  TemplateKind,
  MessageSummary,
  SeqRange,
  Span,
  FlagSet,
  FetchDetail,
} from "./types.js";
export { emptyMsg } from "./types.js";
