#!/usr/bin/env node

import "dotenv/config";
import { CommanderError } from "commander";
import { createAccountFromEnv } from "./config.js";
import { initLogger, log, parseLogLevel } from "./logger.js";
import { ParseError } from "./errors.js";
import { isMailtoArgument, parseInvocation } from "./cli/commands.js";
import type { Invocation } from "./cli/commands.js";
import { runCommand } from "./cli/handlers.js";
import { createOutput, printError } from "./cli/output.js";
import { editText, readStdin } from "./cli/editor.js";

function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const lines = [err.message];
  const code = (err as Error & { code?: string }).code;
  if (code) lines.push(`  Code:  ${code}`);
  if (err.cause instanceof Error) lines.push(`  Cause: ${err.cause.message}`);
  if (err.stack) lines.push(err.stack);
  return lines.join("\n");
}

async function main(argv: string[]): Promise<void> {
  initLogger(parseLogLevel(process.env.TERN_LOG));

  // Order-sensitive: a mailto: URI arrives as the only argument and must
  // be routed before commander, which would reject it as a command name.
  const invocation: Invocation = isMailtoArgument(argv[0])
    ? { output: "plain", command: { kind: "mailto", uri: argv[0] } }
    : parseInvocation(argv);

  const account = createAccountFromEnv();
  await runCommand(invocation.command, {
    account,
    mailbox: invocation.mailbox ?? account.defaultMailbox,
    output: createOutput(invocation.output),
    edit: (text) => editText(text),
    readInput: () => readStdin(),
  });
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed help, the version or its own message
    process.exit(error.exitCode);
  }
  log.debug(describeError(error));
  printError(error instanceof Error ? error.message : String(error));
  process.exit(error instanceof ParseError ? 2 : 1);
});
