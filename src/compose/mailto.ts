import type { Account, Address, Template } from "../imap/types.js";
import { newTemplate } from "./template.js";
import { ParseError } from "../errors.js";

const SCHEME = "mailto:";

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new ParseError(`Invalid percent-encoding in "${value}"`, value);
  }
}

function addressesOf(value: string): Address[] {
  return decode(value)
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((address) => ({ name: "", address }));
}

/**
 * Resolve a `mailto:` URI into a new-message template.
 *
 * The path holds the primary recipients; `to`, `cc`, `bcc`, `subject`
 * and `body` query keys are recognized case-insensitively and anything
 * else is ignored. `+` is a literal plus sign, not a space.
 */
export function resolveMailto(uri: string, account: Account): Template {
  if (uri.slice(0, SCHEME.length).toLowerCase() !== SCHEME) {
    throw new ParseError(`Not a mailto URI: ${uri}`, uri);
  }

  const rest = uri.slice(SCHEME.length);
  const queryStart = rest.indexOf("?");
  const path = queryStart === -1 ? rest : rest.slice(0, queryStart);
  const query = queryStart === -1 ? "" : rest.slice(queryStart + 1);

  const tpl = newTemplate(account);
  const to = addressesOf(path);
  const cc: Address[] = [];
  const bcc: Address[] = [];
  let subject = "";
  let body: string | undefined;

  for (const pair of query.split("&")) {
    if (!pair) continue;
    const eq = pair.indexOf("=");
    const key = decode(eq === -1 ? pair : pair.slice(0, eq)).toLowerCase();
    const value = eq === -1 ? "" : pair.slice(eq + 1);

    switch (key) {
      case "to":
        to.push(...addressesOf(value));
        break;
      case "cc":
        cc.push(...addressesOf(value));
        break;
      case "bcc":
        bcc.push(...addressesOf(value));
        break;
      case "subject":
        subject = decode(value);
        break;
      case "body":
        body = decode(value);
        break;
    }
  }

  return {
    ...tpl,
    to,
    cc,
    bcc,
    subject,
    text: body === undefined ? tpl.text : `${body}${tpl.text ?? ""}`,
  };
}
