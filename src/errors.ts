/**
 * Error taxonomy shared by the mailbox session, the delivery session and
 * the composition pipeline. The CLI entry point maps these to exit codes.
 */
export class TernError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed user input: a range, a flag list, a search query or a URI. */
export class ParseError extends TernError {
  readonly token: string;

  constructor(message: string, token: string) {
    super(message);
    this.token = token;
  }
}

/** Authentication or network failure while opening a session. */
export class ConnectionError extends TernError {}

/** The server rejected a command. The message is the server's, verbatim. */
export class ProtocolError extends TernError {}

/** An addressed message or mailbox does not exist. */
export class NotFoundError extends TernError {}

/** SMTP submission failed. */
export class DeliveryError extends TernError {}

/** A new-message notification could not be delivered. */
export class NotifyError extends TernError {}

/** An operation was issued in the wrong session state. */
export class InvalidStateError extends TernError {}

/** Required configuration is missing or invalid. */
export class ConfigError extends TernError {}

/**
 * Wrap an unknown failure from the protocol layer as a ProtocolError,
 * leaving errors from this taxonomy untouched.
 */
export function toProtocolError(error: unknown): TernError {
  if (error instanceof TernError) return error;
  if (error instanceof Error) {
    const err = error as Error & { responseText?: string };
    return new ProtocolError(err.responseText || err.message, { cause: error });
  }
  return new ProtocolError(String(error));
}
