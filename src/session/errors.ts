/**
 * Session error taxonomy
 */

export type SessionErrorKind =
  | "InvalidRequest"
  | "ConnectionFailed"
  | "NotConnected"
  | "WrongTransport"
  | "CommandFailed"
  | "ParseError";

/**
 * A failure surfaced by the session manager.
 *
 * `output` is set for `ParseError` and holds the device text that did not
 * match the expected format.
 */
export class SessionError extends Error {
  public readonly kind: SessionErrorKind;
  public readonly output?: string;

  public constructor(
    kind: SessionErrorKind,
    message: string,
    options?: { cause?: unknown; output?: string }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SessionError";
    this.kind = kind;
    this.output = options?.output;
  }
}

/**
 * Wrap a transport failure, keeping the underlying message
 */
export function wrapTransportError(
  kind: "ConnectionFailed" | "CommandFailed",
  context: string,
  err: unknown
): SessionError {
  if (err instanceof SessionError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new SessionError(kind, `${context}: ${detail}`, { cause: err });
}
