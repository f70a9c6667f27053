/**
 * Raised when the front end itself is inconsistent: a raw value decoded into
 * the wrong kind range, unbalanced builder calls, or a tokenization that
 * lost input. Bad source text never produces one of these.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`internal error: ${message}`);
    this.name = "InternalError";
  }
}
