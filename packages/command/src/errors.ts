/**
 * Raised when a command string cannot be consumed entirely as a sequence of
 * terms. Tokenization is all-or-nothing, so no tokens accompany it.
 */
export class MalformedInputError extends Error {
  /** The whole command text that was rejected. */
  readonly text: string;
  /** Zero-based offset where the unconsumed suffix begins. */
  readonly offset: number;

  constructor(text: string, offset: number) {
    super(`Malformed command text '${text}'`);
    this.name = "MalformedInputError";
    this.text = text;
    this.offset = offset;
  }
}
