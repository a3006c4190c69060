/**
 * Receives every fatal parse or allocation error. A handler must not return:
 * it throws (or otherwise escapes). When it does return, the engine throws
 * {@link ParseAbortedError} in its place.
 */
export type ErrorHandler = (message: string, offset: number) => void;

export class JsonCodecError extends Error {
  override readonly name: string = "JsonCodecError";
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.offset = offset;
    Object.setPrototypeOf(this, JsonCodecError.prototype);
  }

  get location(): string {
    return `byte offset ${this.offset}`;
  }

  override toString(): string {
    return `${this.message} (${this.location})`;
  }
}

/** Thrown by the default handler. `offset` counts bytes into the input. */
export class ParseError extends JsonCodecError {
  override readonly name = "ParseError";

  constructor(message: string, offset: number) {
    super(message, offset);
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export class ParseAbortedError extends JsonCodecError {
  override readonly name = "ParseAbortedError";

  constructor(message: string, offset: number) {
    super(message, offset);
    Object.setPrototypeOf(this, ParseAbortedError.prototype);
  }
}

export const throwingHandler: ErrorHandler = (message, offset) => {
  throw new ParseError(message, offset);
};

export type Fail = (message: string, offset: number) => never;

export const toFail = (handler: ErrorHandler): Fail => (message, offset) => {
  handler(message, offset);
  throw new ParseAbortedError(message, offset);
};
