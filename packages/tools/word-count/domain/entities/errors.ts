// Error types for the word-count domain

export type WcErrorCode =
  | "io_error"
  | "empty_input"
  | "invalid_args";

export class WcError extends Error {
  constructor(
    public readonly code: WcErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "WcError";
  }

  toJSON(): { error: string; code: WcErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
