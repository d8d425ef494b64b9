export type NotationErrorCode =
  | "UNKNOWN_TYPE"
  | "UNBOUND_LETTER"
  | "UNKNOWN_PARAMETER"
  | "TYPE_MISMATCH"
  | "MALFORMED_COMMAND"
  | "UNBALANCED_PARENTHESES";

/**
 * Raised for anything a user can get wrong at the command line. The command
 * loop reports these and carries on; every other error propagates.
 */
export class NotationError extends Error {
  readonly code: NotationErrorCode;

  constructor(code: NotationErrorCode, message: string) {
    super(message);
    this.name = "NotationError";
    this.code = code;
  }
}

export function isNotationError(error: unknown): error is NotationError {
  return error instanceof NotationError;
}
