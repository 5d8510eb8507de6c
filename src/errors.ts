/**
 * Failure categories raised by the statistics and table helpers.
 *
 * - `NegativeValue`: normalisation got a table with a negative entry
 * - `LengthMismatch`: name list and table row count disagree
 * - `RaggedTable`: rows of different lengths
 * - `MalformedTable`: an untyped value is not an array of numeric rows
 */
export type DomainErrorKind =
  | "NegativeValue"
  | "LengthMismatch"
  | "RaggedTable"
  | "MalformedTable";

export class DomainError extends Error {
  readonly kind: DomainErrorKind;

  constructor(kind: DomainErrorKind, message: string) {
    super(message);
    this.name = "DomainError";
    this.kind = kind;
  }
}

/**
 * Narrows an unknown thrown value to a `DomainError`, optionally of one kind.
 */
export function isDomainError(
  err: unknown,
  kind?: DomainErrorKind
): err is DomainError {
  if (!(err instanceof DomainError)) return false;
  return kind === undefined || err.kind === kind;
}
