export type LedgerErrorKind =
  | "NotFound"
  | "InsufficientFunds"
  | "InvalidAllocation"
  | "InvalidConversion"
  | "InvalidInput"
  | "NotAllowed"
  | "OutOfStock";

/**
 * Every rejected ledger operation throws one of these. Nothing is written when it is thrown:
 * the surrounding store transaction rolls back.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string) {
    super(message);
    this.name = "LedgerError";
    this.kind = kind;
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

export function notFound(what: string, id: number | string): LedgerError {
  return new LedgerError("NotFound", `${what} ${id} not found`);
}
