export type LedgerErrorKind =
  | 'NotFound'
  | 'InvalidState'
  | 'Unauthorized'
  | 'InsufficientFunds'
  | 'IneligibleAsset'
  | 'InvalidParameters'
  | 'TransferFailure';

/**
 * A rejected operation. The operation that threw it left no state change behind.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

/**
 * Internal inconsistency: the stored records reached a combination the
 * ledger rules make impossible.
 */
export class LedgerFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerFault';
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Subtraction on non-negative amounts; a negative result is a fault. */
export function subtract(a: bigint, b: bigint, what: string): bigint {
  const result = a - b;
  if (result < 0n) {
    throw new LedgerFault(`${what} would go negative (${a} - ${b})`);
  }
  return result;
}
