import type { Address } from './types';

/** Reserved address standing for the chain's native currency. */
export const NATIVE_CURRENCY: Address = '0x0000000000000000000000000000000000000000';

export function isNativeCurrency(currency: Address): boolean {
  return currency === NATIVE_CURRENCY;
}

/**
 * Moves value between callers and marketplace custody. Implementations
 * throw on any failure; the marketplace reports it as TransferFailure.
 */
export interface PaymentRails {
  /**
   * Takes `amount` from `payer` into custody. For the native currency the
   * value attached to the call is what arrives; for tokens the amount is
   * pulled through the payer's allowance.
   */
  collect(
    currency: Address,
    payer: Address,
    amount: bigint,
    attachedValue: bigint,
  ): void;

  /** Sends `amount` from custody to `recipient`. */
  pay(currency: Address, recipient: Address, amount: bigint): void;
}
