import type { ClaimVault } from './claim-vault';
import type { EligibilityRegistry } from './eligibility-registry';
import { LedgerError, describeError, isLedgerError, subtract } from './errors';
import type { FeePolicy } from './fee-policy';
import {
  ITEM_TRANSFERS,
  ROYALTY_INTERFACE_ID,
  type ItemContractGateway,
} from './item-transfer';
import { isNativeCurrency, type PaymentRails } from './payment-rails';
import type { EventOutbox } from './transactional';
import type { Address, ItemRef, ProceedsSplit, RoyaltyQuote } from './types';

export interface Clock {
  /** Current time in whole seconds. */
  now(): number;
}

export interface AccessPolicy {
  isAdmin(account: Address): boolean;
}

/** Collaborators shared by both ledgers. */
export interface LedgerContext {
  clock: Clock;
  access: AccessPolicy;
  registry: EligibilityRegistry;
  fees: FeePolicy;
  vault: ClaimVault;
  items: ItemContractGateway;
  rails: PaymentRails;
  events: EventOutbox;
  /** Address that holds listed items while they are for sale. */
  custody: Address;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export function assertEligible(
  ctx: LedgerContext,
  ledgerAddress: Address,
  item: ItemRef,
  currency: Address,
): void {
  if (!ctx.registry.isApprovedListingContract(ledgerAddress)) {
    throw new LedgerError('IneligibleAsset', 'This marketplace ledger is deprecated');
  }
  if (!ctx.registry.isApprovedListingContract(item.contract)) {
    throw new LedgerError(
      'IneligibleAsset',
      `Item contract ${item.contract} is not approved`,
    );
  }
  if (!ctx.registry.isApprovedCurrency(currency)) {
    throw new LedgerError('IneligibleAsset', `Currency ${currency} is not approved`);
  }
  let supportsRoyalties: boolean;
  try {
    supportsRoyalties = ctx.items.supportsInterface(item.contract, ROYALTY_INTERFACE_ID);
  } catch (err) {
    throw new LedgerError(
      'IneligibleAsset',
      `Capability query on ${item.contract} failed: ${describeError(err)}`,
      { cause: err },
    );
  }
  if (!supportsRoyalties) {
    throw new LedgerError(
      'IneligibleAsset',
      `Item contract ${item.contract} does not expose royalty info`,
    );
  }
}

export function assertWindow(startTime: number, endTime: number): void {
  if (!Number.isSafeInteger(startTime) || !Number.isSafeInteger(endTime) || startTime < 0) {
    throw new LedgerError('InvalidParameters', 'Start and end must be whole seconds');
  }
  if (endTime <= startTime) {
    throw new LedgerError('InvalidParameters', 'End time must be after start time');
  }
}

export function assertNonNegative(value: bigint, field: string): void {
  if (value < 0n) {
    throw new LedgerError('InvalidParameters', `${field} must not be negative`);
  }
}

/**
 * Checks the native value attached to a payment before anything is written.
 * Native payments must attach exactly the amount due; token payments attach nothing.
 */
export function assertAttachedValue(
  currency: Address,
  amountDue: bigint,
  attachedValue: bigint,
): void {
  if (isNativeCurrency(currency)) {
    if (attachedValue !== amountDue) {
      throw new LedgerError(
        'InsufficientFunds',
        `Expected exactly ${amountDue} attached, got ${attachedValue}`,
      );
    }
  } else if (attachedValue !== 0n) {
    throw new LedgerError('InvalidParameters', 'Native value sent with a token payment');
  }
}

export function collectPayment(
  ctx: LedgerContext,
  currency: Address,
  payer: Address,
  amount: bigint,
  attachedValue: bigint,
): void {
  if (amount === 0n) return;
  try {
    ctx.rails.collect(currency, payer, amount, attachedValue);
  } catch (err) {
    if (isLedgerError(err)) throw err;
    throw new LedgerError(
      'TransferFailure',
      `Collecting ${amount} from ${payer} failed: ${describeError(err)}`,
      { cause: err },
    );
  }
}

export function moveItem(
  ctx: LedgerContext,
  item: ItemRef,
  from: Address,
  to: Address,
  quantity: bigint,
): void {
  const transfer = ITEM_TRANSFERS[item.kind];
  try {
    transfer.move(ctx.items, item, from, to, quantity);
  } catch (err) {
    if (isLedgerError(err)) throw err;
    throw new LedgerError(
      'TransferFailure',
      `Moving ${item.contract}#${item.tokenId} to ${to} failed: ${describeError(err)}`,
      { cause: err },
    );
  }
}

/**
 * Fee first, then royalty (nothing when the artist is the seller, clamped
 * to what the fee leaves), the rest to the seller.
 */
export function splitProceeds(
  ctx: LedgerContext,
  item: ItemRef,
  seller: Address,
  gross: bigint,
): ProceedsSplit {
  const fee = ctx.fees.feeInfo(gross);
  const afterFee = subtract(gross, fee.amount, 'Proceeds after fee');

  let quoted: RoyaltyQuote;
  try {
    quoted = ctx.items.royaltyInfo(item.contract, item.tokenId, gross);
  } catch (err) {
    throw new LedgerError(
      'IneligibleAsset',
      `Royalty lookup on ${item.contract} failed: ${describeError(err)}`,
      { cause: err },
    );
  }
  let royaltyAmount = quoted.receiver === seller || quoted.amount < 0n ? 0n : quoted.amount;
  if (royaltyAmount > afterFee) royaltyAmount = afterFee;

  return {
    gross,
    fee,
    royalty: { receiver: quoted.receiver, amount: royaltyAmount },
    sellerProceeds: subtract(afterFee, royaltyAmount, 'Seller proceeds'),
  };
}

export function creditProceeds(
  ctx: LedgerContext,
  currency: Address,
  seller: Address,
  split: ProceedsSplit,
): void {
  ctx.vault.credit(split.fee.recipient, currency, split.fee.amount);
  ctx.vault.credit(split.royalty.receiver, currency, split.royalty.amount);
  ctx.vault.credit(seller, currency, split.sellerProceeds);
}
