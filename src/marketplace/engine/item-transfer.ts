import { LedgerError } from './errors';
import type { Address, ItemKind, ItemRef, RoyaltyQuote } from './types';

/** Capability id of the royalty-info lookup. */
export const ROYALTY_INTERFACE_ID = '0x2a55205a';

/**
 * The item contracts as the marketplace sees them. Transfers throw on
 * failure (not owner, not approved, insufficient balance).
 */
export interface ItemContractGateway {
  supportsInterface(contract: Address, interfaceId: string): boolean;
  royaltyInfo(contract: Address, tokenId: string, salePrice: bigint): RoyaltyQuote;
  transferFrom(contract: Address, from: Address, to: Address, tokenId: string): void;
  safeTransferFrom(
    contract: Address,
    from: Address,
    to: Address,
    tokenId: string,
    quantity: bigint,
  ): void;
}

export interface ItemTransfer {
  /** Rejects quantities this ownership model cannot represent. */
  validateQuantity(quantity: bigint): void;
  move(
    gateway: ItemContractGateway,
    item: ItemRef,
    from: Address,
    to: Address,
    quantity: bigint,
  ): void;
}

export class UniqueItemTransfer implements ItemTransfer {
  validateQuantity(quantity: bigint): void {
    if (quantity !== 1n) {
      throw new LedgerError('InvalidParameters', 'Unique items are listed one at a time');
    }
  }

  move(
    gateway: ItemContractGateway,
    item: ItemRef,
    from: Address,
    to: Address,
    quantity: bigint,
  ): void {
    this.validateQuantity(quantity);
    gateway.transferFrom(item.contract, from, to, item.tokenId);
  }
}

export class QuantityItemTransfer implements ItemTransfer {
  validateQuantity(quantity: bigint): void {
    if (quantity <= 0n) {
      throw new LedgerError('InvalidParameters', 'Quantity must be positive');
    }
  }

  move(
    gateway: ItemContractGateway,
    item: ItemRef,
    from: Address,
    to: Address,
    quantity: bigint,
  ): void {
    this.validateQuantity(quantity);
    gateway.safeTransferFrom(item.contract, from, to, item.tokenId, quantity);
  }
}

export const ITEM_TRANSFERS: Readonly<Record<ItemKind, ItemTransfer>> = {
  UNIQUE: new UniqueItemTransfer(),
  QUANTITY: new QuantityItemTransfer(),
};
