import { LedgerError, LedgerFault, subtract } from './errors';
import { ITEM_TRANSFERS } from './item-transfer';
import {
  assertAttachedValue,
  assertEligible,
  assertNonNegative,
  assertWindow,
  collectPayment,
  creditProceeds,
  moveItem,
  splitProceeds,
  type LedgerContext,
} from './ledger-context';
import type { Transactional } from './transactional';
import type {
  Address,
  BuyInput,
  CreateSaleInput,
  PurchaseReceipt,
  Sale,
  SaleStatus,
} from './types';

export interface ListingLedgerState {
  nextSaleId: number;
  sales: Map<number, Sale>;
  /** saleId → buyer → quantity bought */
  purchases: Map<number, Map<Address, bigint>>;
}

/**
 * Fixed-price sales. Items sit in marketplace custody from creation until
 * they are bought or reclaimed by the seller.
 */
export class ListingLedger implements Transactional<ListingLedgerState> {
  private state: ListingLedgerState = {
    nextSaleId: 1,
    sales: new Map(),
    purchases: new Map(),
  };

  constructor(
    readonly address: Address,
    private readonly ctx: LedgerContext,
  ) {}

  saleCount(): number {
    return this.state.nextSaleId - 1;
  }

  getSale(saleId: number): Sale {
    return structuredClone(this.requireSale(saleId));
  }

  getStatus(saleId: number): SaleStatus {
    return this.statusOf(this.requireSale(saleId));
  }

  purchasedBy(saleId: number, buyer: Address): bigint {
    this.requireSale(saleId);
    return this.state.purchases.get(saleId)?.get(buyer) ?? 0n;
  }

  createSale(input: CreateSaleInput): Sale {
    assertEligible(this.ctx, this.address, input.item, input.currency);
    assertWindow(input.startTime, input.endTime);
    assertNonNegative(input.price, 'Price');
    ITEM_TRANSFERS[input.item.kind].validateQuantity(input.amount);

    const sale: Sale = {
      id: this.state.nextSaleId,
      item: { ...input.item },
      seller: input.seller,
      price: input.price,
      currency: input.currency,
      amount: input.amount,
      purchased: 0n,
      startTime: input.startTime,
      endTime: input.endTime,
      cancelled: false,
    };
    this.state.nextSaleId += 1;
    this.state.sales.set(sale.id, sale);
    this.ctx.events.record({ type: 'SaleCreated', sale: structuredClone(sale) });

    moveItem(this.ctx, sale.item, sale.seller, this.ctx.custody, sale.amount);
    return structuredClone(sale);
  }

  buy(input: BuyInput): PurchaseReceipt {
    const sale = this.requireSale(input.saleId);
    const status = this.statusOf(sale);
    if (status !== 'ACTIVE') {
      throw new LedgerError('InvalidState', `Sale ${sale.id} is ${status}`);
    }
    if (!input.recipient) {
      throw new LedgerError('InvalidParameters', 'Recipient is required');
    }
    if (input.quantity <= 0n) {
      throw new LedgerError('InvalidParameters', 'Quantity must be positive');
    }
    const remaining = subtract(sale.amount, sale.purchased, 'Remaining stock');
    if (input.quantity > remaining) {
      throw new LedgerError(
        'InsufficientFunds',
        `Only ${remaining} left in sale ${sale.id}`,
      );
    }

    const gross = input.quantity * sale.price;
    assertNonNegative(input.amountFromBalance, 'Amount from balance');
    if (input.amountFromBalance > gross) {
      throw new LedgerError(
        'InvalidParameters',
        `Amount from balance exceeds the price of ${gross}`,
      );
    }
    const balance = this.ctx.vault.balanceOf(input.buyer, sale.currency);
    if (input.amountFromBalance > balance) {
      throw new LedgerError(
        'InsufficientFunds',
        `Claimable balance ${balance} is below ${input.amountFromBalance}`,
      );
    }
    const externalPayment = gross - input.amountFromBalance;
    assertAttachedValue(sale.currency, externalPayment, input.value);

    const split = splitProceeds(this.ctx, sale.item, sale.seller, gross);

    this.ctx.vault.debit(input.buyer, sale.currency, input.amountFromBalance);
    sale.purchased += input.quantity;
    let bought = this.state.purchases.get(sale.id);
    if (!bought) {
      bought = new Map();
      this.state.purchases.set(sale.id, bought);
    }
    bought.set(input.buyer, (bought.get(input.buyer) ?? 0n) + input.quantity);
    creditProceeds(this.ctx, sale.currency, sale.seller, split);
    this.ctx.events.record({
      type: 'SalePurchased',
      saleId: sale.id,
      buyer: input.buyer,
      recipient: input.recipient,
      quantity: input.quantity,
      split,
    });

    collectPayment(this.ctx, sale.currency, input.buyer, externalPayment, input.value);
    moveItem(this.ctx, sale.item, this.ctx.custody, input.recipient, input.quantity);

    return {
      saleId: sale.id,
      buyer: input.buyer,
      recipient: input.recipient,
      quantity: input.quantity,
      externalPayment,
      split,
    };
  }

  /** Returns unsold stock to the seller once the sale is over. */
  claimSaleNfts(saleId: number, caller: Address): bigint {
    const sale = this.requireSale(saleId);
    const status = this.statusOf(sale);
    if (status !== 'CANCELLED' && status !== 'ENDED') {
      throw new LedgerError('InvalidState', `Sale ${sale.id} is ${status}`);
    }
    if (caller !== sale.seller) {
      throw new LedgerError('Unauthorized', 'Only the seller can reclaim unsold items');
    }
    const unsold = subtract(sale.amount, sale.purchased, 'Unsold stock');
    if (unsold === 0n) {
      throw new LedgerError('InvalidState', `Sale ${sale.id} has no unsold items`);
    }

    sale.purchased = sale.amount;
    this.ctx.events.record({
      type: 'SaleItemsReclaimed',
      saleId: sale.id,
      seller: sale.seller,
      quantity: unsold,
    });

    moveItem(this.ctx, sale.item, this.ctx.custody, sale.seller, unsold);
    return unsold;
  }

  cancelSale(saleId: number, caller: Address): void {
    const sale = this.requireSale(saleId);
    if (caller !== sale.seller && !this.ctx.access.isAdmin(caller)) {
      throw new LedgerError('Unauthorized', 'Only the seller or an administrator can cancel');
    }
    const status = this.statusOf(sale);
    if (status !== 'ACTIVE' && status !== 'PENDING') {
      throw new LedgerError('InvalidState', `Sale ${sale.id} is ${status}`);
    }
    sale.cancelled = true;
    this.ctx.events.record({ type: 'SaleCancelled', saleId: sale.id, by: caller });
  }

  snapshot(): ListingLedgerState {
    return structuredClone(this.state);
  }

  restore(snapshot: ListingLedgerState): void {
    this.state = structuredClone(snapshot);
  }

  private requireSale(saleId: number): Sale {
    const sale = this.state.sales.get(saleId);
    if (!sale) throw new LedgerError('NotFound', `Sale ${saleId} does not exist`);
    return sale;
  }

  private statusOf(sale: Sale): SaleStatus {
    if (sale.purchased > sale.amount) {
      throw new LedgerFault(`Sale ${sale.id} sold more than it offered`);
    }
    if (sale.cancelled || !this.ctx.registry.isApprovedListingContract(this.address)) {
      return 'CANCELLED';
    }
    const now = this.ctx.clock.now();
    if (now < sale.startTime) return 'PENDING';
    const soldOut = sale.purchased === sale.amount;
    if (now < sale.endTime && !soldOut) return 'ACTIVE';
    if (now >= sale.endTime || soldOut) return 'ENDED';
    throw new LedgerFault(`Sale ${sale.id} has no consistent status`);
  }
}
