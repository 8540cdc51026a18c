import { LedgerError, LedgerFault } from './errors';
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
  Auction,
  AuctionStatus,
  Bid,
  BidInput,
  BidReceipt,
  CreateAuctionInput,
  SettlementResult,
} from './types';

export interface AuctionLedgerState {
  nextAuctionId: number;
  auctions: Map<number, Auction>;
  /** auctionId → bidder → standing bid */
  bids: Map<number, Map<Address, Bid>>;
  highestBidder: Map<number, Address>;
  /** currency → sum of standing bids */
  escrow: Map<Address, bigint>;
}

/**
 * First-price ascending auctions with a reserve. Only the highest bidder
 * has a non-zero standing bid; everyone outbid has been credited to the vault.
 */
export class AuctionLedger implements Transactional<AuctionLedgerState> {
  private state: AuctionLedgerState = {
    nextAuctionId: 1,
    auctions: new Map(),
    bids: new Map(),
    highestBidder: new Map(),
    escrow: new Map(),
  };

  constructor(
    readonly address: Address,
    private readonly ctx: LedgerContext,
  ) {}

  auctionCount(): number {
    return this.state.nextAuctionId - 1;
  }

  getAuction(auctionId: number): Auction {
    return structuredClone(this.requireAuction(auctionId));
  }

  getStatus(auctionId: number): AuctionStatus {
    return this.statusOf(this.requireAuction(auctionId));
  }

  getBid(auctionId: number, bidder: Address): Bid {
    this.requireAuction(auctionId);
    const bid = this.state.bids.get(auctionId)?.get(bidder);
    return bid ? { ...bid } : { amount: 0n, timestamp: 0 };
  }

  getHighestBidder(auctionId: number): Address | null {
    this.requireAuction(auctionId);
    return this.state.highestBidder.get(auctionId) ?? null;
  }

  escrowOf(currency: Address): bigint {
    return this.state.escrow.get(currency) ?? 0n;
  }

  createAuction(input: CreateAuctionInput): Auction {
    assertEligible(this.ctx, this.address, input.item, input.currency);
    assertWindow(input.startTime, input.endTime);
    assertNonNegative(input.reservePrice, 'Reserve price');
    const quantity = input.quantity ?? 1n;
    ITEM_TRANSFERS[input.item.kind].validateQuantity(quantity);

    const auction: Auction = {
      id: this.state.nextAuctionId,
      item: { ...input.item },
      quantity,
      seller: input.seller,
      reservePrice: input.reservePrice,
      currency: input.currency,
      startTime: input.startTime,
      endTime: input.endTime,
      cancelled: false,
      claimed: false,
    };
    this.state.nextAuctionId += 1;
    this.state.auctions.set(auction.id, auction);
    this.ctx.events.record({ type: 'AuctionCreated', auction: structuredClone(auction) });

    moveItem(this.ctx, auction.item, auction.seller, this.ctx.custody, auction.quantity);
    return structuredClone(auction);
  }

  /**
   * Raises the caller's standing bid by the vault amount plus the external
   * funds. The new total must beat the incumbent strictly; ties keep the
   * earlier bidder.
   */
  bid(input: BidInput): BidReceipt {
    const auction = this.requireAuction(input.auctionId);
    const status = this.statusOf(auction);
    if (status !== 'ACTIVE') {
      throw new LedgerError('InvalidState', `Auction ${auction.id} is ${status}`);
    }
    assertNonNegative(input.amountFromBalance, 'Amount from balance');
    assertNonNegative(input.externalFunds, 'External funds');
    const balance = this.ctx.vault.balanceOf(input.bidder, auction.currency);
    if (input.amountFromBalance > balance) {
      throw new LedgerError(
        'InsufficientFunds',
        `Claimable balance ${balance} is below ${input.amountFromBalance}`,
      );
    }

    const incumbent = this.state.highestBidder.get(auction.id) ?? null;
    const incumbentAmount = incumbent ? this.standing(auction.id, incumbent) : 0n;
    const current = this.standing(auction.id, input.bidder);
    if (current > 0n && incumbent !== input.bidder) {
      throw new LedgerFault(`Outbid bidder ${input.bidder} still has a standing bid`);
    }
    const total = input.amountFromBalance + input.externalFunds + current;
    if (total <= incumbentAmount) {
      throw new LedgerError(
        'InvalidParameters',
        `Bid must be higher than current highest (${incumbentAmount})`,
      );
    }
    if (total < auction.reservePrice) {
      throw new LedgerError(
        'InvalidParameters',
        `Bid must meet the reserve price (${auction.reservePrice})`,
      );
    }
    assertAttachedValue(auction.currency, input.externalFunds, input.value);

    let refunded: BidReceipt['refunded'] = null;
    if (incumbent && incumbent !== input.bidder) {
      this.setStanding(auction.id, incumbent, 0n);
      this.ctx.vault.credit(incumbent, auction.currency, incumbentAmount);
      this.ctx.events.record({
        type: 'BidRefunded',
        auctionId: auction.id,
        bidder: incumbent,
        amount: incumbentAmount,
      });
      refunded = { bidder: incumbent, amount: incumbentAmount };
    }
    this.ctx.vault.debit(input.bidder, auction.currency, input.amountFromBalance);
    this.setStanding(auction.id, input.bidder, total);
    this.state.highestBidder.set(auction.id, input.bidder);
    this.adjustEscrow(auction.currency, total - incumbentAmount);
    this.ctx.events.record({
      type: 'BidPlaced',
      auctionId: auction.id,
      bidder: input.bidder,
      total,
    });

    collectPayment(
      this.ctx,
      auction.currency,
      input.bidder,
      input.externalFunds,
      input.value,
    );
    return { auctionId: auction.id, bidder: input.bidder, total, refunded };
  }

  cancelAuction(auctionId: number, caller: Address): void {
    const auction = this.requireAuction(auctionId);
    if (caller !== auction.seller && !this.ctx.access.isAdmin(caller)) {
      throw new LedgerError('Unauthorized', 'Only the seller or an administrator can cancel');
    }
    const status = this.statusOf(auction);
    if (status !== 'ACTIVE' && status !== 'PENDING') {
      throw new LedgerError('InvalidState', `Auction ${auction.id} is ${status}`);
    }
    auction.cancelled = true;
    this.releaseStandingBid(auction);
    this.ctx.events.record({ type: 'AuctionCancelled', auctionId: auction.id, by: caller });
  }

  /**
   * Ends an auction for good: the winner gets the item and the seller the
   * proceeds, or the item goes back to the seller with no payment.
   */
  settleAuction(auctionId: number, caller: Address): SettlementResult {
    const auction = this.requireAuction(auctionId);
    if (auction.claimed) {
      throw new LedgerError('InvalidState', `Auction ${auction.id} is already settled`);
    }
    const status = this.statusOf(auction);
    if (status !== 'ENDED' && status !== 'CANCELLED') {
      throw new LedgerError('InvalidState', `Auction ${auction.id} is ${status}`);
    }
    const winner = this.state.highestBidder.get(auction.id) ?? null;
    if (caller !== auction.seller && caller !== winner && !this.ctx.access.isAdmin(caller)) {
      throw new LedgerError(
        'Unauthorized',
        'Only the seller, the highest bidder or an administrator can settle',
      );
    }

    auction.claimed = true;
    const winningAmount = winner ? this.standing(auction.id, winner) : 0n;
    const reserveMet = winningAmount > 0n && winningAmount >= auction.reservePrice;

    let result: SettlementResult;
    if (status === 'ENDED' && winner !== null && reserveMet) {
      this.setStanding(auction.id, winner, 0n);
      this.adjustEscrow(auction.currency, -winningAmount);
      const split = splitProceeds(this.ctx, auction.item, auction.seller, winningAmount);
      creditProceeds(this.ctx, auction.currency, auction.seller, split);
      result = { outcome: 'SOLD', auctionId: auction.id, winner, split };
    } else {
      const released = this.releaseStandingBid(auction);
      result = {
        outcome: 'RETURNED',
        auctionId: auction.id,
        seller: auction.seller,
        released,
      };
    }
    this.ctx.events.record({ type: 'AuctionSettled', result });

    moveItem(
      this.ctx,
      auction.item,
      this.ctx.custody,
      result.outcome === 'SOLD' ? result.winner : auction.seller,
      auction.quantity,
    );
    return result;
  }

  snapshot(): AuctionLedgerState {
    return structuredClone(this.state);
  }

  restore(snapshot: AuctionLedgerState): void {
    this.state = structuredClone(snapshot);
  }

  private requireAuction(auctionId: number): Auction {
    const auction = this.state.auctions.get(auctionId);
    if (!auction) throw new LedgerError('NotFound', `Auction ${auctionId} does not exist`);
    return auction;
  }

  private statusOf(auction: Auction): AuctionStatus {
    if (auction.cancelled || !this.ctx.registry.isApprovedListingContract(this.address)) {
      return 'CANCELLED';
    }
    if (auction.claimed) return 'ENDED_CLAIMED';
    const now = this.ctx.clock.now();
    if (now < auction.startTime) return 'PENDING';
    if (now < auction.endTime) return 'ACTIVE';
    return 'ENDED';
  }

  private standing(auctionId: number, bidder: Address): bigint {
    return this.state.bids.get(auctionId)?.get(bidder)?.amount ?? 0n;
  }

  private setStanding(auctionId: number, bidder: Address, amount: bigint): void {
    let bids = this.state.bids.get(auctionId);
    if (!bids) {
      bids = new Map();
      this.state.bids.set(auctionId, bids);
    }
    bids.set(bidder, { amount, timestamp: this.ctx.clock.now() });
  }

  private adjustEscrow(currency: Address, delta: bigint): void {
    const next = this.escrowOf(currency) + delta;
    if (next < 0n) {
      throw new LedgerFault(`Escrow for ${currency} would go negative`);
    }
    this.state.escrow.set(currency, next);
  }

  /** Moves the incumbent's escrowed bid into their claimable balance. */
  private releaseStandingBid(auction: Auction): { bidder: Address; amount: bigint } | null {
    const bidder = this.state.highestBidder.get(auction.id);
    if (!bidder) return null;
    this.state.highestBidder.delete(auction.id);
    const amount = this.standing(auction.id, bidder);
    if (amount === 0n) return null;
    this.setStanding(auction.id, bidder, 0n);
    this.adjustEscrow(auction.currency, -amount);
    this.ctx.vault.credit(bidder, auction.currency, amount);
    this.ctx.events.record({
      type: 'BidRefunded',
      auctionId: auction.id,
      bidder,
      amount,
    });
    return { bidder, amount };
  }
}
