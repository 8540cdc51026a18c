import { AuctionLedger, type AuctionLedgerState } from './auction-ledger';
import { ClaimVault, type ClaimVaultState } from './claim-vault';
import { EligibilityRegistry, type EligibilityState } from './eligibility-registry';
import { LedgerError } from './errors';
import { FeePolicy, type FeeConfig } from './fee-policy';
import type { ItemContractGateway } from './item-transfer';
import type { AccessPolicy, Clock, LedgerContext } from './ledger-context';
import { ListingLedger, type ListingLedgerState } from './listing-ledger';
import type { PaymentRails } from './payment-rails';
import { EventOutbox, type Transactional } from './transactional';
import type {
  Address,
  Auction,
  AuctionStatus,
  Bid,
  BidInput,
  BidReceipt,
  BuyInput,
  CreateAuctionInput,
  CreateSaleInput,
  LedgerEvent,
  PurchaseReceipt,
  Sale,
  SaleStatus,
  SettlementResult,
} from './types';

export interface MarketplaceOptions {
  salesAddress: Address;
  auctionsAddress: Address;
  custody: Address;
  feeRecipient: Address;
  feeRate?: bigint;
  feeScale?: bigint;
  clock: Clock;
  access: AccessPolicy;
  items: ItemContractGateway;
  rails: PaymentRails;
  /**
   * Collaborators whose state must roll back together with the ledger
   * (in-process stand-ins for the item contracts and payment rails).
   */
  participants?: Transactional[];
}

/** Everything the ledger owns, as persisted and restored. */
export interface MarketplaceState {
  listings: ListingLedgerState;
  auctions: AuctionLedgerState;
  vault: ClaimVaultState;
  registry: EligibilityState;
  fees: FeeConfig;
}

/**
 * Entry point of the ledger engine. Every state-changing call is atomic:
 * it commits entirely or throws and leaves no trace, and a collaborator
 * cannot re-enter while one is running.
 */
export class Marketplace {
  readonly registry: EligibilityRegistry;
  readonly fees: FeePolicy;
  readonly vault: ClaimVault;
  readonly listings: ListingLedger;
  readonly auctions: AuctionLedger;

  private readonly outbox = new EventOutbox();
  private readonly access: AccessPolicy;
  private readonly participants: Transactional[];
  private entered = false;

  constructor(options: MarketplaceOptions) {
    this.access = options.access;
    this.registry = new EligibilityRegistry(this.outbox);
    this.fees = new FeePolicy(
      this.outbox,
      options.feeRecipient,
      options.feeRate,
      options.feeScale,
    );
    this.vault = new ClaimVault(this.outbox, options.rails);

    const ctx: LedgerContext = {
      clock: options.clock,
      access: options.access,
      registry: this.registry,
      fees: this.fees,
      vault: this.vault,
      items: options.items,
      rails: options.rails,
      events: this.outbox,
      custody: options.custody,
    };
    this.listings = new ListingLedger(options.salesAddress, ctx);
    this.auctions = new AuctionLedger(options.auctionsAddress, ctx);

    this.participants = [
      this.outbox,
      this.registry,
      this.fees,
      this.vault,
      this.listings,
      this.auctions,
      ...(options.participants ?? []),
    ];
  }

  /* ------------------------------------------------------------------ */
  /*  SALES                                                              */
  /* ------------------------------------------------------------------ */

  createSale(input: CreateSaleInput): Sale {
    return this.execute(() => this.listings.createSale(input));
  }

  buy(input: BuyInput): PurchaseReceipt {
    return this.execute(() => this.listings.buy(input));
  }

  claimSaleNfts(caller: Address, saleId: number): bigint {
    return this.execute(() => this.listings.claimSaleNfts(saleId, caller));
  }

  cancelSale(caller: Address, saleId: number): void {
    this.execute(() => this.listings.cancelSale(saleId, caller));
  }

  getSale(saleId: number): Sale {
    return this.listings.getSale(saleId);
  }

  getSaleStatus(saleId: number): SaleStatus {
    return this.listings.getStatus(saleId);
  }

  purchasedBy(saleId: number, buyer: Address): bigint {
    return this.listings.purchasedBy(saleId, buyer);
  }

  /* ------------------------------------------------------------------ */
  /*  AUCTIONS                                                           */
  /* ------------------------------------------------------------------ */

  createAuction(input: CreateAuctionInput): Auction {
    return this.execute(() => this.auctions.createAuction(input));
  }

  bid(input: BidInput): BidReceipt {
    return this.execute(() => this.auctions.bid(input));
  }

  settleAuction(caller: Address, auctionId: number): SettlementResult {
    return this.execute(() => this.auctions.settleAuction(auctionId, caller));
  }

  cancelAuction(caller: Address, auctionId: number): void {
    this.execute(() => this.auctions.cancelAuction(auctionId, caller));
  }

  getAuction(auctionId: number): Auction {
    return this.auctions.getAuction(auctionId);
  }

  getAuctionStatus(auctionId: number): AuctionStatus {
    return this.auctions.getStatus(auctionId);
  }

  getBid(auctionId: number, bidder: Address): Bid {
    return this.auctions.getBid(auctionId, bidder);
  }

  getHighestBidder(auctionId: number): Address | null {
    return this.auctions.getHighestBidder(auctionId);
  }

  escrowOf(currency: Address): bigint {
    return this.auctions.escrowOf(currency);
  }

  /* ------------------------------------------------------------------ */
  /*  VAULT                                                              */
  /* ------------------------------------------------------------------ */

  claim(account: Address, currency: Address): bigint {
    return this.execute(() => this.vault.claim(account, currency));
  }

  claimableBalance(account: Address, currency: Address): bigint {
    return this.vault.balanceOf(account, currency);
  }

  /* ------------------------------------------------------------------ */
  /*  ADMINISTRATION                                                     */
  /* ------------------------------------------------------------------ */

  setFee(caller: Address, rate: bigint, scale: bigint): void {
    this.administer(caller, () => this.fees.setFee(rate, scale));
  }

  setFeeRecipient(caller: Address, recipient: Address): void {
    this.administer(caller, () => this.fees.setRecipient(recipient));
  }

  setListingContractApproval(caller: Address, contract: Address, approved: boolean): void {
    this.administer(caller, () => this.registry.setListingContractApproval(contract, approved));
  }

  setCurrencyApproval(caller: Address, currency: Address, approved: boolean): void {
    this.administer(caller, () => this.registry.setCurrencyApproval(currency, approved));
  }

  approveAllCurrencies(caller: Address): void {
    this.administer(caller, () => this.registry.approveAllCurrencies());
  }

  isAdmin(account: Address): boolean {
    return this.access.isAdmin(account);
  }

  /* ------------------------------------------------------------------ */
  /*  STATE                                                              */
  /* ------------------------------------------------------------------ */

  /** Events of committed operations since the last drain, oldest first. */
  drainEvents(): LedgerEvent[] {
    return this.outbox.drain();
  }

  getState(): MarketplaceState {
    return {
      listings: this.listings.snapshot(),
      auctions: this.auctions.snapshot(),
      vault: this.vault.snapshot(),
      registry: this.registry.snapshot(),
      fees: this.fees.snapshot(),
    };
  }

  setState(state: MarketplaceState): void {
    this.listings.restore(state.listings);
    this.auctions.restore(state.auctions);
    this.vault.restore(state.vault);
    this.registry.restore(state.registry);
    this.fees.restore(state.fees);
  }

  private administer(caller: Address, fn: () => void): void {
    this.execute(() => {
      if (!this.isAdmin(caller)) {
        throw new LedgerError('Unauthorized', 'Administrator role required');
      }
      fn();
    });
  }

  private execute<T>(fn: () => T): T {
    if (this.entered) {
      throw new LedgerError('InvalidState', 'Reentrant call rejected');
    }
    this.entered = true;
    const snapshots = this.participants.map((p) => p.snapshot());
    try {
      return fn();
    } catch (err) {
      this.participants.forEach((p, i) => p.restore(snapshots[i]));
      throw err;
    } finally {
      this.entered = false;
    }
  }
}
