import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EventEmitter } from 'node:events';
import { RedisService, type IdempotentOperation } from '../redis/redis.service';
import {
  describeError,
  isLedgerError,
  type Address,
  type BidReceipt,
  type CollectionConfig,
  type CreateAuctionInput,
  type CreateSaleInput,
  type FeeConfig,
  type ItemRef,
  type LedgerErrorKind,
  type LedgerEvent,
  type PurchaseReceipt,
  type SettlementResult,
} from './engine';
import { toWire, type Wire } from './ledger-codec';
import {
  MarketplacePersistenceService,
  type StoredLedgerEvent,
} from './marketplace-persistence.service';
import { MARKETPLACE_RUNTIME, type MarketplaceRuntime } from './marketplace.providers';
import {
  auctionView,
  bidView,
  saleView,
  type AuctionView,
  type BalanceView,
  type BidView,
  type SaleView,
} from './views';

const SALE_ROOM_PREFIX = 'sale:';
const AUCTION_ROOM_PREFIX = 'auction:';
const ACCOUNT_ROOM_PREFIX = 'account:';

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: LedgerErrorKind; reason: string };

/** A committed event and the socket rooms interested in it. */
export interface LedgerEventNotice {
  rooms: string[];
  event: Wire<LedgerEvent>;
}

export interface BuyRequest {
  saleId: number;
  recipient?: Address;
  quantity: bigint;
  amountFromBalance: bigint;
  value: bigint;
}

/** Who asked for what; a client key is only unique within one of these. */
interface IdempotentRequest {
  operation: IdempotentOperation;
  resource: string;
  caller: Address;
}

export interface BidRequest {
  auctionId: number;
  amountFromBalance: bigint;
  externalFunds: bigint;
  value: bigint;
}

@Injectable()
export class MarketplaceService implements OnModuleInit {
  private readonly eventEmitter = new EventEmitter();
  private readonly logger = new Logger(MarketplaceService.name);
  private ledgerLock: Promise<void> = Promise.resolve();

  constructor(
    private readonly redis: RedisService,
    private readonly persistence: MarketplacePersistenceService,
    @Inject(MARKETPLACE_RUNTIME) private readonly runtime: MarketplaceRuntime,
  ) {}

  /* ------------------------------------------------------------------ */
  /*  RECOVERY: restore the last committed state on startup              */
  /* ------------------------------------------------------------------ */

  async onModuleInit(): Promise<void> {
    const snapshot = await this.persistence.loadSnapshot();
    if (!snapshot) {
      this.logger.log('No stored ledger state, starting empty');
      return;
    }
    this.runtime.market.setState(snapshot.ledger);
    this.runtime.items.restore(snapshot.items);
    this.runtime.rails.restore(snapshot.rails);
    this.logger.log(
      `Recovered ${this.runtime.market.listings.saleCount()} sale(s) and ` +
        `${this.runtime.market.auctions.auctionCount()} auction(s) from DB`,
    );
  }

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  getSaleRoom(saleId: number): string {
    return `${SALE_ROOM_PREFIX}${saleId}`;
  }

  getAuctionRoom(auctionId: number): string {
    return `${AUCTION_ROOM_PREFIX}${auctionId}`;
  }

  getAccountRoom(account: Address): string {
    return `${ACCOUNT_ROOM_PREFIX}${account}`;
  }

  /* ---------------------------- sales ------------------------------- */

  async createSale(
    seller: Address,
    input: Omit<CreateSaleInput, 'seller'>,
  ): Promise<LedgerResult<SaleView>> {
    return this.withLedgerLock(() =>
      this.apply('createSale', () => {
        const sale = this.market.createSale({ ...input, seller });
        return saleView(this.market, sale.id);
      }),
    );
  }

  async buy(
    buyer: Address,
    request: BuyRequest,
    idempotencyKey?: string,
  ): Promise<LedgerResult<Wire<PurchaseReceipt>>> {
    const scope: IdempotentRequest = {
      operation: 'buy',
      resource: `sale:${request.saleId}`,
      caller: buyer,
    };
    return this.idempotent(scope, idempotencyKey, () =>
      this.withLedgerLock(() =>
        this.apply('buy', () =>
          toWire(
            this.market.buy({
              buyer,
              saleId: request.saleId,
              recipient: request.recipient ?? buyer,
              quantity: request.quantity,
              amountFromBalance: request.amountFromBalance,
              value: request.value,
            }),
          ),
        ),
      ),
    );
  }

  async cancelSale(caller: Address, saleId: number): Promise<LedgerResult<SaleView>> {
    return this.withLedgerLock(() =>
      this.apply('cancelSale', () => {
        this.market.cancelSale(caller, saleId);
        return saleView(this.market, saleId);
      }),
    );
  }

  async claimSaleItems(
    caller: Address,
    saleId: number,
  ): Promise<LedgerResult<{ saleId: number; reclaimed: string }>> {
    return this.withLedgerLock(() =>
      this.apply('claimSaleItems', () => ({
        saleId,
        reclaimed: this.market.claimSaleNfts(caller, saleId).toString(),
      })),
    );
  }

  getSale(saleId: number): LedgerResult<SaleView> {
    return this.read(() => saleView(this.market, saleId));
  }

  listSales(): SaleView[] {
    const count = this.market.listings.saleCount();
    return Array.from({ length: count }, (_, i) => saleView(this.market, i + 1));
  }

  purchasedBy(saleId: number, buyer: Address): LedgerResult<{ quantity: string }> {
    return this.read(() => ({
      quantity: this.market.purchasedBy(saleId, buyer).toString(),
    }));
  }

  /* --------------------------- auctions ----------------------------- */

  async createAuction(
    seller: Address,
    input: Omit<CreateAuctionInput, 'seller'>,
  ): Promise<LedgerResult<AuctionView>> {
    return this.withLedgerLock(() =>
      this.apply('createAuction', () => {
        const auction = this.market.createAuction({ ...input, seller });
        return auctionView(this.market, auction.id);
      }),
    );
  }

  async placeBid(
    bidder: Address,
    request: BidRequest,
    idempotencyKey?: string,
  ): Promise<LedgerResult<Wire<BidReceipt>>> {
    const scope: IdempotentRequest = {
      operation: 'bid',
      resource: `auction:${request.auctionId}`,
      caller: bidder,
    };
    return this.idempotent(scope, idempotencyKey, () =>
      this.withLedgerLock(() =>
        this.apply('placeBid', () =>
          toWire(this.market.bid({ bidder, ...request })),
        ),
      ),
    );
  }

  async cancelAuction(
    caller: Address,
    auctionId: number,
  ): Promise<LedgerResult<AuctionView>> {
    return this.withLedgerLock(() =>
      this.apply('cancelAuction', () => {
        this.market.cancelAuction(caller, auctionId);
        return auctionView(this.market, auctionId);
      }),
    );
  }

  async settleAuction(
    caller: Address,
    auctionId: number,
  ): Promise<LedgerResult<Wire<SettlementResult>>> {
    return this.withLedgerLock(() =>
      this.apply('settleAuction', () =>
        toWire(this.market.settleAuction(caller, auctionId)),
      ),
    );
  }

  getAuction(auctionId: number): LedgerResult<AuctionView> {
    return this.read(() => auctionView(this.market, auctionId));
  }

  listAuctions(): AuctionView[] {
    const count = this.market.auctions.auctionCount();
    return Array.from({ length: count }, (_, i) =>
      auctionView(this.market, i + 1),
    );
  }

  getBid(auctionId: number, bidder: Address): LedgerResult<BidView> {
    return this.read(() => bidView(this.market, auctionId, bidder));
  }

  /* ----------------------------- vault ------------------------------ */

  async claim(
    account: Address,
    currency: Address,
    idempotencyKey?: string,
  ): Promise<LedgerResult<BalanceView>> {
    const scope: IdempotentRequest = {
      operation: 'claim',
      resource: `currency:${currency}`,
      caller: account,
    };
    return this.idempotent(scope, idempotencyKey, () =>
      this.withLedgerLock(() =>
        this.apply('claim', () => ({
          currency,
          amount: this.market.claim(account, currency).toString(),
        })),
      ),
    );
  }

  balancesOf(account: Address): BalanceView[] {
    return this.market.vault
      .balancesOf(account)
      .map(({ currency, amount }) => ({ currency, amount: amount.toString() }));
  }

  async listEvents(afterId: number, limit: number): Promise<StoredLedgerEvent[]> {
    return this.persistence.listEvents(afterId, limit);
  }

  /* ------------------------- administration ------------------------- */

  getFeeConfig(): Wire<FeeConfig> {
    return toWire(this.market.fees.getConfig());
  }

  async setFee(
    caller: Address,
    rate: bigint,
    scale: bigint,
  ): Promise<LedgerResult<Wire<FeeConfig>>> {
    return this.administer('setFee', () =>
      this.market.setFee(caller, rate, scale),
    );
  }

  async setFeeRecipient(
    caller: Address,
    recipient: Address,
  ): Promise<LedgerResult<Wire<FeeConfig>>> {
    return this.administer('setFeeRecipient', () =>
      this.market.setFeeRecipient(caller, recipient),
    );
  }

  async setListingContractApproval(
    caller: Address,
    contract: Address,
    approved: boolean,
  ): Promise<LedgerResult<{ contract: Address; approved: boolean }>> {
    return this.withLedgerLock(() =>
      this.apply('setListingContractApproval', () => {
        this.market.setListingContractApproval(caller, contract, approved);
        return {
          contract,
          approved: this.market.registry.isApprovedListingContract(contract),
        };
      }),
    );
  }

  async setCurrencyApproval(
    caller: Address,
    currency: Address,
    approved: boolean,
  ): Promise<LedgerResult<{ currency: Address; approved: boolean }>> {
    return this.withLedgerLock(() =>
      this.apply('setCurrencyApproval', () => {
        this.market.setCurrencyApproval(caller, currency, approved);
        return {
          currency,
          approved: this.market.registry.isApprovedCurrency(currency),
        };
      }),
    );
  }

  async approveAllCurrencies(
    caller: Address,
  ): Promise<LedgerResult<{ allCurrenciesApproved: boolean }>> {
    return this.withLedgerLock(() =>
      this.apply('approveAllCurrencies', () => {
        this.market.approveAllCurrencies(caller);
        return {
          allCurrenciesApproved: this.market.registry.areAllCurrenciesApproved(),
        };
      }),
    );
  }

  /* ------------------------------------------------------------------ */
  /*  SANDBOX: in-process item contracts and payment rails               */
  /* ------------------------------------------------------------------ */

  async deployCollection(
    caller: Address,
    contract: Address,
    config: CollectionConfig,
  ): Promise<LedgerResult<{ contract: Address }>> {
    return this.sandbox('deployCollection', caller, () => {
      this.runtime.items.deployCollection(contract, config);
      return { contract };
    });
  }

  async mintItem(
    caller: Address,
    item: ItemRef,
    to: Address,
    quantity: bigint,
  ): Promise<LedgerResult<{ balance: string }>> {
    return this.sandbox('mintItem', caller, () => {
      this.runtime.items.mint(item.contract, to, item.tokenId, quantity);
      return {
        balance: this.runtime.items.balanceOf(item.contract, to, item.tokenId).toString(),
      };
    });
  }

  async fundAccount(
    caller: Address,
    currency: Address,
    account: Address,
    amount: bigint,
  ): Promise<LedgerResult<BalanceView>> {
    return this.sandbox('fundAccount', caller, () => {
      this.runtime.rails.fund(currency, account, amount);
      return {
        currency,
        amount: this.runtime.rails.balanceOf(currency, account).toString(),
      };
    });
  }

  /** Owner-side approval of the custody account over a collection. */
  async approveCustody(
    owner: Address,
    contract: Address,
    approved: boolean,
  ): Promise<LedgerResult<{ contract: Address; approved: boolean }>> {
    return this.withLedgerLock(() =>
      this.applySandbox('approveCustody', () => {
        this.runtime.items.setApprovalForAll(
          contract,
          owner,
          this.runtime.rails.custody,
          approved,
        );
        return { contract, approved };
      }),
    );
  }

  /** Owner-side token allowance towards the custody account. */
  async approveSpending(
    owner: Address,
    currency: Address,
    amount: bigint,
  ): Promise<LedgerResult<BalanceView>> {
    return this.withLedgerLock(() =>
      this.applySandbox('approveSpending', () => {
        this.runtime.rails.approve(currency, owner, amount);
        return {
          currency,
          amount: this.runtime.rails.allowanceOf(currency, owner).toString(),
        };
      }),
    );
  }

  walletOf(account: Address, currency: Address): BalanceView {
    return {
      currency,
      amount: this.runtime.rails.balanceOf(currency, account).toString(),
    };
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private get market() {
    return this.runtime.market;
  }

  private async administer(
    label: string,
    fn: () => void,
  ): Promise<LedgerResult<Wire<FeeConfig>>> {
    return this.withLedgerLock(() =>
      this.apply(label, () => {
        fn();
        return toWire(this.market.fees.getConfig());
      }),
    );
  }

  private read<T>(fn: () => T): LedgerResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      if (isLedgerError(err)) {
        return { ok: false, kind: err.kind, reason: err.message };
      }
      throw err;
    }
  }

  /**
   * Runs one engine operation. A rejection comes back as a result; anything
   * else is a fault and propagates.
   */
  private async apply<T>(label: string, fn: () => T): Promise<LedgerResult<T>> {
    let value: T;
    try {
      value = fn();
    } catch (err) {
      if (isLedgerError(err)) {
        this.logger.debug(`${label} rejected (${err.kind}): ${err.message}`);
        return { ok: false, kind: err.kind, reason: err.message };
      }
      this.logger.error(
        `${label} failed: ${describeError(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      throw err;
    }
    await this.commit(label);
    return { ok: true, value };
  }

  private async sandbox<T>(
    label: string,
    caller: Address,
    fn: () => T,
  ): Promise<LedgerResult<T>> {
    return this.withLedgerLock(async () => {
      if (!this.market.isAdmin(caller)) return this.denied();
      return this.applySandbox(label, fn);
    });
  }

  /** Stand-in contracts throw plain errors for bad setup requests. */
  private async applySandbox<T>(
    label: string,
    fn: () => T,
  ): Promise<LedgerResult<T>> {
    let value: T;
    try {
      value = fn();
    } catch (err) {
      return { ok: false, kind: 'InvalidParameters', reason: describeError(err) };
    }
    await this.commit(label);
    return { ok: true, value };
  }

  private denied(): { ok: false; kind: LedgerErrorKind; reason: string } {
    return { ok: false, kind: 'Unauthorized', reason: 'Administrator role required' };
  }

  /** Persist the committed state, then announce its events. */
  private async commit(label: string): Promise<void> {
    const events = this.market.drainEvents();
    await this.persistence
      .persistCommit(
        {
          ledger: this.market.getState(),
          items: this.runtime.items.snapshot(),
          rails: this.runtime.rails.snapshot(),
        },
        events,
      )
      .catch((err: Error) =>
        this.logger.error(
          `Failed to persist ${label}: ${err.message}`,
          err.stack,
        ),
      );

    for (const event of events) {
      this.eventEmitter.emit('ledgerEvent', {
        rooms: this.roomsFor(event),
        event: toWire(event),
      } satisfies LedgerEventNotice);
    }
  }

  private roomsFor(event: LedgerEvent): string[] {
    switch (event.type) {
      case 'SaleCreated':
        return [this.getSaleRoom(event.sale.id)];
      case 'SalePurchased':
      case 'SaleCancelled':
      case 'SaleItemsReclaimed':
        return [this.getSaleRoom(event.saleId)];
      case 'AuctionCreated':
        return [this.getAuctionRoom(event.auction.id)];
      case 'BidPlaced':
      case 'AuctionCancelled':
        return [this.getAuctionRoom(event.auctionId)];
      case 'BidRefunded':
        return [
          this.getAuctionRoom(event.auctionId),
          this.getAccountRoom(event.bidder),
        ];
      case 'AuctionSettled':
        return [this.getAuctionRoom(event.result.auctionId)];
      case 'BalanceCredited':
      case 'BalanceClaimed':
        return [this.getAccountRoom(event.account)];
      default:
        return [];
    }
  }

  /**
   * Replays the stored result of a retried request. Lookups and waits run
   * outside the ledger lock; `run` takes it itself.
   */
  private async idempotent<T>(
    scope: IdempotentRequest,
    idempotencyKey: string | undefined,
    run: () => Promise<LedgerResult<T>>,
  ): Promise<LedgerResult<T>> {
    const key = idempotencyKey?.trim().slice(0, 128) || null;
    if (!key) return run();
    const { operation, resource, caller } = scope;

    const existing = await this.storedResult<T>(scope, key);
    if (existing) return existing;

    const claimed = await this.redis.claimIdempotency(operation, resource, caller, key);
    if (!claimed) {
      const settled = await this.waitForStoredResult<T>(scope, key);
      return (
        settled ?? {
          ok: false,
          kind: 'InvalidState',
          reason: 'Duplicate request in progress',
        }
      );
    }

    let result: LedgerResult<T>;
    try {
      result = await run();
    } catch (err) {
      await this.redis.releaseIdempotency(operation, resource, caller, key);
      throw err;
    }
    await this.redis.storeIdempotencyResult(
      operation,
      resource,
      caller,
      key,
      JSON.stringify(result),
    );
    return result;
  }

  private async storedResult<T>(
    { operation, resource, caller }: IdempotentRequest,
    key: string,
  ): Promise<LedgerResult<T> | null> {
    const raw = await this.redis.getIdempotencyResult(operation, resource, caller, key);
    if (!raw) return null;
    try {
      return JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Unreadable stored result for ${operation}: ${describeError(err)}`);
      return null;
    }
  }

  private async waitForStoredResult<T>(
    scope: IdempotentRequest,
    key: string,
  ): Promise<LedgerResult<T> | null> {
    const maxAttempts = 40;
    for (let i = 0; i < maxAttempts; i += 1) {
      const result = await this.storedResult<T>(scope, key);
      if (result) return result;
      await new Promise((resolve) => setTimeout(resolve, 25));
    }
    return null;
  }

  /** Serializes operations: submission order is commit order. */
  private async withLedgerLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.ledgerLock;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.ledgerLock = prev.then(() => current);

    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
