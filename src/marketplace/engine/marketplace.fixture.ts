import { LedgerError } from './errors';
import type { Clock } from './ledger-context';
import { Marketplace } from './marketplace';
import { NATIVE_CURRENCY } from './payment-rails';
import { SimulatedItemContracts, SimulatedPaymentRails } from './simulated-chain';
import type { ItemRef } from './types';

export const ADMIN = 'admin';
export const SELLER = 'seller';
export const BUYER = 'buyer';
export const BIDDER_A = 'bidder-a';
export const BIDDER_B = 'bidder-b';
export const ARTIST = 'artist';
export const TREASURY = 'treasury';
export const CUSTODY = 'market-custody';
export const SALES = 'market-sales';
export const AUCTIONS = 'market-auctions';
export const UNIQUE_COLLECTION = '0xunique';
export const MULTI_COLLECTION = '0xmulti';
export const TOKEN = '0xtoken';
export { NATIVE_CURRENCY };

export const START = 1_000;
export const END = 2_000;

export class ManualClock implements Clock {
  constructor(public time = START) {}

  now(): number {
    return this.time;
  }

  set(time: number): void {
    this.time = time;
  }
}

export interface MarketFixture {
  market: Marketplace;
  clock: ManualClock;
  items: SimulatedItemContracts;
  rails: SimulatedPaymentRails;
}

export function uniqueItem(tokenId = '1'): ItemRef {
  return { contract: UNIQUE_COLLECTION, tokenId, kind: 'UNIQUE' };
}

export function multiItem(tokenId = '7'): ItemRef {
  return { contract: MULTI_COLLECTION, tokenId, kind: 'QUANTITY' };
}

/**
 * A marketplace at time START with both collections and both currencies
 * approved, a 3% fee to TREASURY, and SELLER holding unique tokens 1-3
 * and 10 of multi token 7 with the custody account approved.
 */
export function createMarket(): MarketFixture {
  const clock = new ManualClock();
  const items = new SimulatedItemContracts(CUSTODY);
  const rails = new SimulatedPaymentRails(CUSTODY);
  const market = new Marketplace({
    salesAddress: SALES,
    auctionsAddress: AUCTIONS,
    custody: CUSTODY,
    feeRecipient: TREASURY,
    clock,
    access: { isAdmin: (account) => account === ADMIN },
    items,
    rails,
    participants: [items, rails],
  });

  items.deployCollection(UNIQUE_COLLECTION, { kind: 'UNIQUE', royaltyReceiver: ARTIST });
  items.deployCollection(MULTI_COLLECTION, { kind: 'QUANTITY', royaltyReceiver: ARTIST });
  for (const tokenId of ['1', '2', '3']) {
    items.mint(UNIQUE_COLLECTION, SELLER, tokenId);
  }
  items.mint(MULTI_COLLECTION, SELLER, '7', 10n);
  items.setApprovalForAll(UNIQUE_COLLECTION, SELLER, CUSTODY, true);
  items.setApprovalForAll(MULTI_COLLECTION, SELLER, CUSTODY, true);

  for (const contract of [SALES, AUCTIONS, UNIQUE_COLLECTION, MULTI_COLLECTION]) {
    market.setListingContractApproval(ADMIN, contract, true);
  }
  market.setCurrencyApproval(ADMIN, NATIVE_CURRENCY, true);
  market.setCurrencyApproval(ADMIN, TOKEN, true);
  market.drainEvents();

  return { market, clock, items, rails };
}

/** Custody holdings must equal what the ledger owes plus what it escrows. */
export function custodyGap(fixture: MarketFixture, currency: string): bigint {
  const held = fixture.rails.balanceOf(currency, CUSTODY);
  const owed = fixture.market.vault.totalOwed(currency) + fixture.market.escrowOf(currency);
  return held - owed;
}

/** Runs `fn` and returns the LedgerError it throws. */
export function catchLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err;
    throw err;
  }
  throw new Error('Expected a LedgerError');
}
