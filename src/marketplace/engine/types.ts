export type Address = string;

/**
 * Ownership model of an item contract: one owner per token id, or a
 * fungible balance per (owner, token id).
 */
export type ItemKind = 'UNIQUE' | 'QUANTITY';

export interface ItemRef {
  contract: Address;
  tokenId: string;
  kind: ItemKind;
}

export interface TimeWindow {
  startTime: number;
  endTime: number;
}

/**
 * Sale status is derived from the record and the clock:
 * CANCELLED → PENDING → ACTIVE → ENDED
 */
export type SaleStatus = 'PENDING' | 'ACTIVE' | 'ENDED' | 'CANCELLED';

/**
 * Auction status is derived from the record and the clock:
 * CANCELLED → ENDED_CLAIMED → PENDING → ACTIVE → ENDED
 */
export type AuctionStatus =
  | 'PENDING'
  | 'ACTIVE'
  | 'ENDED'
  | 'CANCELLED'
  | 'ENDED_CLAIMED';

export interface Sale {
  id: number;
  item: ItemRef;
  seller: Address;
  price: bigint;
  currency: Address;
  amount: bigint;
  purchased: bigint;
  startTime: number;
  endTime: number;
  cancelled: boolean;
}

export interface Auction {
  id: number;
  item: ItemRef;
  quantity: bigint;
  seller: Address;
  reservePrice: bigint;
  currency: Address;
  startTime: number;
  endTime: number;
  cancelled: boolean;
  claimed: boolean;
}

/** Standing (escrowed) bid of one bidder on one auction. */
export interface Bid {
  amount: bigint;
  timestamp: number;
}

export interface FeeQuote {
  recipient: Address;
  amount: bigint;
}

export interface RoyaltyQuote {
  receiver: Address;
  amount: bigint;
}

/** Where the gross proceeds of a purchase or settlement went. */
export interface ProceedsSplit {
  gross: bigint;
  fee: FeeQuote;
  royalty: RoyaltyQuote;
  sellerProceeds: bigint;
}

/* ------------------------------------------------------------------ */
/*  INPUTS                                                             */
/* ------------------------------------------------------------------ */

export interface CreateSaleInput {
  seller: Address;
  item: ItemRef;
  amount: bigint;
  price: bigint;
  currency: Address;
  startTime: number;
  endTime: number;
}

export interface BuyInput {
  buyer: Address;
  saleId: number;
  recipient: Address;
  quantity: bigint;
  amountFromBalance: bigint;
  /** Native value attached to the call. */
  value: bigint;
}

export interface CreateAuctionInput {
  seller: Address;
  item: ItemRef;
  quantity?: bigint;
  reservePrice: bigint;
  currency: Address;
  startTime: number;
  endTime: number;
}

export interface BidInput {
  bidder: Address;
  auctionId: number;
  amountFromBalance: bigint;
  externalFunds: bigint;
  /** Native value attached to the call. */
  value: bigint;
}

/* ------------------------------------------------------------------ */
/*  RESULTS                                                            */
/* ------------------------------------------------------------------ */

export interface PurchaseReceipt {
  saleId: number;
  buyer: Address;
  recipient: Address;
  quantity: bigint;
  externalPayment: bigint;
  split: ProceedsSplit;
}

export interface BidReceipt {
  auctionId: number;
  bidder: Address;
  total: bigint;
  refunded: { bidder: Address; amount: bigint } | null;
}

export type SettlementResult =
  | {
      outcome: 'SOLD';
      auctionId: number;
      winner: Address;
      split: ProceedsSplit;
    }
  | {
      outcome: 'RETURNED';
      auctionId: number;
      seller: Address;
      released: { bidder: Address; amount: bigint } | null;
    };

/* ------------------------------------------------------------------ */
/*  EVENTS                                                             */
/* ------------------------------------------------------------------ */

export type LedgerEvent =
  | { type: 'SaleCreated'; sale: Sale }
  | {
      type: 'SalePurchased';
      saleId: number;
      buyer: Address;
      recipient: Address;
      quantity: bigint;
      split: ProceedsSplit;
    }
  | { type: 'SaleCancelled'; saleId: number; by: Address }
  | {
      type: 'SaleItemsReclaimed';
      saleId: number;
      seller: Address;
      quantity: bigint;
    }
  | { type: 'AuctionCreated'; auction: Auction }
  | { type: 'BidPlaced'; auctionId: number; bidder: Address; total: bigint }
  | {
      type: 'BidRefunded';
      auctionId: number;
      bidder: Address;
      amount: bigint;
    }
  | { type: 'AuctionCancelled'; auctionId: number; by: Address }
  | { type: 'AuctionSettled'; result: SettlementResult }
  | {
      type: 'BalanceCredited';
      account: Address;
      currency: Address;
      amount: bigint;
    }
  | {
      type: 'BalanceClaimed';
      account: Address;
      currency: Address;
      amount: bigint;
    }
  | { type: 'FeeUpdated'; rate: bigint; scale: bigint }
  | { type: 'FeeRecipientUpdated'; recipient: Address }
  | {
      type: 'ListingContractApprovalChanged';
      contract: Address;
      approved: boolean;
    }
  | { type: 'CurrencyApprovalChanged'; currency: Address; approved: boolean }
  | { type: 'AllCurrenciesApproved' };

export type LedgerEventType = LedgerEvent['type'];
