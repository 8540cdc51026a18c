import type {
  Address,
  Auction,
  AuctionStatus,
  Bid,
  Marketplace,
  Sale,
  SaleStatus,
} from './engine';
import { toWire, type Wire } from './ledger-codec';

export type SaleView = Wire<Sale> & { status: SaleStatus; remaining: string };

export type AuctionView = Wire<Auction> & {
  status: AuctionStatus;
  highestBidder: Address | null;
  highestBid: string;
};

export type BidView = Wire<Bid> & { auctionId: number; bidder: Address };

export interface BalanceView {
  currency: Address;
  amount: string;
}

export function saleView(market: Marketplace, saleId: number): SaleView {
  const sale = market.getSale(saleId);
  return {
    ...toWire(sale),
    status: market.getSaleStatus(saleId),
    remaining: (sale.amount - sale.purchased).toString(),
  };
}

export function auctionView(market: Marketplace, auctionId: number): AuctionView {
  const highestBidder = market.getHighestBidder(auctionId);
  const highestBid =
    highestBidder === null ? 0n : market.getBid(auctionId, highestBidder).amount;
  return {
    ...toWire(market.getAuction(auctionId)),
    status: market.getAuctionStatus(auctionId),
    highestBidder,
    highestBid: highestBid.toString(),
  };
}

export function bidView(
  market: Marketplace,
  auctionId: number,
  bidder: Address,
): BidView {
  return { auctionId, bidder, ...toWire(market.getBid(auctionId, bidder)) };
}
