export { Marketplace } from './marketplace';
export type { MarketplaceOptions, MarketplaceState } from './marketplace';
export { LedgerError, LedgerFault, describeError, isLedgerError } from './errors';
export type { LedgerErrorKind } from './errors';
export { NATIVE_CURRENCY, isNativeCurrency } from './payment-rails';
export type { PaymentRails } from './payment-rails';
export { ROYALTY_INTERFACE_ID } from './item-transfer';
export type { ItemContractGateway } from './item-transfer';
export { systemClock } from './ledger-context';
export type { AccessPolicy, Clock } from './ledger-context';
export { DEFAULT_FEE_RATE, DEFAULT_FEE_SCALE } from './fee-policy';
export type { FeeConfig } from './fee-policy';
export { SimulatedItemContracts, SimulatedPaymentRails } from './simulated-chain';
export type { CollectionConfig, ReceiveHook } from './simulated-chain';
export type { Transactional } from './transactional';
export type {
  Address,
  Auction,
  AuctionStatus,
  Bid,
  BidInput,
  BidReceipt,
  BuyInput,
  CreateAuctionInput,
  CreateSaleInput,
  ItemKind,
  ItemRef,
  LedgerEvent,
  ProceedsSplit,
  PurchaseReceipt,
  Sale,
  SaleStatus,
  SettlementResult,
} from './types';
