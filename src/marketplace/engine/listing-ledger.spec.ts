import {
  ADMIN,
  ARTIST,
  BIDDER_B,
  BUYER,
  CUSTODY,
  END,
  MULTI_COLLECTION,
  NATIVE_CURRENCY,
  SALES,
  SELLER,
  START,
  TOKEN,
  TREASURY,
  UNIQUE_COLLECTION,
  catchLedgerError,
  createMarket,
  custodyGap,
  multiItem,
  uniqueItem,
  type MarketFixture,
} from './marketplace.fixture';
import type { BuyInput, CreateSaleInput } from './types';

describe('ListingLedger', () => {
  let f: MarketFixture;

  beforeEach(() => {
    f = createMarket();
  });

  const saleInput = (overrides: Partial<CreateSaleInput> = {}): CreateSaleInput => ({
    seller: SELLER,
    item: uniqueItem(),
    amount: 1n,
    price: 100n,
    currency: NATIVE_CURRENCY,
    startTime: START,
    endTime: END,
    ...overrides,
  });

  const buyInput = (overrides: Partial<BuyInput> = {}): BuyInput => ({
    buyer: BUYER,
    saleId: 1,
    recipient: BUYER,
    quantity: 1n,
    amountFromBalance: 0n,
    value: 100n,
    ...overrides,
  });

  describe('createSale', () => {
    it('takes the item into custody and allocates sequential ids from 1', () => {
      const first = f.market.createSale(saleInput());
      const second = f.market.createSale(saleInput({ item: uniqueItem('2') }));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.purchased).toBe(0n);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(CUSTODY);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '2')).toBe(CUSTODY);
      expect(f.market.listings.saleCount()).toBe(2);
    });

    it('moves a fungible quantity into custody', () => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 4n }));
      expect(f.items.balanceOf(MULTI_COLLECTION, CUSTODY, '7')).toBe(4n);
      expect(f.items.balanceOf(MULTI_COLLECTION, SELLER, '7')).toBe(6n);
    });

    it('rejects a window whose end is not after its start', () => {
      const err = catchLedgerError(() =>
        f.market.createSale(saleInput({ startTime: END, endTime: END })),
      );
      expect(err.kind).toBe('InvalidParameters');
      expect(f.market.listings.saleCount()).toBe(0);
    });

    it('rejects more than one unique item per listing', () => {
      const err = catchLedgerError(() => f.market.createSale(saleInput({ amount: 2n })));
      expect(err.kind).toBe('InvalidParameters');
    });

    it('rejects an unapproved currency', () => {
      const err = catchLedgerError(() =>
        f.market.createSale(saleInput({ currency: '0xunknown' })),
      );
      expect(err.kind).toBe('IneligibleAsset');
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(SELLER);
    });

    it('rejects an unapproved item contract', () => {
      f.market.setListingContractApproval(ADMIN, UNIQUE_COLLECTION, false);
      const err = catchLedgerError(() => f.market.createSale(saleInput()));
      expect(err.kind).toBe('IneligibleAsset');
    });

    it('rejects item contracts without royalty info', () => {
      f.items.deployCollection('0xplain', { kind: 'UNIQUE', supportsRoyalties: false });
      f.items.mint('0xplain', SELLER, '1');
      f.market.setListingContractApproval(ADMIN, '0xplain', true);

      const err = catchLedgerError(() =>
        f.market.createSale(
          saleInput({ item: { contract: '0xplain', tokenId: '1', kind: 'UNIQUE' } }),
        ),
      );
      expect(err.kind).toBe('IneligibleAsset');
      expect(err.message).toBe('Item contract 0xplain does not expose royalty info');
    });

    it('rolls back the listing when the item cannot be moved', () => {
      f.items.setApprovalForAll(UNIQUE_COLLECTION, SELLER, CUSTODY, false);

      const err = catchLedgerError(() => f.market.createSale(saleInput()));

      expect(err.kind).toBe('TransferFailure');
      expect(f.market.listings.saleCount()).toBe(0);
      expect(f.market.drainEvents()).toEqual([]);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(SELLER);
    });
  });

  describe('status', () => {
    it('is PENDING before the start and ACTIVE inside the window', () => {
      f.market.createSale(saleInput({ startTime: START + 100 }));
      expect(f.market.getSaleStatus(1)).toBe('PENDING');
      f.clock.set(START + 100);
      expect(f.market.getSaleStatus(1)).toBe('ACTIVE');
    });

    it('is ENDED at the end time', () => {
      f.market.createSale(saleInput());
      f.clock.set(END);
      expect(f.market.getSaleStatus(1)).toBe('ENDED');
    });

    it('is CANCELLED for every sale once the ledger is deprecated', () => {
      f.market.createSale(saleInput());
      f.market.setListingContractApproval(ADMIN, SALES, false);

      expect(f.market.getSaleStatus(1)).toBe('CANCELLED');
      const err = catchLedgerError(() => f.market.createSale(saleInput({ item: uniqueItem('2') })));
      expect(err.kind).toBe('IneligibleAsset');
    });

    it('reports unknown and zero ids as NotFound', () => {
      expect(catchLedgerError(() => f.market.getSale(0)).kind).toBe('NotFound');
      expect(catchLedgerError(() => f.market.getSaleStatus(1)).kind).toBe('NotFound');
      expect(catchLedgerError(() => f.market.buy(buyInput({ saleId: 5 }))).kind).toBe(
        'NotFound',
      );
    });
  });

  describe('buy', () => {
    it('sells one item for 100 with a 3% fee', () => {
      f.market.createSale(saleInput());
      f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);
      expect(f.market.getSaleStatus(1)).toBe('ACTIVE');

      const receipt = f.market.buy(buyInput());

      expect(receipt.externalPayment).toBe(100n);
      expect(receipt.split.fee).toEqual({ recipient: TREASURY, amount: 3n });
      expect(receipt.split.sellerProceeds).toBe(97n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(97n);
      expect(f.market.claimableBalance(TREASURY, NATIVE_CURRENCY)).toBe(3n);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(BUYER);
      expect(f.market.getSale(1).purchased).toBe(1n);
      expect(f.market.getSaleStatus(1)).toBe('ENDED');
      expect(f.rails.balanceOf(NATIVE_CURRENCY, BUYER)).toBe(0n);
      expect(custodyGap(f, NATIVE_CURRENCY)).toBe(0n);
    });

    it('delivers to a recipient other than the buyer and tracks per-buyer quantity', () => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 10n, price: 10n }));
      f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);

      f.market.buy(buyInput({ recipient: 'friend', quantity: 3n, value: 30n }));
      expect(f.market.getSale(1).purchased).toBe(3n);
      expect(f.market.getSaleStatus(1)).toBe('ACTIVE');

      f.market.buy(buyInput({ quantity: 7n, value: 70n }));

      expect(f.items.balanceOf(MULTI_COLLECTION, 'friend', '7')).toBe(3n);
      expect(f.items.balanceOf(MULTI_COLLECTION, BUYER, '7')).toBe(7n);
      expect(f.market.purchasedBy(1, BUYER)).toBe(10n);
      expect(f.market.getSale(1).purchased).toBe(10n);
      expect(f.market.getSaleStatus(1)).toBe('ENDED');
    });

    it('rejects more than the remaining stock', () => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 5n, price: 10n }));
      f.rails.fund(NATIVE_CURRENCY, BUYER, 60n);

      const err = catchLedgerError(() => f.market.buy(buyInput({ quantity: 6n, value: 60n })));

      expect(err.kind).toBe('InsufficientFunds');
      expect(err.message).toBe('Only 5 left in sale 1');
      expect(f.market.getSale(1).purchased).toBe(0n);
    });

    it('never lowers the purchased count or lets it pass the listed amount', () => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 5n, price: 10n }));
      f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);
      const seen: bigint[] = [];
      const record = () => seen.push(f.market.getSale(1).purchased);

      f.market.buy(buyInput({ quantity: 2n, value: 20n }));
      record();
      catchLedgerError(() => f.market.buy(buyInput({ quantity: 4n, value: 40n })));
      record();
      catchLedgerError(() => f.market.buy(buyInput({ quantity: 0n, value: 0n })));
      record();
      f.market.buy(buyInput({ quantity: 3n, value: 30n }));
      record();
      catchLedgerError(() => f.market.buy(buyInput({ quantity: 1n, value: 10n })));
      record();

      expect(seen).toEqual([2n, 2n, 2n, 5n, 5n]);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, BUYER)).toBe(50n);
    });

    it('rejects a zero quantity', () => {
      f.market.createSale(saleInput());
      const err = catchLedgerError(() => f.market.buy(buyInput({ quantity: 0n, value: 0n })));
      expect(err.kind).toBe('InvalidParameters');
    });

    it('requires the exact native value', () => {
      f.market.createSale(saleInput());
      f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);

      const err = catchLedgerError(() => f.market.buy(buyInput({ value: 99n })));

      expect(err.kind).toBe('InsufficientFunds');
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(0n);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(CUSTODY);
    });

    it('pulls token payments through the allowance', () => {
      f.market.createSale(saleInput({ currency: TOKEN }));
      f.rails.fund(TOKEN, BUYER, 100n);
      f.rails.approve(TOKEN, BUYER, 100n);

      f.market.buy(buyInput({ value: 0n }));

      expect(f.rails.allowanceOf(TOKEN, BUYER)).toBe(0n);
      expect(f.rails.balanceOf(TOKEN, CUSTODY)).toBe(100n);
      expect(f.market.claimableBalance(SELLER, TOKEN)).toBe(97n);
      expect(custodyGap(f, TOKEN)).toBe(0n);
    });

    it('rolls back every credit when the token pull fails', () => {
      f.market.createSale(saleInput({ currency: TOKEN }));
      f.rails.fund(TOKEN, BUYER, 100n);

      const err = catchLedgerError(() => f.market.buy(buyInput({ value: 0n })));

      expect(err.kind).toBe('TransferFailure');
      expect(err.message).toBe(
        'Collecting 100 from buyer failed: Allowance 0 of buyer is below 100',
      );
      expect(f.market.getSale(1).purchased).toBe(0n);
      expect(f.market.claimableBalance(SELLER, TOKEN)).toBe(0n);
      expect(f.market.claimableBalance(TREASURY, TOKEN)).toBe(0n);
      expect(f.items.ownerOf(UNIQUE_COLLECTION, '1')).toBe(CUSTODY);
    });

    it('spends the claimable balance before external funds', () => {
      // BUYER gets 60 claimable by being outbid
      f.market.createAuction({
        seller: SELLER,
        item: uniqueItem('2'),
        reservePrice: 0n,
        currency: NATIVE_CURRENCY,
        startTime: START,
        endTime: END,
      });
      f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);
      f.rails.fund(NATIVE_CURRENCY, BIDDER_B, 80n);
      f.market.bid({ bidder: BUYER, auctionId: 1, amountFromBalance: 0n, externalFunds: 60n, value: 60n });
      f.market.bid({ bidder: BIDDER_B, auctionId: 1, amountFromBalance: 0n, externalFunds: 80n, value: 80n });
      expect(f.market.claimableBalance(BUYER, NATIVE_CURRENCY)).toBe(60n);

      f.market.createSale(saleInput());
      const receipt = f.market.buy(buyInput({ amountFromBalance: 60n, value: 40n }));

      expect(receipt.externalPayment).toBe(40n);
      expect(f.market.claimableBalance(BUYER, NATIVE_CURRENCY)).toBe(0n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(97n);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, BUYER)).toBe(0n);
      expect(custodyGap(f, NATIVE_CURRENCY)).toBe(0n);
    });

    it('rejects a balance portion above the claimable balance or the price', () => {
      f.market.createSale(saleInput());

      expect(
        catchLedgerError(() => f.market.buy(buyInput({ amountFromBalance: 10n, value: 90n }))).kind,
      ).toBe('InsufficientFunds');
      expect(
        catchLedgerError(() => f.market.buy(buyInput({ amountFromBalance: 101n, value: 0n }))).kind,
      ).toBe('InvalidParameters');
    });

    it('rejects purchases outside the ACTIVE window', () => {
      f.market.createSale(saleInput({ startTime: START + 10 }));
      expect(catchLedgerError(() => f.market.buy(buyInput())).kind).toBe('InvalidState');
      f.clock.set(END);
      const err = catchLedgerError(() => f.market.buy(buyInput()));
      expect(err.kind).toBe('InvalidState');
      expect(err.message).toBe('Sale 1 is ENDED');
    });
  });

  describe('royalties', () => {
    beforeEach(() => {
      f.rails.fund(NATIVE_CURRENCY, BUYER, 10_000n);
    });

    it('pays fee, then royalty, then the seller', () => {
      f.items.setRoyalty(UNIQUE_COLLECTION, ARTIST, 1_000n);
      f.market.createSale(saleInput({ price: 1_000n }));

      const { split } = f.market.buy(buyInput({ value: 1_000n }));

      expect(split.fee.amount).toBe(30n);
      expect(split.royalty).toEqual({ receiver: ARTIST, amount: 100n });
      expect(split.sellerProceeds).toBe(870n);
      expect(f.market.claimableBalance(ARTIST, NATIVE_CURRENCY)).toBe(100n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(870n);
    });

    it('pays no royalty when the artist is the seller', () => {
      f.items.setRoyalty(UNIQUE_COLLECTION, SELLER, 1_000n);
      f.market.createSale(saleInput({ price: 1_000n }));

      const { split } = f.market.buy(buyInput({ value: 1_000n }));

      expect(split.royalty.amount).toBe(0n);
      expect(split.sellerProceeds).toBe(970n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(970n);
    });

    it('clamps a royalty that would exceed what the fee leaves', () => {
      f.items.setRoyalty(UNIQUE_COLLECTION, ARTIST, 10_000n);
      f.market.createSale(saleInput({ price: 1_000n }));

      const { split } = f.market.buy(buyInput({ value: 1_000n }));

      expect(split.fee.amount + split.royalty.amount).toBe(1_000n);
      expect(split.royalty.amount).toBe(970n);
      expect(split.sellerProceeds).toBe(0n);
    });

    it('queries royalty terms on every purchase', () => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 2n, price: 1_000n }));

      f.items.setRoyalty(MULTI_COLLECTION, ARTIST, 500n);
      const first = f.market.buy(buyInput({ value: 1_000n }));
      f.items.setRoyalty(MULTI_COLLECTION, ARTIST, 200n);
      const second = f.market.buy(buyInput({ value: 1_000n }));

      expect(first.split.royalty.amount).toBe(50n);
      expect(second.split.royalty.amount).toBe(20n);
      expect(f.market.claimableBalance(ARTIST, NATIVE_CURRENCY)).toBe(70n);
    });
  });

  describe('claimSaleNfts', () => {
    beforeEach(() => {
      f.market.createSale(saleInput({ item: multiItem(), amount: 10n, price: 10n }));
      f.rails.fund(NATIVE_CURRENCY, BUYER, 40n);
      f.market.buy(buyInput({ quantity: 4n, value: 40n }));
    });

    it('returns unsold stock to the seller once the sale has ended', () => {
      f.clock.set(END);

      expect(f.market.claimSaleNfts(SELLER, 1)).toBe(6n);
      expect(f.items.balanceOf(MULTI_COLLECTION, SELLER, '7')).toBe(6n);
      expect(f.market.getSale(1).purchased).toBe(10n);
    });

    it('can only be done once', () => {
      f.clock.set(END);
      f.market.claimSaleNfts(SELLER, 1);

      const err = catchLedgerError(() => f.market.claimSaleNfts(SELLER, 1));
      expect(err.kind).toBe('InvalidState');
      expect(err.message).toBe('Sale 1 has no unsold items');
    });

    it('is refused for a sale that ended by selling out', () => {
      f.rails.fund(NATIVE_CURRENCY, BUYER, 60n);
      f.market.buy(buyInput({ quantity: 6n, value: 60n }));
      expect(f.market.getSaleStatus(1)).toBe('ENDED');

      const err = catchLedgerError(() => f.market.claimSaleNfts(SELLER, 1));

      expect(err.kind).toBe('InvalidState');
      expect(err.message).toBe('Sale 1 has no unsold items');
      expect(f.items.balanceOf(MULTI_COLLECTION, BUYER, '7')).toBe(10n);
    });

    it('is reserved to the seller', () => {
      f.clock.set(END);
      expect(catchLedgerError(() => f.market.claimSaleNfts(BUYER, 1)).kind).toBe('Unauthorized');
    });

    it('is refused while the sale is ACTIVE', () => {
      expect(catchLedgerError(() => f.market.claimSaleNfts(SELLER, 1)).kind).toBe('InvalidState');
    });

    it('is allowed after cancellation', () => {
      f.market.cancelSale(SELLER, 1);
      expect(f.market.claimSaleNfts(SELLER, 1)).toBe(6n);
    });
  });

  describe('cancelSale', () => {
    beforeEach(() => {
      f.market.createSale(saleInput());
    });

    it('cancels once and blocks purchases', () => {
      f.market.cancelSale(SELLER, 1);

      expect(f.market.getSaleStatus(1)).toBe('CANCELLED');
      expect(catchLedgerError(() => f.market.buy(buyInput())).kind).toBe('InvalidState');
      expect(catchLedgerError(() => f.market.cancelSale(SELLER, 1)).kind).toBe('InvalidState');
    });

    it('lets an administrator cancel', () => {
      f.market.cancelSale(ADMIN, 1);
      expect(f.market.getSale(1).cancelled).toBe(true);
    });

    it('refuses anyone else', () => {
      const err = catchLedgerError(() => f.market.cancelSale(BUYER, 1));
      expect(err.kind).toBe('Unauthorized');
      expect(f.market.getSale(1).cancelled).toBe(false);
    });

    it('refuses an ended sale', () => {
      f.clock.set(END);
      expect(catchLedgerError(() => f.market.cancelSale(SELLER, 1)).kind).toBe('InvalidState');
    });
  });
});
