import { Marketplace } from './marketplace';
import {
  ADMIN,
  BIDDER_A,
  BIDDER_B,
  BUYER,
  CUSTODY,
  END,
  NATIVE_CURRENCY,
  SELLER,
  START,
  TOKEN,
  TREASURY,
  catchLedgerError,
  createMarket,
  custodyGap,
  multiItem,
  uniqueItem,
  type MarketFixture,
} from './marketplace.fixture';
import type { LedgerError } from './errors';

describe('Marketplace', () => {
  let f: MarketFixture;

  beforeEach(() => {
    f = createMarket();
  });

  /** SELLER ends up with 97 claimable from a 100 sale. */
  function sellOneForHundred(): void {
    f.market.createSale({
      seller: SELLER,
      item: uniqueItem(),
      amount: 1n,
      price: 100n,
      currency: NATIVE_CURRENCY,
      startTime: START,
      endTime: END,
    });
    f.rails.fund(NATIVE_CURRENCY, BUYER, 100n);
    f.market.buy({
      buyer: BUYER,
      saleId: 1,
      recipient: BUYER,
      quantity: 1n,
      amountFromBalance: 0n,
      value: 100n,
    });
  }

  describe('claim', () => {
    beforeEach(() => {
      sellOneForHundred();
      f.market.drainEvents();
    });

    it('pays out the whole balance and zeroes it', () => {
      expect(f.market.claim(SELLER, NATIVE_CURRENCY)).toBe(97n);

      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(0n);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, SELLER)).toBe(97n);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, CUSTODY)).toBe(3n);
      expect(custodyGap(f, NATIVE_CURRENCY)).toBe(0n);
    });

    it('refuses an empty balance', () => {
      f.market.claim(SELLER, NATIVE_CURRENCY);
      const err = catchLedgerError(() => f.market.claim(SELLER, NATIVE_CURRENCY));
      expect(err.kind).toBe('InsufficientFunds');
      expect(err.message).toBe('Nothing to claim');
    });

    it('restores the balance when the payout is rejected', () => {
      f.rails.rejectPayments(SELLER);

      const err = catchLedgerError(() => f.market.claim(SELLER, NATIVE_CURRENCY));

      expect(err.kind).toBe('TransferFailure');
      expect(err.message).toBe('Payout to seller failed: seller rejected the payment');
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(97n);
      expect(f.market.drainEvents()).toEqual([]);

      f.rails.rejectPayments(SELLER, false);
      expect(f.market.claim(SELLER, NATIVE_CURRENCY)).toBe(97n);
    });
  });

  describe('reentrancy', () => {
    beforeEach(() => {
      sellOneForHundred();
    });

    it('fails the outer claim when the payee re-enters and propagates the refusal', () => {
      f.rails.onReceive(SELLER, () => {
        f.market.claim(SELLER, NATIVE_CURRENCY);
      });

      const err = catchLedgerError(() => f.market.claim(SELLER, NATIVE_CURRENCY));

      expect(err.kind).toBe('TransferFailure');
      expect(err.message).toBe('Payout to seller failed: Reentrant call rejected');
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(97n);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, SELLER)).toBe(0n);
    });

    it('pays exactly once when the payee swallows the refusal', () => {
      const nested: LedgerError[] = [];
      f.rails.onReceive(SELLER, () => {
        nested.push(catchLedgerError(() => f.market.claim(SELLER, NATIVE_CURRENCY)));
      });

      expect(f.market.claim(SELLER, NATIVE_CURRENCY)).toBe(97n);

      expect(nested.map((e) => e.kind)).toEqual(['InvalidState']);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, SELLER)).toBe(97n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(0n);
    });

    it('blocks a bid placed from inside a payout', () => {
      f.market.createAuction({
        seller: SELLER,
        item: uniqueItem('2'),
        reservePrice: 1n,
        currency: NATIVE_CURRENCY,
        startTime: START,
        endTime: END,
      });
      const nested: LedgerError[] = [];
      f.rails.onReceive(SELLER, () => {
        nested.push(
          catchLedgerError(() =>
            f.market.bid({
              bidder: SELLER,
              auctionId: 1,
              amountFromBalance: 97n,
              externalFunds: 0n,
              value: 0n,
            }),
          ),
        );
      });

      f.market.claim(SELLER, NATIVE_CURRENCY);

      expect(nested.map((e) => e.kind)).toEqual(['InvalidState']);
      expect(f.market.getHighestBidder(1)).toBeNull();
    });
  });

  describe('conservation', () => {
    it('keeps custody equal to balances owed plus escrow through a mixed session', () => {
      const check = () => {
        expect(custodyGap(f, NATIVE_CURRENCY)).toBe(0n);
        expect(custodyGap(f, TOKEN)).toBe(0n);
      };

      f.market.createSale({
        seller: SELLER,
        item: multiItem(),
        amount: 5n,
        price: 30n,
        currency: TOKEN,
        startTime: START,
        endTime: END,
      });
      f.market.createAuction({
        seller: SELLER,
        item: uniqueItem(),
        reservePrice: 50n,
        currency: NATIVE_CURRENCY,
        startTime: START,
        endTime: END,
      });
      f.rails.fund(TOKEN, BUYER, 1_000n);
      f.rails.approve(TOKEN, BUYER, 1_000n);
      f.rails.fund(NATIVE_CURRENCY, BIDDER_A, 1_000n);
      f.rails.fund(NATIVE_CURRENCY, BIDDER_B, 1_000n);

      f.market.buy({ buyer: BUYER, saleId: 1, recipient: BUYER, quantity: 2n, amountFromBalance: 0n, value: 0n });
      check();
      f.market.bid({ bidder: BIDDER_A, auctionId: 1, amountFromBalance: 0n, externalFunds: 60n, value: 60n });
      check();
      f.market.bid({ bidder: BIDDER_B, auctionId: 1, amountFromBalance: 0n, externalFunds: 90n, value: 90n });
      check();
      f.market.bid({ bidder: BIDDER_A, auctionId: 1, amountFromBalance: 60n, externalFunds: 40n, value: 40n });
      check();
      f.market.claim(BIDDER_B, NATIVE_CURRENCY);
      check();
      catchLedgerError(() =>
        f.market.buy({ buyer: BUYER, saleId: 1, recipient: BUYER, quantity: 9n, amountFromBalance: 0n, value: 0n }),
      );
      check();

      f.clock.set(END);
      f.market.settleAuction(SELLER, 1);
      check();
      f.market.claimSaleNfts(SELLER, 1);
      f.market.claim(SELLER, TOKEN);
      f.market.claim(SELLER, NATIVE_CURRENCY);
      check();

      expect(f.market.escrowOf(NATIVE_CURRENCY)).toBe(0n);
      expect(f.market.claimableBalance(TREASURY, NATIVE_CURRENCY)).toBe(3n);
      expect(f.market.claimableBalance(TREASURY, TOKEN)).toBe(1n);
      expect(f.rails.balanceOf(NATIVE_CURRENCY, SELLER)).toBe(97n);
      expect(f.rails.balanceOf(TOKEN, SELLER)).toBe(59n);
      expect(f.market.getSale(1).purchased).toBe(5n);
    });
  });

  describe('events', () => {
    it('records a committed purchase in order', () => {
      sellOneForHundred();
      const events = f.market.drainEvents();
      expect(events.map((e) => e.type)).toEqual([
        'SaleCreated',
        'BalanceCredited',
        'BalanceCredited',
        'SalePurchased',
      ]);
      expect(f.market.drainEvents()).toEqual([]);
    });

    it('drops the events of a failed operation', () => {
      catchLedgerError(() =>
        f.market.createSale({
          seller: BUYER,
          item: uniqueItem(),
          amount: 1n,
          price: 1n,
          currency: NATIVE_CURRENCY,
          startTime: START,
          endTime: END,
        }),
      );
      expect(f.market.drainEvents()).toEqual([]);
    });
  });

  describe('administration', () => {
    it('requires the administrator role', () => {
      const err = catchLedgerError(() => f.market.setFee(SELLER, 500n, 10_000n));
      expect(err.kind).toBe('Unauthorized');
      expect(f.market.fees.getConfig().rate).toBe(300n);
    });

    it('applies fee changes to later purchases', () => {
      f.market.setFee(ADMIN, 1_000n, 10_000n);
      f.market.setFeeRecipient(ADMIN, 'new-treasury');
      sellOneForHundred();
      expect(f.market.claimableBalance('new-treasury', NATIVE_CURRENCY)).toBe(10n);
      expect(f.market.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(90n);
    });

    it('does not re-announce an unchanged setting', () => {
      f.market.setCurrencyApproval(ADMIN, TOKEN, true);
      f.market.setListingContractApproval(ADMIN, CUSTODY, false);
      f.market.setFee(ADMIN, 300n, 10_000n);
      expect(f.market.drainEvents()).toEqual([]);

      f.market.setCurrencyApproval(ADMIN, TOKEN, false);
      expect(f.market.drainEvents()).toEqual([
        { type: 'CurrencyApprovalChanged', currency: TOKEN, approved: false },
      ]);
    });

    it('approves every currency irreversibly', () => {
      f.market.approveAllCurrencies(ADMIN);
      f.market.setCurrencyApproval(ADMIN, TOKEN, false);

      expect(f.market.registry.isApprovedCurrency('0xanything')).toBe(true);
      expect(f.market.registry.isApprovedCurrency(TOKEN)).toBe(true);
      f.market.drainEvents();
      f.market.approveAllCurrencies(ADMIN);
      expect(f.market.drainEvents()).toEqual([]);
    });
  });

  describe('getState / setState', () => {
    it('restores a second engine to the same ledger', () => {
      sellOneForHundred();
      const state = f.market.getState();

      const copy = new Marketplace({
        salesAddress: f.market.listings.address,
        auctionsAddress: f.market.auctions.address,
        custody: CUSTODY,
        feeRecipient: 'someone-else',
        clock: f.clock,
        access: { isAdmin: () => false },
        items: f.items,
        rails: f.rails,
      });
      copy.setState(state);

      expect(copy.getSale(1).purchased).toBe(1n);
      expect(copy.getSaleStatus(1)).toBe('ENDED');
      expect(copy.claimableBalance(SELLER, NATIVE_CURRENCY)).toBe(97n);
      expect(copy.fees.getConfig().recipient).toBe(TREASURY);
      expect(copy.listings.saleCount()).toBe(1);
    });
  });
});
