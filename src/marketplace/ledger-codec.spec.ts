import { parseLedger, stringifyLedger, toWire } from './ledger-codec';

describe('ledger codec', () => {
  it('restores bigints, maps and sets', () => {
    const state = {
      next: 3,
      balances: new Map([['0xtoken', new Map([['alice', 12n]])]]),
      approved: new Set(['0xart']),
    };

    const restored = parseLedger<typeof state>(stringifyLedger(state));

    expect(restored.next).toBe(3);
    expect(restored.balances.get('0xtoken')?.get('alice')).toBe(12n);
    expect(restored.approved.has('0xart')).toBe(true);
  });

  it('leaves plain objects that look nothing like tags alone', () => {
    const restored = parseLedger<{ meta: { bigint: string } }>(
      stringifyLedger({ meta: { bigint: '5' } }),
    );
    expect(restored).toEqual({ meta: { bigint: '5' } });
  });

  it('writes amounts as decimal strings on the wire', () => {
    expect(toWire({ price: 1_000_000_000_000_000_000n, buyer: 'bob', refunded: null })).toEqual({
      price: '1000000000000000000',
      buyer: 'bob',
      refunded: null,
    });
  });
});
