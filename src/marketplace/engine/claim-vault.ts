import { LedgerError, describeError, subtract } from './errors';
import type { PaymentRails } from './payment-rails';
import type { EventOutbox, Transactional } from './transactional';
import type { Address } from './types';

/** currency → account → amount owed */
export type ClaimVaultState = Map<Address, Map<Address, bigint>>;

/**
 * Withdrawable balances per (account, currency). Both ledgers credit and
 * debit it; account holders drain it with claim().
 */
export class ClaimVault implements Transactional<ClaimVaultState> {
  private balances: ClaimVaultState = new Map();

  constructor(
    private readonly events: EventOutbox,
    private readonly rails: PaymentRails,
  ) {}

  balanceOf(account: Address, currency: Address): bigint {
    return this.balances.get(currency)?.get(account) ?? 0n;
  }

  /** Sum of every balance owed in a currency. */
  totalOwed(currency: Address): bigint {
    let total = 0n;
    for (const amount of this.balances.get(currency)?.values() ?? []) {
      total += amount;
    }
    return total;
  }

  /** Non-zero balances of one account, by currency. */
  balancesOf(account: Address): Array<{ currency: Address; amount: bigint }> {
    const result: Array<{ currency: Address; amount: bigint }> = [];
    for (const [currency, accounts] of this.balances) {
      const amount = accounts.get(account);
      if (amount) result.push({ currency, amount });
    }
    return result;
  }

  credit(account: Address, currency: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidParameters', 'Credit amount must not be negative');
    }
    if (amount === 0n) return;
    this.write(account, currency, this.balanceOf(account, currency) + amount);
    this.events.record({ type: 'BalanceCredited', account, currency, amount });
  }

  debit(account: Address, currency: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidParameters', 'Debit amount must not be negative');
    }
    if (amount === 0n) return;
    const balance = this.balanceOf(account, currency);
    if (amount > balance) {
      throw new LedgerError(
        'InsufficientFunds',
        `Claimable balance ${balance} is below ${amount}`,
      );
    }
    this.write(account, currency, subtract(balance, amount, 'Claimable balance'));
  }

  /**
   * Pays out the whole balance. The entry is zeroed before the payout; a
   * failed payout surfaces as TransferFailure and the caller rolls the
   * zeroing back with the rest of the operation.
   */
  claim(account: Address, currency: Address): bigint {
    const amount = this.balanceOf(account, currency);
    if (amount === 0n) {
      throw new LedgerError('InsufficientFunds', 'Nothing to claim');
    }
    this.write(account, currency, 0n);
    this.events.record({ type: 'BalanceClaimed', account, currency, amount });
    try {
      this.rails.pay(currency, account, amount);
    } catch (err) {
      throw new LedgerError(
        'TransferFailure',
        `Payout to ${account} failed: ${describeError(err)}`,
        { cause: err },
      );
    }
    return amount;
  }

  snapshot(): ClaimVaultState {
    return structuredClone(this.balances);
  }

  restore(snapshot: ClaimVaultState): void {
    this.balances = structuredClone(snapshot);
  }

  private write(account: Address, currency: Address, amount: bigint): void {
    let accounts = this.balances.get(currency);
    if (!accounts) {
      accounts = new Map();
      this.balances.set(currency, accounts);
    }
    if (amount === 0n) {
      accounts.delete(account);
    } else {
      accounts.set(account, amount);
    }
  }
}
