import { LedgerError } from './errors';
import type { EventOutbox, Transactional } from './transactional';
import type { Address, FeeQuote } from './types';

export const DEFAULT_FEE_RATE = 300n;
export const DEFAULT_FEE_SCALE = 10_000n;

export interface FeeConfig {
  recipient: Address;
  rate: bigint;
  scale: bigint;
}

/**
 * Platform fee: floor(gross * rate / scale), paid to the configured recipient.
 */
export class FeePolicy implements Transactional<FeeConfig> {
  private config: FeeConfig;

  constructor(
    private readonly events: EventOutbox,
    recipient: Address,
    rate: bigint = DEFAULT_FEE_RATE,
    scale: bigint = DEFAULT_FEE_SCALE,
  ) {
    assertValidRate(rate, scale);
    this.config = { recipient, rate, scale };
  }

  feeInfo(gross: bigint): FeeQuote {
    if (gross < 0n) {
      throw new LedgerError('InvalidParameters', 'Gross amount must not be negative');
    }
    const { recipient, rate, scale } = this.config;
    return { recipient, amount: (gross * rate) / scale };
  }

  getConfig(): Readonly<FeeConfig> {
    return { ...this.config };
  }

  setFee(rate: bigint, scale: bigint): void {
    assertValidRate(rate, scale);
    if (rate === this.config.rate && scale === this.config.scale) return;
    this.config = { ...this.config, rate, scale };
    this.events.record({ type: 'FeeUpdated', rate, scale });
  }

  setRecipient(recipient: Address): void {
    if (!recipient) {
      throw new LedgerError('InvalidParameters', 'Fee recipient is required');
    }
    if (recipient === this.config.recipient) return;
    this.config = { ...this.config, recipient };
    this.events.record({ type: 'FeeRecipientUpdated', recipient });
  }

  snapshot(): FeeConfig {
    return { ...this.config };
  }

  restore(snapshot: FeeConfig): void {
    this.config = { ...snapshot };
  }
}

// rate <= scale keeps the fee at or below the gross amount
function assertValidRate(rate: bigint, scale: bigint): void {
  if (scale <= 0n) {
    throw new LedgerError('InvalidParameters', 'Fee scale must be positive');
  }
  if (rate < 0n || rate > scale) {
    throw new LedgerError(
      'InvalidParameters',
      `Fee rate must be between 0 and ${scale}`,
    );
  }
}
