import { ROYALTY_INTERFACE_ID, type ItemContractGateway } from './item-transfer';
import { isNativeCurrency, type PaymentRails } from './payment-rails';
import type { Transactional } from './transactional';
import type { Address, ItemKind, RoyaltyQuote } from './types';

const ROYALTY_BPS_SCALE = 10_000n;

export interface CollectionConfig {
  kind: ItemKind;
  supportsRoyalties?: boolean;
  royaltyReceiver?: Address;
  royaltyBps?: bigint;
}

interface CollectionState {
  kind: ItemKind;
  supportsRoyalties: boolean;
  royaltyReceiver: Address;
  royaltyBps: bigint;
  /** tokenId → owner → balance (unique items hold a balance of 1) */
  balances: Map<string, Map<Address, bigint>>;
  /** owner → approved operators */
  operators: Map<Address, Set<Address>>;
}

/**
 * In-process item contracts: unique and fungible-quantity collections with
 * operator approvals and a basis-point royalty. Transfers not made by the
 * operator itself need the owner's approval of the operator.
 */
export class SimulatedItemContracts
  implements ItemContractGateway, Transactional<Map<Address, CollectionState>>
{
  private collections = new Map<Address, CollectionState>();

  constructor(private readonly operator: Address) {}

  deployCollection(contract: Address, config: CollectionConfig): void {
    if (this.collections.has(contract)) {
      throw new Error(`Collection ${contract} already exists`);
    }
    this.collections.set(contract, {
      kind: config.kind,
      supportsRoyalties: config.supportsRoyalties ?? true,
      royaltyReceiver: config.royaltyReceiver ?? '',
      royaltyBps: config.royaltyBps ?? 0n,
      balances: new Map(),
      operators: new Map(),
    });
  }

  mint(contract: Address, to: Address, tokenId: string, quantity = 1n): void {
    const collection = this.require(contract);
    const holders = collection.balances.get(tokenId);
    if (collection.kind === 'UNIQUE' && (quantity !== 1n || holders?.size)) {
      throw new Error(`Token ${tokenId} of ${contract} cannot be minted again`);
    }
    this.credit(collection, tokenId, to, quantity);
  }

  setRoyalty(contract: Address, receiver: Address, bps: bigint): void {
    const collection = this.require(contract);
    collection.royaltyReceiver = receiver;
    collection.royaltyBps = bps;
  }

  setApprovalForAll(contract: Address, owner: Address, operator: Address, approved: boolean): void {
    const collection = this.require(contract);
    let operators = collection.operators.get(owner);
    if (!operators) {
      operators = new Set();
      collection.operators.set(owner, operators);
    }
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }
  }

  ownerOf(contract: Address, tokenId: string): Address | null {
    const holders = this.require(contract).balances.get(tokenId);
    for (const [owner, balance] of holders ?? []) {
      if (balance > 0n) return owner;
    }
    return null;
  }

  balanceOf(contract: Address, owner: Address, tokenId: string): bigint {
    return this.require(contract).balances.get(tokenId)?.get(owner) ?? 0n;
  }

  supportsInterface(contract: Address, interfaceId: string): boolean {
    const collection = this.collections.get(contract);
    if (!collection) return false;
    return interfaceId === ROYALTY_INTERFACE_ID && collection.supportsRoyalties;
  }

  royaltyInfo(contract: Address, _tokenId: string, salePrice: bigint): RoyaltyQuote {
    const collection = this.require(contract);
    return {
      receiver: collection.royaltyReceiver,
      amount: (salePrice * collection.royaltyBps) / ROYALTY_BPS_SCALE,
    };
  }

  transferFrom(contract: Address, from: Address, to: Address, tokenId: string): void {
    const collection = this.require(contract);
    if (collection.kind !== 'UNIQUE') {
      throw new Error(`${contract} is not a unique-item collection`);
    }
    if (this.ownerOf(contract, tokenId) !== from) {
      throw new Error(`${from} does not own token ${tokenId}`);
    }
    this.move(collection, from, to, tokenId, 1n);
  }

  safeTransferFrom(
    contract: Address,
    from: Address,
    to: Address,
    tokenId: string,
    quantity: bigint,
  ): void {
    const collection = this.require(contract);
    if (collection.kind !== 'QUANTITY') {
      throw new Error(`${contract} is not a quantity collection`);
    }
    const balance = this.balanceOf(contract, from, tokenId);
    if (balance < quantity) {
      throw new Error(`${from} holds ${balance} of token ${tokenId}, needs ${quantity}`);
    }
    this.move(collection, from, to, tokenId, quantity);
  }

  snapshot(): Map<Address, CollectionState> {
    return structuredClone(this.collections);
  }

  restore(snapshot: Map<Address, CollectionState>): void {
    this.collections = structuredClone(snapshot);
  }

  private require(contract: Address): CollectionState {
    const collection = this.collections.get(contract);
    if (!collection) throw new Error(`No collection at ${contract}`);
    return collection;
  }

  private move(
    collection: CollectionState,
    from: Address,
    to: Address,
    tokenId: string,
    quantity: bigint,
  ): void {
    if (from !== this.operator && !collection.operators.get(from)?.has(this.operator)) {
      throw new Error(`${this.operator} is not approved to move items of ${from}`);
    }
    const holders = collection.balances.get(tokenId);
    const balance = holders?.get(from) ?? 0n;
    if (!holders || balance < quantity) {
      throw new Error(`${from} holds too few of token ${tokenId}`);
    }
    if (balance === quantity) {
      holders.delete(from);
    } else {
      holders.set(from, balance - quantity);
    }
    this.credit(collection, tokenId, to, quantity);
  }

  private credit(collection: CollectionState, tokenId: string, to: Address, quantity: bigint): void {
    let holders = collection.balances.get(tokenId);
    if (!holders) {
      holders = new Map();
      collection.balances.set(tokenId, holders);
    }
    holders.set(to, (holders.get(to) ?? 0n) + quantity);
  }
}

interface RailsState {
  /** currency → account → balance */
  balances: Map<Address, Map<Address, bigint>>;
  /** currency → owner → amount the custody account may pull */
  allowances: Map<Address, Map<Address, bigint>>;
  rejecting: Set<Address>;
}

export type ReceiveHook = (currency: Address, amount: bigint) => void;

/**
 * In-process payment rails: native and token balances, allowances towards
 * the custody account, and optional receive hooks that run when an account
 * is paid (a hook may call back into the marketplace).
 */
export class SimulatedPaymentRails implements PaymentRails, Transactional<RailsState> {
  private state: RailsState = {
    balances: new Map(),
    allowances: new Map(),
    rejecting: new Set(),
  };
  private readonly hooks = new Map<Address, ReceiveHook>();

  constructor(readonly custody: Address) {}

  fund(currency: Address, account: Address, amount: bigint): void {
    this.write(this.state.balances, currency, account, this.balanceOf(currency, account) + amount);
  }

  approve(currency: Address, owner: Address, amount: bigint): void {
    this.write(this.state.allowances, currency, owner, amount);
  }

  allowanceOf(currency: Address, owner: Address): bigint {
    return this.state.allowances.get(currency)?.get(owner) ?? 0n;
  }

  balanceOf(currency: Address, account: Address): bigint {
    return this.state.balances.get(currency)?.get(account) ?? 0n;
  }

  rejectPayments(account: Address, rejecting = true): void {
    if (rejecting) {
      this.state.rejecting.add(account);
    } else {
      this.state.rejecting.delete(account);
    }
  }

  onReceive(account: Address, hook: ReceiveHook | null): void {
    if (hook) {
      this.hooks.set(account, hook);
    } else {
      this.hooks.delete(account);
    }
  }

  collect(currency: Address, payer: Address, amount: bigint, attachedValue: bigint): void {
    if (isNativeCurrency(currency)) {
      if (attachedValue !== amount) {
        throw new Error(`Attached value ${attachedValue} does not match ${amount}`);
      }
    } else {
      const allowance = this.allowanceOf(currency, payer);
      if (allowance < amount) {
        throw new Error(`Allowance ${allowance} of ${payer} is below ${amount}`);
      }
      this.write(this.state.allowances, currency, payer, allowance - amount);
    }
    this.transfer(currency, payer, this.custody, amount);
  }

  pay(currency: Address, recipient: Address, amount: bigint): void {
    if (this.state.rejecting.has(recipient)) {
      throw new Error(`${recipient} rejected the payment`);
    }
    this.transfer(currency, this.custody, recipient, amount);
    this.hooks.get(recipient)?.(currency, amount);
  }

  snapshot(): RailsState {
    return structuredClone(this.state);
  }

  restore(snapshot: RailsState): void {
    this.state = structuredClone(snapshot);
  }

  private transfer(currency: Address, from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(currency, from);
    if (balance < amount) {
      throw new Error(`${from} holds ${balance}, needs ${amount}`);
    }
    this.write(this.state.balances, currency, from, balance - amount);
    this.write(this.state.balances, currency, to, this.balanceOf(currency, to) + amount);
  }

  private write(
    table: Map<Address, Map<Address, bigint>>,
    currency: Address,
    account: Address,
    amount: bigint,
  ): void {
    let accounts = table.get(currency);
    if (!accounts) {
      accounts = new Map();
      table.set(currency, accounts);
    }
    accounts.set(account, amount);
  }
}
