import type { EventOutbox, Transactional } from './transactional';
import type { Address } from './types';

export interface EligibilityState {
  listingContracts: Set<Address>;
  currencies: Set<Address>;
  allCurrenciesApproved: boolean;
}

/**
 * Allow-lists of item contracts (and marketplace ledgers) that may list,
 * and of currencies that may settle. Setters are no-ops when nothing changes.
 */
export class EligibilityRegistry implements Transactional<EligibilityState> {
  private state: EligibilityState = {
    listingContracts: new Set(),
    currencies: new Set(),
    allCurrenciesApproved: false,
  };

  constructor(private readonly events: EventOutbox) {}

  isApprovedListingContract(contract: Address): boolean {
    return this.state.listingContracts.has(contract);
  }

  isApprovedCurrency(currency: Address): boolean {
    return this.state.allCurrenciesApproved || this.state.currencies.has(currency);
  }

  areAllCurrenciesApproved(): boolean {
    return this.state.allCurrenciesApproved;
  }

  setListingContractApproval(contract: Address, approved: boolean): void {
    if (this.state.listingContracts.has(contract) === approved) return;
    if (approved) {
      this.state.listingContracts.add(contract);
    } else {
      this.state.listingContracts.delete(contract);
    }
    this.events.record({
      type: 'ListingContractApprovalChanged',
      contract,
      approved,
    });
  }

  setCurrencyApproval(currency: Address, approved: boolean): void {
    if (this.state.currencies.has(currency) === approved) return;
    if (approved) {
      this.state.currencies.add(currency);
    } else {
      this.state.currencies.delete(currency);
    }
    this.events.record({ type: 'CurrencyApprovalChanged', currency, approved });
  }

  /** Irreversible. */
  approveAllCurrencies(): void {
    if (this.state.allCurrenciesApproved) return;
    this.state.allCurrenciesApproved = true;
    this.events.record({ type: 'AllCurrenciesApproved' });
  }

  snapshot(): EligibilityState {
    return structuredClone(this.state);
  }

  restore(snapshot: EligibilityState): void {
    this.state = structuredClone(snapshot);
  }
}
