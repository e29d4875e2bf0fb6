import type { Address, ExemptionEntry, LedgerState } from './state';

const DEFAULT_ENTRY: ExemptionEntry = { taxExempt: false, reflectionExcluded: false };

/**
 * Which accounts skip the transfer tax and which are left out of reflections
 * (liquidity pools, the treasury). Reflection exclusion is only changed via
 * ReflectionLedger.setExcluded so the flag and the account's representation
 * move together.
 */
export class ExemptionRegistry {
  constructor(private readonly state: LedgerState) {}

  get(address: Address): ExemptionEntry {
    return this.state.exemptions.get(address) ?? DEFAULT_ENTRY;
  }

  isTaxExempt(address: Address): boolean {
    return this.get(address).taxExempt;
  }

  isReflectionExcluded(address: Address): boolean {
    return this.get(address).reflectionExcluded;
  }

  setTaxExempt(address: Address, taxExempt: boolean): void {
    this.write(address, { ...this.get(address), taxExempt });
  }

  /** @internal */
  markReflectionExcluded(address: Address, reflectionExcluded: boolean): void {
    this.write(address, { ...this.get(address), reflectionExcluded });
  }

  entries(): Array<{ address: Address } & ExemptionEntry> {
    return [...this.state.exemptions].map(([address, entry]) => ({ address, ...entry }));
  }

  private write(address: Address, entry: ExemptionEntry): void {
    if (!entry.taxExempt && !entry.reflectionExcluded) {
      this.state.exemptions.delete(address);
    } else {
      this.state.exemptions.set(address, entry);
    }
  }
}
