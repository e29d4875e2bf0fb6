import {
  arithmeticError,
  checkedAdd,
  checkedSub,
  formatDecimalFromRatio,
  insufficientBalance,
  mulDivCeil,
  mulDivFloor,
} from '@reflex/shared';

import { ExemptionRegistry } from './exemptions';
import type { AccountRecord, Address, LedgerState } from './state';

/** Reflected units per true unit for a fresh (empty) included pool. */
export const INITIAL_REFLECTION_RATE = 10n ** 36n;

export type LedgerSnapshot = {
  totalSupply: bigint;
  totalReflected: bigint;
  totalExcludedTrue: bigint;
  inTransit: bigint;
  /** totalSupply - totalExcludedTrue - inTransit */
  includedSupply: bigint;
  /** Reflected units per true unit, display only */
  rate: string;
};

/**
 * Balance store using reflected units.
 *
 * Included accounts store a reflected balance `r`; their true balance is
 * `floor(r * T / R)` with `R = totalReflected` and
 * `T = totalSupply - totalExcludedTrue - inTransit`. Shrinking `R` relative to
 * `T` raises every included balance at once, which is how the reflect share
 * of a tax reaches all holders without touching their records.
 *
 * Rounding: debits round the reflected delta up, credits round it down. The
 * error always stays in the ledger as unallocated dust. A reflect that would
 * push the rate below one reflected unit per true unit fails with
 * `degenerate_rate`.
 *
 * Operates on whatever state it is given; the token contract hands it a
 * transaction's staged copy.
 */
export class ReflectionLedger {
  readonly exemptions: ExemptionRegistry;

  constructor(private readonly state: LedgerState) {
    this.exemptions = new ExemptionRegistry(state);
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  get inTransit(): bigint {
    return this.state.inTransit;
  }

  /** True units held by included accounts. */
  includedSupply(): bigint {
    const { totalSupply, totalExcludedTrue, inTransit } = this.state;
    const included = totalSupply - totalExcludedTrue - inTransit;
    if (included < 0n) throw arithmeticError('negative_included_supply');
    return included;
  }

  account(address: Address): AccountRecord {
    const record = this.state.accounts.get(address);
    if (record) return record;
    return this.exemptions.isReflectionExcluded(address)
      ? { kind: 'excluded', balance: 0n }
      : { kind: 'included', reflected: 0n };
  }

  isExcluded(address: Address): boolean {
    return this.account(address).kind === 'excluded';
  }

  balanceOf(address: Address): bigint {
    const record = this.account(address);
    if (record.kind === 'excluded') return record.balance;
    return this.toTrue(record.reflected);
  }

  /** Moves `amount` out of the account and into transit. */
  debit(address: Address, amount: bigint): void {
    if (amount === 0n) return;
    const balance = this.balanceOf(address);
    if (balance < amount) throw insufficientBalance(address, balance, amount);

    const record = this.account(address);
    if (record.kind === 'excluded') {
      this.setRecord(address, { kind: 'excluded', balance: record.balance - amount });
      this.state.totalExcludedTrue = checkedSub(this.state.totalExcludedTrue, amount);
    } else {
      // balance >= amount implies ceil(amount * R / T) <= reflected
      const delta = mulDivCeil(amount, this.state.totalReflected, this.includedSupply());
      this.setRecord(address, { kind: 'included', reflected: checkedSub(record.reflected, delta, 'u256') });
      this.state.totalReflected = checkedSub(this.state.totalReflected, delta, 'u256');
    }
    this.state.inTransit = checkedAdd(this.state.inTransit, amount);
  }

  /** Moves `amount` from transit into the account. */
  credit(address: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.takeFromTransit(amount, 'credit');

    const record = this.account(address);
    if (record.kind === 'excluded') {
      this.setRecord(address, { kind: 'excluded', balance: checkedAdd(record.balance, amount) });
      this.state.totalExcludedTrue = checkedAdd(this.state.totalExcludedTrue, amount);
      return;
    }

    // Rate is taken before the credit lands, i.e. with `amount` still in transit.
    const included = this.includedSupply() - amount;
    const reflectedTotal = this.state.totalReflected;
    const delta =
      reflectedTotal === 0n || included <= 0n
        ? checkedAdd(0n, amount * INITIAL_REFLECTION_RATE, 'u256')
        : mulDivFloor(amount, reflectedTotal, included);
    if (delta === 0n) {
      throw arithmeticError('degenerate_rate', { amount: amount.toString(), rate: this.snapshot().rate });
    }

    this.setRecord(address, { kind: 'included', reflected: checkedAdd(record.reflected, delta, 'u256') });
    this.state.totalReflected = checkedAdd(reflectedTotal, delta, 'u256');
  }

  /** Removes `amount` in transit from supply. */
  burn(amount: bigint): void {
    if (amount === 0n) return;
    this.takeFromTransit(amount, 'burn');
    this.state.totalSupply = checkedSub(this.state.totalSupply, amount);
  }

  /**
   * Releases `amount` in transit to the included pool without crediting
   * anyone. Its reflected units were retired from `totalReflected` when the
   * sender was debited, so every included holder's share of the pool grows.
   */
  reflect(amount: bigint): void {
    if (amount === 0n) return;
    this.takeFromTransit(amount, 'reflect');

    // Below one reflected unit per true unit, credits can no longer be represented.
    const included = this.includedSupply();
    if (this.state.totalReflected > 0n && this.state.totalReflected < included) {
      throw arithmeticError('degenerate_rate', {
        amount: amount.toString(),
        totalReflected: this.state.totalReflected.toString(),
        includedSupply: included.toString(),
      });
    }
  }

  /** New supply, placed in transit for a following credit. */
  mint(amount: bigint): void {
    if (amount === 0n) return;
    this.state.totalSupply = checkedAdd(this.state.totalSupply, amount);
    this.state.inTransit = checkedAdd(this.state.inTransit, amount);
  }

  /**
   * Switches an account between reflected and true-balance representation at
   * the current rate. No-op when already in the requested state.
   */
  setExcluded(address: Address, excluded: boolean): void {
    const record = this.account(address);
    this.exemptions.markReflectionExcluded(address, excluded);

    if (excluded && record.kind === 'included') {
      const balance = this.toTrue(record.reflected);
      this.state.totalReflected = checkedSub(this.state.totalReflected, record.reflected, 'u256');
      this.state.totalExcludedTrue = checkedAdd(this.state.totalExcludedTrue, balance);
      this.setRecord(address, { kind: 'excluded', balance });
      return;
    }

    if (!excluded && record.kind === 'excluded') {
      this.state.totalExcludedTrue = checkedSub(this.state.totalExcludedTrue, record.balance);
      this.state.inTransit = checkedAdd(this.state.inTransit, record.balance);
      this.setRecord(address, { kind: 'included', reflected: 0n });
      this.credit(address, record.balance);
    }
  }

  /** Throws unless every debited unit has been credited, burned or reflected. */
  assertSettled(): void {
    if (this.state.inTransit !== 0n) {
      throw arithmeticError('unsettled_transit', { inTransit: this.state.inTransit.toString() });
    }
  }

  snapshot(): LedgerSnapshot {
    const includedSupply = this.includedSupply();
    return {
      totalSupply: this.state.totalSupply,
      totalReflected: this.state.totalReflected,
      totalExcludedTrue: this.state.totalExcludedTrue,
      inTransit: this.state.inTransit,
      includedSupply,
      rate:
        includedSupply === 0n
          ? '0'
          : formatDecimalFromRatio({ numerator: this.state.totalReflected, denominator: includedSupply, decimals: 6 }),
    };
  }

  private toTrue(reflected: bigint): bigint {
    if (reflected === 0n) return 0n;
    if (this.state.totalReflected === 0n) {
      throw arithmeticError('degenerate_reflected_state', { reflected: reflected.toString() });
    }
    return mulDivFloor(reflected, this.includedSupply(), this.state.totalReflected, 'u128');
  }

  private takeFromTransit(amount: bigint, op: string): void {
    if (this.state.inTransit < amount) {
      throw arithmeticError('exceeds_transit', {
        op,
        amount: amount.toString(),
        inTransit: this.state.inTransit.toString(),
      });
    }
    this.state.inTransit -= amount;
  }

  private setRecord(address: Address, record: AccountRecord): void {
    const empty = record.kind === 'included' ? record.reflected === 0n : record.balance === 0n;
    if (empty && !this.exemptions.isReflectionExcluded(address)) {
      this.state.accounts.delete(address);
    } else {
      this.state.accounts.set(address, record);
    }
  }
}
