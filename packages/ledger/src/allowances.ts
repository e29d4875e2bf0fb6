import { LedgerError, checkedAdd } from '@reflex/shared';

import { allowanceKey, type Address, type AllowanceEntry, type Expiration, type LedgerState } from './state';

export type BlockInfo = {
  height: number;
  /** Seconds since epoch */
  time: number;
};

export const NEVER: Expiration = { kind: 'never' };

export function isExpired(expires: Expiration, block: BlockInfo): boolean {
  switch (expires.kind) {
    case 'never':
      return false;
    case 'atHeight':
      return block.height >= expires.height;
    case 'atTime':
      return block.time >= expires.time;
  }
}

/** Spender allowances. Only the single debit a transfer_from triggers is core. */
export class AllowanceBook {
  constructor(private readonly state: LedgerState) {}

  /** Current allowance; expired entries count as zero. */
  get(owner: Address, spender: Address, block: BlockInfo): AllowanceEntry {
    const entry = this.state.allowances.get(allowanceKey(owner, spender));
    if (!entry || isExpired(entry.expires, block)) return { amount: 0n, expires: NEVER };
    return entry;
  }

  increase(owner: Address, spender: Address, amount: bigint, block: BlockInfo, expires?: Expiration): AllowanceEntry {
    this.assertNotSelf(owner, spender);
    const current = this.get(owner, spender, block);
    const next: AllowanceEntry = {
      amount: checkedAdd(current.amount, amount),
      expires: expires ?? current.expires,
    };
    this.rejectExpired(next.expires, block);
    this.write(owner, spender, next);
    return next;
  }

  /** Saturates at zero; a zero allowance is removed. */
  decrease(owner: Address, spender: Address, amount: bigint, block: BlockInfo, expires?: Expiration): AllowanceEntry {
    this.assertNotSelf(owner, spender);
    const current = this.get(owner, spender, block);
    const next: AllowanceEntry = {
      amount: current.amount > amount ? current.amount - amount : 0n,
      expires: expires ?? current.expires,
    };
    this.rejectExpired(next.expires, block);
    this.write(owner, spender, next);
    return next;
  }

  /** Debits the gross amount a spender moves on the owner's behalf. */
  deduct(owner: Address, spender: Address, amount: bigint, block: BlockInfo): AllowanceEntry {
    const current = this.get(owner, spender, block);
    if (current.amount < amount) {
      throw new LedgerError({
        code: 'INSUFFICIENT_ALLOWANCE',
        message: 'insufficient_allowance',
        details: { owner, spender, allowance: current.amount.toString(), required: amount.toString() },
      });
    }
    const next: AllowanceEntry = { amount: current.amount - amount, expires: current.expires };
    this.write(owner, spender, next);
    return next;
  }

  private write(owner: Address, spender: Address, entry: AllowanceEntry): void {
    const key = allowanceKey(owner, spender);
    if (entry.amount === 0n) this.state.allowances.delete(key);
    else this.state.allowances.set(key, entry);
  }

  private assertNotSelf(owner: Address, spender: Address): void {
    if (owner === spender) {
      throw new LedgerError({ code: 'INVALID_ADDRESS', message: 'cannot_set_own_allowance', details: { owner } });
    }
  }

  private rejectExpired(expires: Expiration, block: BlockInfo): void {
    if (isExpired(expires, block)) {
      throw new LedgerError({ code: 'INVALID_CONFIG', message: 'expiration_in_past', details: { kind: expires.kind } });
    }
  }
}
