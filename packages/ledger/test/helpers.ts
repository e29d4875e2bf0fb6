import { ReflectionLedger } from '../src/reflection';
import { emptyLedgerState, type LedgerState } from '../src/state';

export const A = '0x00000000000000000000000000000000000000a1';
export const B = '0x00000000000000000000000000000000000000b2';
export const C = '0x00000000000000000000000000000000000000c3';
export const POOL = '0x00000000000000000000000000000000000000d4';
export const TREASURY = '0x00000000000000000000000000000000000000e5';

export function seeded(balances: Array<[string, bigint]>, excluded: string[] = []): {
  state: LedgerState;
  ledger: ReflectionLedger;
} {
  const state = emptyLedgerState();
  const ledger = new ReflectionLedger(state);
  for (const address of excluded) ledger.setExcluded(address, true);
  for (const [address, amount] of balances) {
    ledger.mint(amount);
    ledger.credit(address, amount);
  }
  return { state, ledger };
}

export type Split = { net: bigint; burn: bigint; reflect: bigint; treasury: bigint };

/** The ledger half of a taxed transfer, in engine order. */
export function applyTransfer(
  ledger: ReflectionLedger,
  from: string,
  to: string,
  gross: bigint,
  split: Split,
  treasury = TREASURY,
): void {
  ledger.debit(from, gross);
  ledger.credit(to, split.net);
  ledger.burn(split.burn);
  ledger.reflect(split.reflect);
  ledger.credit(treasury, split.treasury);
}
