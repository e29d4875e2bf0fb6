import { MAX_UINT128, MAX_UINT256 } from '@reflex/shared';

import { ReflectionLedger } from './reflection';
import type { LedgerState } from './state';

export type InvariantReport = {
  ok: boolean;
  violations: string[];
  /** Sum of derived included balances */
  includedBalances: bigint;
  /** Supply not attributed to any account by floor division */
  dust: bigint;
  includedHolders: number;
};

/**
 * Walks every account. O(n): for tests and diagnostics, never on the
 * transfer path.
 */
export function checkLedgerInvariants(state: LedgerState): InvariantReport {
  const violations: string[] = [];
  const ledger = new ReflectionLedger(state);

  let reflectedSum = 0n;
  let excludedSum = 0n;
  let includedBalances = 0n;
  let includedHolders = 0;

  for (const [address, record] of state.accounts) {
    if (record.kind === 'included') {
      if (record.reflected < 0n || record.reflected > MAX_UINT256) violations.push(`reflected_out_of_range:${address}`);
      if (ledger.exemptions.isReflectionExcluded(address)) violations.push(`representation_mismatch:${address}`);
      reflectedSum += record.reflected;
      if (record.reflected > 0n) {
        includedHolders += 1;
        includedBalances += ledger.balanceOf(address);
      }
    } else {
      if (record.balance < 0n || record.balance > MAX_UINT128) violations.push(`balance_out_of_range:${address}`);
      if (!ledger.exemptions.isReflectionExcluded(address)) violations.push(`representation_mismatch:${address}`);
      excludedSum += record.balance;
    }
  }

  if (state.inTransit !== 0n) violations.push('unsettled_transit');
  if (reflectedSum !== state.totalReflected) violations.push('total_reflected_mismatch');
  if (excludedSum !== state.totalExcludedTrue) violations.push('total_excluded_mismatch');
  if (state.totalSupply < 0n || state.totalSupply > MAX_UINT128) violations.push('total_supply_out_of_range');

  const dust = state.totalSupply - state.totalExcludedTrue - includedBalances;
  if (dust < 0n) violations.push('balances_exceed_supply');
  if (includedHolders > 0 && dust >= BigInt(includedHolders)) violations.push('dust_exceeds_rounding_bound');

  return { ok: violations.length === 0, violations, includedBalances, dust, includedHolders };
}
