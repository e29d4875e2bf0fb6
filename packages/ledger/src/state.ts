export type Address = string;

/**
 * An included account holds reflected units and its true balance is derived;
 * an excluded account holds its true balance directly.
 */
export type AccountRecord =
  | { kind: 'included'; reflected: bigint }
  | { kind: 'excluded'; balance: bigint };

export type ExemptionEntry = {
  taxExempt: boolean;
  reflectionExcluded: boolean;
};

export type Expiration =
  | { kind: 'never' }
  | { kind: 'atHeight'; height: number }
  | { kind: 'atTime'; time: number };

export type AllowanceEntry = {
  amount: bigint;
  expires: Expiration;
};

export type LedgerState = {
  totalSupply: bigint;
  /** Sum of reflected balances of included accounts */
  totalReflected: bigint;
  /** Sum of true balances of excluded accounts */
  totalExcludedTrue: bigint;
  /** Debited but not yet credited, burned or reflected; zero outside a transaction */
  inTransit: bigint;
  accounts: Map<Address, AccountRecord>;
  exemptions: Map<Address, ExemptionEntry>;
  /** Keyed by {@link allowanceKey} */
  allowances: Map<string, AllowanceEntry>;
};

export function emptyLedgerState(): LedgerState {
  return {
    totalSupply: 0n,
    totalReflected: 0n,
    totalExcludedTrue: 0n,
    inTransit: 0n,
    accounts: new Map(),
    exemptions: new Map(),
    allowances: new Map(),
  };
}

export function cloneLedgerState(state: LedgerState): LedgerState {
  return {
    totalSupply: state.totalSupply,
    totalReflected: state.totalReflected,
    totalExcludedTrue: state.totalExcludedTrue,
    inTransit: state.inTransit,
    // records are replaced on write, never mutated in place
    accounts: new Map(state.accounts),
    exemptions: new Map(state.exemptions),
    allowances: new Map(state.allowances),
  };
}

export function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}
