import { LedgerError, checkedAdd, parseAddress, unauthorized } from '@reflex/shared';
import { Store, type Address, type CallContext, type HostedContract } from '@reflex/ledger';

/** The part of the token contract the treasury calls back into. */
export interface TokenPort {
  readonly address: Address;
  transfer(ctx: CallContext, recipient: Address, amount: bigint): unknown;
}

export type DepositRecord = {
  txId: string;
  height: number;
  amount: bigint;
};

export type TreasuryState = {
  admin: Address;
  deposited: bigint;
  withdrawn: bigint;
  deposits: DepositRecord[];
};

export type TreasuryOptions = {
  address: Address;
  admin: Address;
  token: TokenPort;
};

/**
 * Receives the treasury share of every taxed transfer. The token ledger
 * holds the actual tokens; this contract only books what was forwarded and
 * what the admin has paid out.
 */
export class TreasuryAccount implements HostedContract {
  readonly address: Address;
  private readonly token: TokenPort;
  private readonly store: Store<TreasuryState>;

  constructor(options: TreasuryOptions) {
    this.address = parseAddress(options.address);
    this.token = options.token;
    this.store = new Store<TreasuryState>(
      `treasury:${this.address}`,
      { admin: parseAddress(options.admin), deposited: 0n, withdrawn: 0n, deposits: [] },
      (s) => ({ ...s, deposits: [...s.deposits] }),
    );
  }

  /** Token-only. Zero is a no-op. */
  deposit(ctx: CallContext, amount: bigint): void {
    if (ctx.sender !== this.token.address) {
      throw unauthorized('deposit_from_unknown_token', { sender: ctx.sender });
    }
    if (amount <= 0n) return;

    const state = this.store.stage(ctx.tx);
    state.deposited = checkedAdd(state.deposited, amount);
    state.deposits.push({ txId: ctx.txId, height: ctx.block.height, amount });
    ctx.emit({ type: 'treasury_deposit', contract: this.address, amount, total: state.deposited });
  }

  /** Admin-only payout through the token's transfer, inside the caller's transaction. */
  withdraw(ctx: CallContext, recipient: Address, amount: bigint): void {
    const state = this.store.stage(ctx.tx);
    if (ctx.sender !== state.admin) throw unauthorized('not_treasury_admin', { sender: ctx.sender });
    if (amount === 0n) return;

    const available = state.deposited - state.withdrawn;
    if (amount > available) {
      throw new LedgerError({
        code: 'INSUFFICIENT_BALANCE',
        message: 'insufficient_treasury_balance',
        details: { available: available.toString(), required: amount.toString() },
      });
    }

    const to = parseAddress(recipient);
    state.withdrawn = checkedAdd(state.withdrawn, amount);
    this.token.transfer(ctx.host.subCall(ctx, this.token.address), to, amount);
    ctx.emit({ type: 'treasury_withdraw', contract: this.address, recipient: to, amount });
  }

  setAdmin(ctx: CallContext, admin: Address): void {
    const state = this.store.stage(ctx.tx);
    if (ctx.sender !== state.admin) throw unauthorized('not_treasury_admin', { sender: ctx.sender });
    state.admin = parseAddress(admin);
  }

  balance(): bigint {
    const { deposited, withdrawn } = this.store.read();
    return deposited - withdrawn;
  }

  deposits(): readonly DepositRecord[] {
    return this.store.read().deposits;
  }

  admin(): Address {
    return this.store.read().admin;
  }
}
