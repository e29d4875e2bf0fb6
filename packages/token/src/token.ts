import type { Logger } from 'pino';

import { validateTaxRates, type TaxSplit } from '@reflex/fees';
import { createWhaleGuard, validateAntiWhaleConfig, type WhaleLimits } from '@reflex/guard';
import {
  AllowanceBook,
  ReflectionLedger,
  Store,
  allowanceKey,
  checkLedgerInvariants,
  cloneLedgerState,
  emptyLedgerState,
  isExpired,
  type Address,
  type AllowanceEntry,
  type CallContext,
  type ExemptionEntry,
  type Expiration,
  type Host,
  type HostedContract,
  type LedgerSnapshot,
  type LedgerState,
} from '@reflex/ledger';
import {
  LedgerError,
  arithmeticError,
  checkedAdd,
  parseAddress,
  unauthorized,
  type AntiWhaleConfig,
  type TaxRates,
} from '@reflex/shared';

import { executeTransfer, splitFor, type TransferRequest } from './engine';
import type {
  AllowanceEvent,
  BurnEvent,
  ConfigEvent,
  InstantiateMsg,
  MintEvent,
  PageOptions,
  SpenderAllowance,
  TokenConfig,
  TokenInfo,
  TransferEvent,
} from './types';

export type TaxedTokenOptions = {
  address: Address;
  host: Host;
  logger?: Logger;
  /** Walk every account after each operation and fail the transaction on a violation. */
  checkInvariants?: boolean;
};

type TokenSettings = TokenConfig & {
  /** null until instantiated */
  info: TokenInfo | null;
};

type Scope = {
  ctx: CallContext;
  state: LedgerState;
  ledger: ReflectionLedger;
  config: TokenSettings;
};

/**
 * Fungible token with a per-transfer tax (burn, reflect to holders, forward
 * to a treasury contract) and anti-whale caps. All writes go through the
 * calling transaction's staged stores; queries read committed state.
 */
export class TaxedToken implements HostedContract {
  readonly address: Address;
  private readonly host: Host;
  private readonly logger: Logger | undefined;
  private readonly checkInvariants: boolean;
  private readonly ledgerStore: Store<LedgerState>;
  private readonly configStore: Store<TokenSettings>;

  constructor(options: TaxedTokenOptions) {
    this.address = parseAddress(options.address);
    this.host = options.host;
    this.logger = options.logger?.child({ contract: this.address });
    this.checkInvariants = options.checkInvariants ?? false;
    this.ledgerStore = new Store(`ledger:${this.address}`, emptyLedgerState(), cloneLedgerState);
    this.configStore = new Store<TokenSettings>(
      `config:${this.address}`,
      {
        info: null,
        admin: this.address,
        minter: null,
        cap: null,
        treasury: null,
        taxRates: { burnBps: 0, reflectBps: 0, treasuryBps: 0 },
        antiWhale: { maxTransaction: { numerator: 1n, denominator: 1n }, maxWallet: { numerator: 1n, denominator: 1n } },
      },
      (c) => ({ ...c }),
    );
  }

  /**
   * Sets up rates, exemptions and initial balances. The admin is tax-exempt
   * from the start; the treasury is tax-exempt and excluded from reflections.
   * Genesis balances skip the tax and the anti-whale caps.
   */
  instantiate(ctx: CallContext, msg: InstantiateMsg): void {
    const scope = this.scope(ctx);
    if (scope.config.info !== null) throw invalidState('already_instantiated');
    const { genesis } = msg;

    scope.config.info = { name: msg.name, symbol: msg.symbol, decimals: msg.decimals };
    scope.config.admin = genesis.admin;
    scope.config.minter = genesis.minter;
    scope.config.cap = genesis.cap;
    scope.config.treasury = genesis.treasury;
    scope.config.taxRates = validateTaxRates(msg.taxRates);
    scope.config.antiWhale = validateAntiWhaleConfig(msg.antiWhale);

    scope.ledger.exemptions.setTaxExempt(genesis.admin, true);
    for (const address of genesis.taxExempt) scope.ledger.exemptions.setTaxExempt(address, true);
    for (const address of genesis.reflectionExcluded) scope.ledger.setExcluded(address, true);
    if (genesis.treasury !== null) this.markTreasury(scope, genesis.treasury);

    for (const { address, amount } of genesis.initialBalances) {
      scope.ledger.mint(amount);
      scope.ledger.credit(address, amount);
    }
    this.assertCap(scope, 0n);
    this.finish(scope);

    this.logger?.info(
      { event: 'instantiate', admin: genesis.admin, supply: scope.state.totalSupply.toString() },
      'Token instantiated',
    );
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  transfer(ctx: CallContext, recipient: Address, amount: bigint): TransferEvent {
    return this.move(ctx, { action: 'transfer', from: ctx.sender, to: parseAddress(recipient), by: ctx.sender, amount });
  }

  /** Transfer to a contract, then notify it with the amount it received. */
  send(ctx: CallContext, contract: Address, amount: bigint, payload: string): TransferEvent {
    const to = parseAddress(contract);
    const event = this.move(ctx, { action: 'send', from: ctx.sender, to, by: ctx.sender, amount });
    this.notify(ctx, to, event, payload);
    return event;
  }

  /** Allowance is debited by the gross amount, the amount the owner approved. */
  transferFrom(ctx: CallContext, owner: Address, recipient: Address, amount: bigint): TransferEvent {
    const from = parseAddress(owner);
    this.spendAllowance(ctx, from, amount);
    return this.move(ctx, { action: 'transfer_from', from, to: parseAddress(recipient), by: ctx.sender, amount });
  }

  sendFrom(ctx: CallContext, owner: Address, contract: Address, amount: bigint, payload: string): TransferEvent {
    const from = parseAddress(owner);
    const to = parseAddress(contract);
    this.spendAllowance(ctx, from, amount);
    const event = this.move(ctx, { action: 'send_from', from, to, by: ctx.sender, amount });
    this.notify(ctx, to, event, payload);
    return event;
  }

  // ---------------------------------------------------------------------------
  // Supply
  // ---------------------------------------------------------------------------

  /** Untaxed burn from the caller's balance. */
  burn(ctx: CallContext, amount: bigint): BurnEvent {
    return this.burnTokens(ctx, ctx.sender, amount);
  }

  burnFrom(ctx: CallContext, owner: Address, amount: bigint): BurnEvent {
    const from = parseAddress(owner);
    this.spendAllowance(ctx, from, amount);
    return this.burnTokens(ctx, from, amount);
  }

  /** Minter only. Respects the cap and the wallet limit; the transaction limit does not apply. */
  mint(ctx: CallContext, recipient: Address, amount: bigint): MintEvent {
    const scope = this.scope(ctx);
    const to = parseAddress(recipient);
    if (scope.config.minter === null || ctx.sender !== scope.config.minter) {
      throw unauthorized('not_minter', { sender: ctx.sender });
    }

    if (amount > 0n) {
      this.assertCap(scope, amount);
      createWhaleGuard(scope.config.antiWhale).check({
        grossAmount: 0n,
        netAmount: amount,
        recipientBalance: scope.ledger.balanceOf(to),
        totalSupply: scope.ledger.totalSupply,
        exempt: scope.ledger.exemptions.isTaxExempt(to),
      });
      scope.ledger.mint(amount);
      scope.ledger.credit(to, amount);
      this.finish(scope);
    }

    const event: MintEvent = { type: 'mint', contract: this.address, to, amount };
    ctx.emit(event);
    return event;
  }

  // ---------------------------------------------------------------------------
  // Allowances
  // ---------------------------------------------------------------------------

  increaseAllowance(ctx: CallContext, spender: Address, amount: bigint, expires?: Expiration): AllowanceEvent {
    const target = parseAddress(spender);
    const entry = this.allowances(ctx).increase(ctx.sender, target, amount, ctx.block, expires);
    return this.emitAllowance(ctx, target, entry);
  }

  decreaseAllowance(ctx: CallContext, spender: Address, amount: bigint, expires?: Expiration): AllowanceEvent {
    const target = parseAddress(spender);
    const entry = this.allowances(ctx).decrease(ctx.sender, target, amount, ctx.block, expires);
    return this.emitAllowance(ctx, target, entry);
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  setTaxRates(ctx: CallContext, rates: TaxRates): ConfigEvent {
    const scope = this.adminScope(ctx);
    scope.config.taxRates = validateTaxRates(rates);
    return this.emitConfig(ctx, 'set_tax_rates');
  }

  setTaxExempt(ctx: CallContext, address: Address, exempt: boolean): ConfigEvent {
    const scope = this.adminScope(ctx);
    const target = parseAddress(address);
    scope.ledger.exemptions.setTaxExempt(target, exempt);
    return this.emitConfig(ctx, 'set_tax_exempt', target);
  }

  setReflectionExcluded(ctx: CallContext, address: Address, excluded: boolean): ConfigEvent {
    const scope = this.adminScope(ctx);
    const target = parseAddress(address);
    scope.ledger.setExcluded(target, excluded);
    this.finish(scope);
    return this.emitConfig(ctx, 'set_reflection_excluded', target);
  }

  setAntiWhale(ctx: CallContext, config: AntiWhaleConfig): ConfigEvent {
    const scope = this.adminScope(ctx);
    scope.config.antiWhale = validateAntiWhaleConfig(config);
    return this.emitConfig(ctx, 'set_anti_whale');
  }

  /** The new treasury becomes tax-exempt and reflection-excluded. */
  setTreasury(ctx: CallContext, treasury: Address | null): ConfigEvent {
    const scope = this.adminScope(ctx);
    const target = treasury === null ? null : parseAddress(treasury);
    scope.config.treasury = target;
    if (target === null) return this.emitConfig(ctx, 'set_treasury');
    this.markTreasury(scope, target);
    this.finish(scope);
    return this.emitConfig(ctx, 'set_treasury', target);
  }

  transferAdmin(ctx: CallContext, admin: Address): ConfigEvent {
    const scope = this.adminScope(ctx);
    const target = parseAddress(admin);
    scope.config.admin = target;
    return this.emitConfig(ctx, 'transfer_admin', target);
  }

  // ---------------------------------------------------------------------------
  // Queries (committed state)
  // ---------------------------------------------------------------------------

  tokenInfo(): TokenInfo {
    const { info } = this.configStore.read();
    if (info === null) throw invalidState('not_instantiated');
    return info;
  }

  balanceOf(address: Address): bigint {
    return this.committedLedger().balanceOf(parseAddress(address));
  }

  totalSupply(): bigint {
    return this.ledgerStore.read().totalSupply;
  }

  allowance(owner: Address, spender: Address): AllowanceEntry {
    return new AllowanceBook(this.ledgerStore.read()).get(parseAddress(owner), parseAddress(spender), this.host.block);
  }

  /** Every account holding a balance record, in address order. */
  allAccounts(options: PageOptions = {}): Address[] {
    return paginate([...this.ledgerStore.read().accounts.keys()], options);
  }

  /** Unexpired allowances granted by `owner`, in spender order. */
  allAllowances(owner: Address, options: PageOptions = {}): SpenderAllowance[] {
    const { allowances } = this.ledgerStore.read();
    const prefix = allowanceKey(parseAddress(owner), '');
    const block = this.host.block;
    const live = new Map<Address, AllowanceEntry>();
    for (const [key, entry] of allowances) {
      if (key.startsWith(prefix) && !isExpired(entry.expires, block)) live.set(key.slice(prefix.length), entry);
    }
    return paginate([...live.keys()], options).flatMap((spender) => {
      const entry = live.get(spender);
      return entry ? [{ spender, ...entry }] : [];
    });
  }

  taxRates(): TaxRates {
    return this.configStore.read().taxRates;
  }

  /** What a transfer of `amount` from `from` to `to` would be split into right now. */
  quoteTax(from: Address, to: Address, amount: bigint): TaxSplit {
    return splitFor(this.committedLedger(), this.configStore.read(), parseAddress(from), parseAddress(to), amount);
  }

  exemption(address: Address): ExemptionEntry {
    return this.committedLedger().exemptions.get(parseAddress(address));
  }

  exemptions(): Array<{ address: Address } & ExemptionEntry> {
    return this.committedLedger().exemptions.entries();
  }

  ledgerSnapshot(): LedgerSnapshot {
    return this.committedLedger().snapshot();
  }

  antiWhaleLimits(): WhaleLimits {
    return createWhaleGuard(this.configStore.read().antiWhale).limits(this.totalSupply());
  }

  config(): TokenConfig {
    const { admin, minter, cap, treasury, taxRates, antiWhale } = this.configStore.read();
    return { admin, minter, cap, treasury, taxRates, antiWhale };
  }

  // ---------------------------------------------------------------------------

  private scope(ctx: CallContext): Scope {
    const state = this.ledgerStore.stage(ctx.tx);
    return { ctx, state, ledger: new ReflectionLedger(state), config: this.configStore.stage(ctx.tx) };
  }

  private adminScope(ctx: CallContext): Scope {
    const scope = this.scope(ctx);
    if (ctx.sender !== scope.config.admin) throw unauthorized('not_admin', { sender: ctx.sender });
    return scope;
  }

  private committedLedger(): ReflectionLedger {
    return new ReflectionLedger(this.ledgerStore.read());
  }

  private allowances(ctx: CallContext): AllowanceBook {
    return new AllowanceBook(this.ledgerStore.stage(ctx.tx));
  }

  private move(ctx: CallContext, request: TransferRequest): TransferEvent {
    const scope = this.scope(ctx);
    const event = executeTransfer(
      { ctx, ledger: scope.ledger, config: scope.config, token: this.address, logger: this.logger },
      request,
    );
    this.finish(scope);
    return event;
  }

  private spendAllowance(ctx: CallContext, owner: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.allowances(ctx).deduct(owner, ctx.sender, amount, ctx.block);
  }

  private notify(ctx: CallContext, contract: Address, event: TransferEvent, payload: string): void {
    if (event.gross === 0n) return;
    const receiver = this.host.contract(contract);
    if (!receiver?.receive) {
      throw new LedgerError({ code: 'INVALID_ADDRESS', message: 'recipient_not_receiver', details: { contract } });
    }
    receiver.receive(this.host.subCall(ctx, contract), { sender: ctx.sender, amount: event.net, payload });
  }

  private burnTokens(ctx: CallContext, from: Address, amount: bigint): BurnEvent {
    if (amount > 0n) {
      const scope = this.scope(ctx);
      scope.ledger.debit(from, amount);
      scope.ledger.burn(amount);
      this.finish(scope);
    }
    const event: BurnEvent = { type: 'burn', contract: this.address, from, by: ctx.sender, amount };
    ctx.emit(event);
    return event;
  }

  private markTreasury(scope: Scope, treasury: Address): void {
    scope.ledger.exemptions.setTaxExempt(treasury, true);
    scope.ledger.setExcluded(treasury, true);
  }

  private assertCap(scope: Scope, extra: bigint): void {
    const { cap } = scope.config;
    if (cap === null) return;
    const next = checkedAdd(scope.ledger.totalSupply, extra);
    if (next > cap) {
      throw new LedgerError({
        code: 'CAP_EXCEEDED',
        message: 'cap_exceeded',
        details: { cap: cap.toString(), supplyAfter: next.toString() },
      });
    }
  }

  /** Every write path ends here before the transaction may commit. */
  private finish(scope: Scope): void {
    scope.ledger.assertSettled();
    if (!this.checkInvariants) return;
    const report = checkLedgerInvariants(scope.state);
    if (!report.ok) throw arithmeticError('invariant_violation', { violations: report.violations.join(',') });
  }

  private emitAllowance(ctx: CallContext, spender: Address, entry: AllowanceEntry): AllowanceEvent {
    const event: AllowanceEvent = {
      type: 'allowance',
      contract: this.address,
      owner: ctx.sender,
      spender,
      amount: entry.amount,
      expires: entry.expires,
    };
    ctx.emit(event);
    return event;
  }

  private emitConfig(ctx: CallContext, action: ConfigEvent['action'], target?: Address): ConfigEvent {
    const event: ConfigEvent =
      target === undefined
        ? { type: 'config', contract: this.address, action }
        : { type: 'config', contract: this.address, action, target };
    ctx.emit(event);
    return event;
  }
}

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 30;

function paginate(addresses: Address[], options: PageOptions): Address[] {
  const limit = Math.min(options.limit ?? DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT);
  const startAfter = options.startAfter === undefined ? null : parseAddress(options.startAfter);
  const sorted = addresses.sort();
  const from = startAfter === null ? 0 : sorted.findIndex((address) => address > startAfter);
  if (from === -1) return [];
  return sorted.slice(from, from + Math.max(limit, 0));
}

function invalidState(message: string): LedgerError {
  return new LedgerError({ code: 'INVALID_CONFIG', message });
}
