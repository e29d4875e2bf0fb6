import type { Logger } from 'pino';

import { computeSplit, type TaxSplit } from '@reflex/fees';
import { createWhaleGuard } from '@reflex/guard';
import type { Address, CallContext, ReflectionLedger } from '@reflex/ledger';
import { LedgerError, insufficientBalance } from '@reflex/shared';

import type { TokenConfig, TransferAction, TransferEvent } from './types';

export type TransferRequest = {
  action: TransferAction;
  from: Address;
  to: Address;
  by: Address;
  amount: bigint;
};

export type TransferScope = {
  ctx: CallContext;
  /** Bound to the transaction's staged ledger state */
  ledger: ReflectionLedger;
  config: TokenConfig;
  token: Address;
  logger?: Logger;
};

export function splitFor(ledger: ReflectionLedger, config: TokenConfig, from: Address, to: Address, amount: bigint): TaxSplit {
  return computeSplit(amount, ledger.exemptions.isTaxExempt(from), ledger.exemptions.isTaxExempt(to), config.taxRates);
}

function forwardFailed(treasury: Address | null, amount: bigint, reason: string, cause?: unknown): LedgerError {
  return new LedgerError({
    code: 'TREASURY_FORWARD_FAILED',
    message: 'treasury_forward_failed',
    details: { treasury, amount: amount.toString(), reason },
    cause,
  });
}

/**
 * One taxed movement: validate, guard, split, apply, forward. Every write
 * lands in the transaction's staged state, so a throw at any step (including
 * inside the treasury sub-call) leaves committed state untouched.
 */
export function executeTransfer(scope: TransferScope, request: TransferRequest): TransferEvent {
  const { ctx, ledger, config } = scope;
  const { from, to, amount } = request;

  if (amount === 0n) {
    return emitTransfer(scope, request, { gross: 0n, net: 0n, burn: 0n, reflect: 0n, treasury: 0n, taxed: false });
  }

  // validate
  const balance = ledger.balanceOf(from);
  if (balance < amount) throw insufficientBalance(from, balance, amount);

  // split (pure) so the guard can see the net amount
  const split = splitFor(ledger, config, from, to, amount);

  // guard, against pre-transfer supply
  createWhaleGuard(config.antiWhale).check({
    grossAmount: amount,
    netAmount: split.net,
    recipientBalance: ledger.balanceOf(to),
    totalSupply: ledger.totalSupply,
    exempt: ledger.exemptions.isTaxExempt(from) || ledger.exemptions.isTaxExempt(to),
  });

  // apply
  ledger.debit(from, amount);
  ledger.credit(to, split.net);
  ledger.burn(split.burn);
  ledger.reflect(split.reflect);

  // forward
  if (split.treasury > 0n) {
    const treasury = config.treasury;
    if (treasury === null) throw forwardFailed(null, split.treasury, 'no_treasury');
    ledger.credit(treasury, split.treasury);

    const port = ctx.host.contract(treasury);
    if (!port?.deposit) throw forwardFailed(treasury, split.treasury, 'not_a_treasury');
    try {
      port.deposit(ctx.host.subCall(ctx, treasury), split.treasury);
    } catch (err) {
      throw forwardFailed(treasury, split.treasury, err instanceof Error ? err.message : 'deposit_failed', err);
    }
  }

  ledger.assertSettled();
  return emitTransfer(scope, request, split);
}

function emitTransfer(scope: TransferScope, request: TransferRequest, split: TaxSplit): TransferEvent {
  const event: TransferEvent = {
    type: 'transfer',
    contract: scope.token,
    action: request.action,
    from: request.from,
    to: request.to,
    by: request.by,
    gross: split.gross,
    net: split.net,
    burn: split.burn,
    reflect: split.reflect,
    treasury: split.treasury,
  };
  scope.ctx.emit(event);
  scope.logger?.debug(
    {
      event: 'transfer',
      txId: scope.ctx.txId,
      action: request.action,
      from: request.from,
      to: request.to,
      gross: split.gross.toString(),
      net: split.net.toString(),
      taxed: split.taxed,
    },
    'Transfer applied',
  );
  return event;
}
