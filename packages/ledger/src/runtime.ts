import type { Logger } from 'pino';

import { isLedgerError, parseAddress } from '@reflex/shared';
import { deterministicHash } from '@reflex/shared/server';

import type { BlockInfo } from './allowances';
import { Transaction } from './journal';
import type { Address } from './state';

export type ReceiveMsg = {
  /** Whoever triggered the send, not the token contract */
  sender: Address;
  /** Amount the receiving contract actually got, after tax */
  amount: bigint;
  payload: string;
};

/**
 * A contract the host can route sub-calls to. Hooks are optional: a contract
 * without `receive` cannot be the target of a send.
 */
export interface HostedContract {
  readonly address: Address;
  receive?(ctx: CallContext, msg: ReceiveMsg): void;
  deposit?(ctx: CallContext, amount: bigint): void;
}

export type ContractEvent = {
  readonly type: string;
  readonly contract: Address;
  readonly [attribute: string]: unknown;
};

export type CallContext = {
  readonly tx: Transaction;
  readonly txId: string;
  readonly block: BlockInfo;
  /** Caller of this frame; a contract address for sub-calls */
  readonly sender: Address;
  /** Contract executing this frame */
  readonly self: Address;
  readonly host: Host;
  emit(event: ContractEvent): void;
};

export type ExecutionResult<T> = {
  status: 'committed';
  txId: string;
  height: number;
  result: T;
  events: ContractEvent[];
};

export type HostOptions = {
  block?: BlockInfo;
  logger?: Logger;
};

const GENESIS_BLOCK: BlockInfo = { height: 1, time: 1_700_000_000 };

/**
 * Single-threaded execution environment. Each `execute` is one transaction:
 * every store touched anywhere in the call tree commits together or not at
 * all, and events are only returned for committed transactions.
 */
export class Host {
  private readonly contracts = new Map<Address, HostedContract>();
  private readonly logger: Logger | undefined;
  private current: BlockInfo;
  private nonce = 0;

  constructor(options: HostOptions = {}) {
    this.current = options.block ?? GENESIS_BLOCK;
    this.logger = options.logger;
  }

  get block(): BlockInfo {
    return this.current;
  }

  advance(blocks = 1, secondsPerBlock = 5): BlockInfo {
    this.current = {
      height: this.current.height + blocks,
      time: this.current.time + blocks * secondsPerBlock,
    };
    return this.current;
  }

  register<C extends HostedContract>(contract: C): C {
    if (this.contracts.has(contract.address)) {
      throw new Error(`contract already registered at ${contract.address}`);
    }
    this.contracts.set(contract.address, contract);
    return contract;
  }

  contract(address: Address): HostedContract | undefined {
    return this.contracts.get(address);
  }

  /** Sender and contract are lowercased, so mixed-case callers resolve to the same account. */
  execute<T>(caller: Address, target: Address, label: string, fn: (ctx: CallContext) => T): ExecutionResult<T> {
    const sender = parseAddress(caller);
    const contract = parseAddress(target);
    const block = this.current;
    const txId = deterministicHash({ height: block.height, nonce: this.nonce++, sender, contract, label });
    const events: ContractEvent[] = [];

    try {
      const result = Transaction.run(txId, (tx) =>
        fn({
          tx,
          txId,
          block,
          sender,
          self: contract,
          host: this,
          emit: (event) => events.push(event),
        }),
      );
      this.logger?.info({ event: 'tx_committed', txId, label, sender, events: events.length }, 'Transaction committed');
      return { status: 'committed', txId, height: block.height, result, events };
    } catch (err) {
      this.logger?.warn(
        {
          event: 'tx_aborted',
          txId,
          label,
          sender,
          code: isLedgerError(err) ? err.code : 'UNKNOWN',
          reason: err instanceof Error ? err.message : String(err),
        },
        'Transaction aborted',
      );
      throw err;
    }
  }

  /** Frame for a call from the current contract into `target`, same transaction. */
  subCall(ctx: CallContext, target: Address): CallContext {
    return { ...ctx, sender: ctx.self, self: target };
  }
}
