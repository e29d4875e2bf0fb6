/**
 * Staged-copy journal.
 *
 * A {@link Store} owns one contract's committed state. A {@link Transaction}
 * stages a private copy of every store it touches; mutations only ever hit
 * the staged copies, and they replace the committed state together on commit.
 * Aborting drops them, so a failure anywhere in the call tree (including a
 * sub-call into another contract) leaves every store as it was.
 */

export type TransactionStatus = 'open' | 'committed' | 'aborted';

export interface Staged {
  readonly name: string;
  commitStaged(tx: Transaction): void;
  discardStaged(tx: Transaction): void;
}

export class Store<S> implements Staged {
  private committed: S;
  private pending: S | null = null;
  private owner: Transaction | null = null;

  constructor(
    public readonly name: string,
    initial: S,
    private readonly clone: (state: S) => S,
  ) {
    this.committed = initial;
  }

  /** Committed state. Queries read this; it must not be mutated. */
  read(): S {
    return this.committed;
  }

  /** The transaction's private copy, created on first access. */
  stage(tx: Transaction): S {
    if (tx.status !== 'open') {
      throw new Error(`transaction ${tx.id} is ${tx.status}`);
    }
    if (this.owner !== null && this.owner !== tx) {
      throw new Error(`store ${this.name} is staged by transaction ${this.owner.id}`);
    }
    if (this.pending === null) {
      this.pending = this.clone(this.committed);
      this.owner = tx;
      tx.enlist(this);
    }
    return this.pending;
  }

  isStaged(): boolean {
    return this.pending !== null;
  }

  commitStaged(tx: Transaction): void {
    if (this.owner !== tx || this.pending === null) return;
    this.committed = this.pending;
    this.pending = null;
    this.owner = null;
  }

  discardStaged(tx: Transaction): void {
    if (this.owner !== tx) return;
    this.pending = null;
    this.owner = null;
  }
}

export class Transaction {
  private readonly enlisted: Staged[] = [];
  private _status: TransactionStatus = 'open';

  constructor(public readonly id: string) {}

  get status(): TransactionStatus {
    return this._status;
  }

  get participants(): string[] {
    return this.enlisted.map((s) => s.name);
  }

  enlist(store: Staged): void {
    if (!this.enlisted.includes(store)) this.enlisted.push(store);
  }

  commit(): void {
    if (this._status !== 'open') throw new Error(`transaction ${this.id} is ${this._status}`);
    for (const store of this.enlisted) store.commitStaged(this);
    this._status = 'committed';
  }

  abort(): void {
    if (this._status !== 'open') return;
    for (const store of this.enlisted) store.discardStaged(this);
    this._status = 'aborted';
  }

  /**
   * Run `fn` inside a fresh transaction: commit if it returns, abort and
   * rethrow if it throws.
   */
  static run<T>(id: string, fn: (tx: Transaction) => T): T {
    const tx = new Transaction(id);
    try {
      const result = fn(tx);
      tx.commit();
      return result;
    } catch (err) {
      tx.abort();
      throw err;
    }
  }
}
