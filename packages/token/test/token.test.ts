import { describe, expect, it } from 'vitest';

import { Host } from '@reflex/ledger';

import { TaxedToken } from '../src/token';

import { A, ADMIN, B, C, MINTER, SPENDER, TOKEN, TREASURY, deploy, errorOf, genesis, silentLogger } from './helpers';

describe('instantiation', () => {
  it('seeds balances and exemptions', () => {
    const { token } = deploy({ genesis: genesis({ reflectionExcluded: [C] }) });

    expect(token.tokenInfo()).toEqual({ name: 'Reflex', symbol: 'RFX', decimals: 6 });
    expect(token.totalSupply()).toBe(1_000_000n);
    expect(token.balanceOf(A)).toBe(600_000n);
    expect(token.exemption(ADMIN)).toEqual({ taxExempt: true, reflectionExcluded: false });
    expect(token.exemption(TREASURY)).toEqual({ taxExempt: true, reflectionExcluded: true });
    expect(token.exemption(C)).toEqual({ taxExempt: false, reflectionExcluded: true });
    expect(token.config()).toMatchObject({ admin: ADMIN, minter: MINTER, treasury: TREASURY, cap: null });
  });

  it('rejects genesis above the cap', () => {
    const host = new Host({ logger: silentLogger });
    expect(errorOf(() => deploy({ host, genesis: genesis({ cap: 999_999n }) }))?.code).toBe('CAP_EXCEEDED');
  });

  it('runs only once', () => {
    const { host, token } = deploy();
    const msg = {
      name: 'Again',
      symbol: 'AGN',
      decimals: 6,
      taxRates: token.taxRates(),
      antiWhale: token.config().antiWhale,
      genesis: genesis(),
    };
    expect(errorOf(() => host.execute(ADMIN, TOKEN, 'instantiate', (ctx) => token.instantiate(ctx, msg)))?.message).toBe(
      'already_instantiated',
    );
    expect(token.totalSupply()).toBe(1_000_000n);
  });

  it('has no token info before instantiation', () => {
    const token = new TaxedToken({ address: TOKEN, host: new Host() });
    expect(errorOf(() => token.tokenInfo())?.message).toBe('not_instantiated');
  });
});

describe('quotes', () => {
  it('quotes the split a transfer would get', () => {
    const { token } = deploy();
    expect(token.quoteTax(A, C, 1000n)).toEqual({
      gross: 1000n,
      net: 900n,
      burn: 20n,
      reflect: 50n,
      treasury: 30n,
      taxed: true,
    });
    expect(token.quoteTax(ADMIN, C, 1000n)).toMatchObject({ net: 1000n, taxed: false });
  });

  it('snapshots the ledger', () => {
    const { token } = deploy();
    expect(token.ledgerSnapshot()).toEqual({
      totalSupply: 1_000_000n,
      totalReflected: 1_000_000n * 10n ** 36n,
      totalExcludedTrue: 0n,
      inTransit: 0n,
      includedSupply: 1_000_000n,
      rate: (10n ** 36n).toString(),
    });
  });
});

describe('burn and mint', () => {
  it('burns without tax', () => {
    const { host, token } = deploy();
    const { result } = host.execute(A, TOKEN, 'burn', (ctx) => token.burn(ctx, 100n));

    expect(result).toEqual({ type: 'burn', contract: TOKEN, from: A, by: A, amount: 100n });
    expect(token.totalSupply()).toBe(999_900n);
    expect(token.balanceOf(A)).toBe(599_900n);
    expect(token.balanceOf(B)).toBe(400_000n);
  });

  it('burns from an owner through an allowance', () => {
    const { host, token } = deploy();
    host.execute(A, TOKEN, 'increase_allowance', (ctx) => token.increaseAllowance(ctx, B, 50n));
    host.execute(B, TOKEN, 'burn_from', (ctx) => token.burnFrom(ctx, A, 50n));

    expect(token.balanceOf(A)).toBe(599_950n);
    expect(token.allowance(A, B).amount).toBe(0n);
    expect(errorOf(() => host.execute(B, TOKEN, 'burn_from', (ctx) => token.burnFrom(ctx, A, 1n)))?.code).toBe(
      'INSUFFICIENT_ALLOWANCE',
    );
  });

  it('mints for the minter only', () => {
    const { host, token } = deploy();

    const { result } = host.execute(MINTER, TOKEN, 'mint', (ctx) => token.mint(ctx, C, 500n));
    expect(result).toEqual({ type: 'mint', contract: TOKEN, to: C, amount: 500n });
    expect(token.totalSupply()).toBe(1_000_500n);
    expect(token.balanceOf(C)).toBe(500n);

    expect(errorOf(() => host.execute(A, TOKEN, 'mint', (ctx) => token.mint(ctx, A, 1n)))?.code).toBe('UNAUTHORIZED');
  });

  it('enforces the cap', () => {
    const { host, token } = deploy({ genesis: genesis({ cap: 1_000_100n }) });

    expect(errorOf(() => host.execute(MINTER, TOKEN, 'mint', (ctx) => token.mint(ctx, C, 101n)))).toEqual({
      code: 'CAP_EXCEEDED',
      message: 'cap_exceeded',
    });
    host.execute(MINTER, TOKEN, 'mint', (ctx) => token.mint(ctx, C, 100n));
    expect(token.totalSupply()).toBe(1_000_100n);
  });

  it('applies the wallet cap to mints', () => {
    const antiWhale = {
      maxTransaction: { numerator: 1n, denominator: 1_000_000n },
      maxWallet: { numerator: 1n, denominator: 100n },
    };
    const { host, token } = deploy({ antiWhale });

    host.execute(MINTER, TOKEN, 'mint', (ctx) => token.mint(ctx, C, 10_000n));
    // cap is now 1% of 1_010_000
    expect(errorOf(() => host.execute(MINTER, TOKEN, 'mint', (ctx) => token.mint(ctx, C, 101n)))?.message).toBe(
      'max_wallet_exceeded',
    );
  });
});

describe('administration', () => {
  it('restricts every setting to the admin', () => {
    const { host, token } = deploy();
    const calls = [
      () =>
        host.execute(A, TOKEN, 'set_tax_rates', (ctx) =>
          token.setTaxRates(ctx, { burnBps: 0, reflectBps: 0, treasuryBps: 0 }),
        ),
      () => host.execute(A, TOKEN, 'set_tax_exempt', (ctx) => token.setTaxExempt(ctx, A, true)),
      () => host.execute(A, TOKEN, 'set_reflection_excluded', (ctx) => token.setReflectionExcluded(ctx, A, true)),
      () => host.execute(A, TOKEN, 'set_treasury', (ctx) => token.setTreasury(ctx, null)),
      () => host.execute(A, TOKEN, 'transfer_admin', (ctx) => token.transferAdmin(ctx, A)),
    ];
    for (const call of calls) expect(errorOf(call)?.code).toBe('UNAUTHORIZED');
  });

  it('updates and validates tax rates', () => {
    const { host, token } = deploy();

    expect(
      errorOf(() =>
        host.execute(ADMIN, TOKEN, 'set_tax_rates', (ctx) =>
          token.setTaxRates(ctx, { burnBps: 6000, reflectBps: 5000, treasuryBps: 0 }),
        ),
      ),
    ).toEqual({ code: 'INVALID_CONFIG', message: 'tax_rates_exceed_100_percent' });

    const { result } = host.execute(ADMIN, TOKEN, 'set_tax_rates', (ctx) =>
      token.setTaxRates(ctx, { burnBps: 100, reflectBps: 0, treasuryBps: 0 }),
    );
    expect(result).toEqual({ type: 'config', contract: TOKEN, action: 'set_tax_rates' });

    host.execute(A, TOKEN, 'transfer', (ctx) => token.transfer(ctx, C, 1000n));
    expect(token.balanceOf(C)).toBe(990n);
    expect(token.totalSupply()).toBe(999_990n);
  });

  it('excludes and re-includes an account without changing its balance', () => {
    const { host, token } = deploy();
    host.execute(ADMIN, TOKEN, 'exclude', (ctx) => token.setReflectionExcluded(ctx, B, true));
    expect(token.balanceOf(B)).toBe(400_000n);
    expect(token.exemption(B).reflectionExcluded).toBe(true);

    host.execute(A, TOKEN, 'transfer', (ctx) => token.transfer(ctx, C, 1000n));
    expect(token.balanceOf(B)).toBe(400_000n);

    // re-entry converts at a non-integral rate and floors by one unit
    host.execute(ADMIN, TOKEN, 'include', (ctx) => token.setReflectionExcluded(ctx, B, false));
    expect(token.balanceOf(B)).toBe(399_999n);
  });

  it('hands over the admin role', () => {
    const { host, token } = deploy();
    host.execute(ADMIN, TOKEN, 'transfer_admin', (ctx) => token.transferAdmin(ctx, B));
    expect(token.config().admin).toBe(B);
    expect(errorOf(() => host.execute(ADMIN, TOKEN, 'set_tax_exempt', (ctx) => token.setTaxExempt(ctx, C, true)))?.code).toBe(
      'UNAUTHORIZED',
    );
    host.execute(B, TOKEN, 'set_tax_exempt', (ctx) => token.setTaxExempt(ctx, C, true));
    expect(token.exemption(C).taxExempt).toBe(true);
  });

  it('points the token at a new treasury', () => {
    const { host, token } = deploy({ withTreasury: false });
    const { result } = host.execute(ADMIN, TOKEN, 'set_treasury', (ctx) => token.setTreasury(ctx, TREASURY));
    expect(result).toEqual({ type: 'config', contract: TOKEN, action: 'set_treasury', target: TREASURY });
    expect(token.exemption(TREASURY)).toEqual({ taxExempt: true, reflectionExcluded: true });
  });
});

describe('enumeration', () => {
  it('lists accounts in address order, a page at a time', () => {
    const { host, token } = deploy();
    host.execute(A, TOKEN, 'transfer', (ctx) => token.transfer(ctx, C, 1000n));

    expect(token.allAccounts()).toEqual([A, B, C, TREASURY]);
    expect(token.allAccounts({ limit: 2 })).toEqual([A, B]);
    expect(token.allAccounts({ startAfter: B.replace('b2', 'B2'), limit: 2 })).toEqual([C, TREASURY]);
    expect(token.allAccounts({ startAfter: TREASURY })).toEqual([]);
  });

  it('caps the page size', () => {
    const initialBalances = Array.from({ length: 40 }, (_, i) => ({
      address: `0x${(i + 1).toString(16).padStart(40, '0')}`,
      amount: 1_000n,
    }));
    const { token } = deploy({ genesis: genesis({ initialBalances }) });

    expect(token.allAccounts()).toHaveLength(10);
    expect(token.allAccounts({ limit: 100 })).toHaveLength(30);
  });

  it('lists the live allowances an owner granted', () => {
    const { host, token } = deploy();
    host.execute(A, TOKEN, 'approve', (ctx) => token.increaseAllowance(ctx, SPENDER, 100n));
    host.execute(A, TOKEN, 'approve', (ctx) => token.increaseAllowance(ctx, B, 50n));
    host.execute(A, TOKEN, 'approve', (ctx) =>
      token.increaseAllowance(ctx, C, 10n, { kind: 'atHeight', height: 3 }),
    );

    expect(token.allAllowances(A)).toEqual([
      { spender: B, amount: 50n, expires: { kind: 'never' } },
      { spender: C, amount: 10n, expires: { kind: 'atHeight', height: 3 } },
      { spender: SPENDER, amount: 100n, expires: { kind: 'never' } },
    ]);
    expect(token.allAllowances(B)).toEqual([]);

    host.advance(5);
    expect(token.allAllowances(A).map((entry) => entry.spender)).toEqual([B, SPENDER]);
    expect(token.allAllowances(A, { startAfter: B, limit: 1 })).toEqual([
      { spender: SPENDER, amount: 100n, expires: { kind: 'never' } },
    ]);
  });
});
