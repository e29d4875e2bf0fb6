import { describe, expect, it } from 'vitest';

import { LedgerError } from '@reflex/shared';

import { INITIAL_REFLECTION_RATE, ReflectionLedger } from '../src/reflection';
import { checkLedgerInvariants } from '../src/invariants';
import { emptyLedgerState } from '../src/state';

import { A, B, C, POOL, TREASURY, applyTransfer, seeded } from './helpers';

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof LedgerError ? err.code : 'other';
  }
}

describe('ReflectionLedger', () => {
  it('starts a fresh pool at the initial rate', () => {
    const { state, ledger } = seeded([[A, 600_000n], [B, 400_000n]]);
    expect(state.totalReflected).toBe(1_000_000n * INITIAL_REFLECTION_RATE);
    expect(ledger.balanceOf(A)).toBe(600_000n);
    expect(ledger.balanceOf(B)).toBe(400_000n);
    expect(ledger.balanceOf(C)).toBe(0n);
    expect(ledger.snapshot().rate).toBe(INITIAL_REFLECTION_RATE.toString());
  });

  it('applies the 10% taxed transfer example', () => {
    const { state, ledger } = seeded([[A, 600_000n], [B, 400_000n]], [TREASURY]);

    applyTransfer(ledger, A, C, 1000n, { net: 900n, burn: 20n, reflect: 50n, treasury: 30n });
    ledger.assertSettled();

    expect(state.totalSupply).toBe(999_980n);
    expect(state.totalExcludedTrue).toBe(30n);
    expect(state.totalReflected).toBe(999_900n * INITIAL_REFLECTION_RATE);
    // 599000 * 999950 / 999900 = 599029.95...
    expect(ledger.balanceOf(A)).toBe(599_029n);
    // 400000 * 999950 / 999900 = 400020.002...
    expect(ledger.balanceOf(B)).toBe(400_020n);
    expect(ledger.balanceOf(C)).toBe(900n);
    expect(ledger.balanceOf(TREASURY)).toBe(30n);

    const report = checkLedgerInvariants(state);
    expect(report.violations).toEqual([]);
    expect(report.dust).toBe(1n);
  });

  it('moves value between excluded accounts without touching the rate', () => {
    const { state, ledger } = seeded([[A, 1000n], [B, 500n]], [B, C]);
    const reflectedBefore = state.totalReflected;

    ledger.debit(B, 200n);
    ledger.credit(C, 200n);

    expect(ledger.balanceOf(B)).toBe(300n);
    expect(ledger.balanceOf(C)).toBe(200n);
    expect(state.totalExcludedTrue).toBe(500n);
    expect(state.totalReflected).toBe(reflectedBefore);
    expect(ledger.balanceOf(A)).toBe(1000n);
  });

  it('reflect from an excluded sender goes entirely to included holders', () => {
    const { state, ledger } = seeded([[A, 300n], [B, 100n], [C, 1000n]], [C]);

    ledger.debit(C, 400n);
    ledger.reflect(400n);
    ledger.assertSettled();

    expect(ledger.balanceOf(A)).toBe(600n);
    expect(ledger.balanceOf(B)).toBe(200n);
    expect(ledger.balanceOf(C)).toBe(600n);
    expect(state.totalSupply).toBe(1400n);
    expect(checkLedgerInvariants(state).violations).toEqual([]);
  });

  it('rejects a debit above the balance', () => {
    const { ledger } = seeded([[A, 100n]]);
    expect(codeOf(() => ledger.debit(A, 101n))).toBe('INSUFFICIENT_BALANCE');
    expect(codeOf(() => ledger.debit(B, 1n))).toBe('INSUFFICIENT_BALANCE');
  });

  it('debits a full balance down to zero', () => {
    const { state, ledger } = seeded([[A, 333n], [B, 667n]]);
    ledger.debit(A, 333n);
    ledger.credit(B, 333n);
    expect(ledger.balanceOf(A)).toBe(0n);
    expect(ledger.balanceOf(B)).toBe(1000n);
    expect(state.accounts.has(A)).toBe(false);
  });

  it('refuses to credit, burn or reflect more than is in transit', () => {
    const { ledger } = seeded([[A, 100n]]);
    expect(codeOf(() => ledger.credit(B, 1n))).toBe('ARITHMETIC');
    expect(codeOf(() => ledger.burn(1n))).toBe('ARITHMETIC');
    expect(codeOf(() => ledger.reflect(1n))).toBe('ARITHMETIC');
  });

  it('assertSettled fails while value is in transit', () => {
    const { ledger } = seeded([[A, 100n]]);
    ledger.debit(A, 10n);
    expect(codeOf(() => ledger.assertSettled())).toBe('ARITHMETIC');
    ledger.burn(10n);
    expect(codeOf(() => ledger.assertSettled())).toBeNull();
  });

  it('reports a degenerate reflected state as an arithmetic error', () => {
    const state = emptyLedgerState();
    state.totalSupply = 10n;
    state.accounts.set(A, { kind: 'included', reflected: 5n });
    const ledger = new ReflectionLedger(state);
    expect(codeOf(() => ledger.balanceOf(A))).toBe('ARITHMETIC');
  });

  it('refuses a reflect that drops the rate below one reflected unit per true unit', () => {
    const { ledger } = seeded([[A, 1n], [POOL, 10n ** 38n]], [POOL]);
    ledger.debit(POOL, 5n * 10n ** 36n);
    expect(() => ledger.reflect(5n * 10n ** 36n)).toThrow('degenerate_rate');
  });

  it('refuses a credit that would round to zero reflected units', () => {
    const state = emptyLedgerState();
    state.totalSupply = 10n;
    state.totalReflected = 1n;
    state.accounts.set(A, { kind: 'included', reflected: 1n });
    const ledger = new ReflectionLedger(state);
    expect(ledger.balanceOf(A)).toBe(10n);

    ledger.mint(3n);
    // floor(3 * 1 / 10) = 0
    expect(() => ledger.credit(B, 3n)).toThrow('degenerate_rate');
  });

  it('rejects supply overflow', () => {
    const { ledger } = seeded([[A, (1n << 128n) - 1n]]);
    expect(codeOf(() => ledger.mint(1n))).toBe('ARITHMETIC');
  });

  describe('setExcluded', () => {
    it('converts an included balance to a stored true balance', () => {
      const { state, ledger } = seeded([[A, 600n], [B, 400n]]);
      ledger.setExcluded(B, true);

      expect(state.accounts.get(B)).toEqual({ kind: 'excluded', balance: 400n });
      expect(state.totalExcludedTrue).toBe(400n);
      expect(state.totalReflected).toBe(600n * INITIAL_REFLECTION_RATE);
      expect(ledger.balanceOf(A)).toBe(600n);
      expect(ledger.exemptions.isReflectionExcluded(B)).toBe(true);
    });

    it('converts back at the current rate', () => {
      const { state, ledger } = seeded([[A, 600n], [B, 400n]], [C]);
      ledger.setExcluded(B, true);
      ledger.mint(300n);
      ledger.credit(C, 300n);
      ledger.debit(C, 300n);
      ledger.reflect(300n);
      expect(ledger.balanceOf(A)).toBe(900n);

      ledger.setExcluded(B, false);
      // credit floors the reflected delta at a non-integral rate (600e36 / 900)
      expect(ledger.balanceOf(B)).toBe(399n);
      expect(ledger.balanceOf(A)).toBe(900n);
      expect(state.totalExcludedTrue).toBe(0n);
      expect(checkLedgerInvariants(state).violations).toEqual([]);
    });

    it('is a no-op when already in the requested state', () => {
      const { state, ledger } = seeded([[A, 600n]]);
      ledger.setExcluded(A, false);
      expect(state.accounts.get(A)).toEqual({ kind: 'included', reflected: 600n * INITIAL_REFLECTION_RATE });
    });

    it('excluded accounts do not benefit from reflections', () => {
      const { ledger } = seeded([[A, 500n], [B, 500n]], [B]);
      ledger.debit(A, 100n);
      ledger.reflect(100n);
      expect(ledger.balanceOf(A)).toBe(500n);
      expect(ledger.balanceOf(B)).toBe(500n);
    });
  });
});
