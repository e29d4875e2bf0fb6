import { arithmeticError } from './errors';

/** Upper bound of a true (user-facing) amount. */
export const MAX_UINT128 = (1n << 128n) - 1n;
/** Upper bound of a reflected amount. */
export const MAX_UINT256 = (1n << 256n) - 1n;

export const BPS_DENOMINATOR = 10_000n;

export type Bound = 'u128' | 'u256';

function maxOf(bound: Bound): bigint {
  return bound === 'u128' ? MAX_UINT128 : MAX_UINT256;
}

/** Rejects negative or out-of-range values instead of letting them wrap. */
export function checked(value: bigint, bound: Bound = 'u128', op = 'value'): bigint {
  if (value < 0n) throw arithmeticError('underflow', { op, bound });
  if (value > maxOf(bound)) throw arithmeticError('overflow', { op, bound });
  return value;
}

export function checkedAdd(a: bigint, b: bigint, bound: Bound = 'u128'): bigint {
  return checked(a + b, bound, 'add');
}

export function checkedSub(a: bigint, b: bigint, bound: Bound = 'u128'): bigint {
  return checked(a - b, bound, 'sub');
}

/**
 * floor(a * b / d). The product is kept at full precision so the only range
 * check is on the quotient.
 */
export function mulDivFloor(a: bigint, b: bigint, d: bigint, bound: Bound = 'u256'): bigint {
  if (d === 0n) throw arithmeticError('division_by_zero', { op: 'mulDivFloor' });
  if (a < 0n || b < 0n || d < 0n) throw arithmeticError('negative_operand', { op: 'mulDivFloor' });
  return checked((a * b) / d, bound, 'mulDivFloor');
}

/** ceil(a * b / d), same precision rules as {@link mulDivFloor}. */
export function mulDivCeil(a: bigint, b: bigint, d: bigint, bound: Bound = 'u256'): bigint {
  if (d === 0n) throw arithmeticError('division_by_zero', { op: 'mulDivCeil' });
  if (a < 0n || b < 0n || d < 0n) throw arithmeticError('negative_operand', { op: 'mulDivCeil' });
  const product = a * b;
  const q = product / d;
  return checked(product % d === 0n ? q : q + 1n, bound, 'mulDivCeil');
}
