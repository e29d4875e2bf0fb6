export function formatDecimalFromRatio(input: {
  numerator: bigint;
  denominator: bigint;
  decimals: number;
}): string {
  if (input.denominator === 0n) throw new RangeError('denominator must be non-zero');
  const scale = 10n ** BigInt(input.decimals);
  const value = (input.numerator * scale) / input.denominator;
  const intPart = value / scale;
  const fracPart = value % scale;
  const frac = fracPart
    .toString()
    .padStart(input.decimals, '0')
    .replace(/0+$/, '');
  return frac.length === 0 ? intPart.toString() : `${intPart.toString()}.${frac}`;
}

/** Renders an amount of the smallest unit with the token's decimals. */
export function formatTokenAmount(amount: bigint, decimals: number): string {
  return formatDecimalFromRatio({ numerator: amount, denominator: 10n ** BigInt(decimals), decimals });
}

export function formatBps(bps: number): string {
  if (bps === 0) return '0%';
  return `${(bps / 100).toFixed(2)}%`;
}
