/**
 * Transfer tax calculator
 *
 * Splits a gross transfer amount into the recipient's net amount and the
 * burn / reflect / treasury components. Pure integer arithmetic.
 */

import { BPS_DENOMINATOR, formatBps, invalidConfig, mulDivFloor, type TaxRates } from '@reflex/shared';

import { TAX_CONFIG } from './config';

export type TaxSplit = {
  /** Amount debited from the sender (what an allowance authorized) */
  gross: bigint;
  /** Amount credited to the recipient */
  net: bigint;
  burn: bigint;
  reflect: bigint;
  /** Includes every truncation remainder */
  treasury: bigint;
  /** False when an exemption (or zero rates) left the transfer untaxed */
  taxed: boolean;
};

export function totalTaxBps(rates: TaxRates): number {
  return rates.burnBps + rates.reflectBps + rates.treasuryBps;
}

/**
 * Throws INVALID_CONFIG if a component is not an integer in [0, 10000] or the
 * components sum to more than 10000.
 */
export function validateTaxRates(rates: TaxRates): TaxRates {
  for (const [key, value] of Object.entries(rates)) {
    if (!Number.isInteger(value) || value < 0 || value > TAX_CONFIG.BPS_DENOMINATOR) {
      throw invalidConfig('tax_rate_out_of_range', { rate: key, bps: value });
    }
  }
  const total = totalTaxBps(rates);
  if (total > TAX_CONFIG.BPS_DENOMINATOR) {
    throw invalidConfig('tax_rates_exceed_100_percent', { totalBps: total });
  }
  return rates;
}

function untaxed(gross: bigint): TaxSplit {
  return { gross, net: gross, burn: 0n, reflect: 0n, treasury: 0n, taxed: false };
}

/**
 * Compute the split of a transfer. Either party being tax-exempt makes the
 * whole transfer untaxed.
 *
 * burn + reflect + treasury + net === gross for every input.
 */
export function computeSplit(
  gross: bigint,
  senderExempt: boolean,
  recipientExempt: boolean,
  rates: TaxRates,
): TaxSplit {
  validateTaxRates(rates);

  if (gross < 0n) throw invalidConfig('negative_amount');
  if (senderExempt || recipientExempt) return untaxed(gross);

  const total = totalTaxBps(rates);
  if (total === 0 || gross === 0n) return untaxed(gross);

  const burn = mulDivFloor(gross, BigInt(rates.burnBps), BPS_DENOMINATOR, 'u128');
  const reflect = mulDivFloor(gross, BigInt(rates.reflectBps), BPS_DENOMINATOR, 'u128');
  const totalTax = mulDivFloor(gross, BigInt(total), BPS_DENOMINATOR, 'u128');

  // floor(a) + floor(b) + floor(c) <= floor(a + b + c): whatever the
  // per-component floors dropped lands in the treasury share.
  const treasury = totalTax - burn - reflect;
  const net = gross - totalTax;

  return { gross, net, burn, reflect, treasury, taxed: true };
}

/**
 * Format a rate for display
 */
export function formatTaxDisplay(rates: TaxRates): string {
  const total = totalTaxBps(rates);
  if (total === 0) return 'No tax';
  return `${formatBps(total)} (burn ${formatBps(rates.burnBps)}, reflect ${formatBps(rates.reflectBps)}, treasury ${formatBps(rates.treasuryBps)})`;
}
