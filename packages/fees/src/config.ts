/**
 * Transfer tax configuration
 *
 * Tax structure (basis points of the gross transfer amount):
 * - burn: permanently removed from supply
 * - reflect: redistributed to every reflection-included holder
 * - treasury: forwarded to the treasury contract
 *
 * The three components may not sum to more than 10000 bps (100%).
 */

import type { TaxRates } from '@reflex/shared';

export const TAX_CONFIG = {
  /** Basis-point denominator */
  BPS_DENOMINATOR: 10_000,

  /** Defaults used when nothing is configured: a 10% tax */
  DEFAULT_RATES: {
    burnBps: 200, // 2% -> burned
    reflectBps: 500, // 5% -> reflected to holders
    treasuryBps: 300, // 3% -> treasury
  },

  /** A freshly instantiated token charges nothing until rates are set */
  ZERO_RATES: {
    burnBps: 0,
    reflectBps: 0,
    treasuryBps: 0,
  },
} as const satisfies {
  BPS_DENOMINATOR: number;
  DEFAULT_RATES: TaxRates;
  ZERO_RATES: TaxRates;
};

