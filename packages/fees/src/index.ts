/**
 * @reflex/fees
 *
 * Transfer tax policy: rate validation and the burn / reflect / treasury split
 */

export { TAX_CONFIG } from './config';

export {
  computeSplit,
  validateTaxRates,
  totalTaxBps,
  formatTaxDisplay,
} from './calculator';
export type { TaxSplit } from './calculator';
