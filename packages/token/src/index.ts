/**
 * @reflex/token
 *
 * Taxed reflection token contract and its transfer engine
 */

export { TaxedToken, DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from './token';
export type { TaxedTokenOptions } from './token';
export { executeTransfer, splitFor } from './engine';
export type { TransferRequest, TransferScope } from './engine';
export { deployToken } from './deploy';
export type { DeployOptions, Deployment } from './deploy';
export type * from './types';
