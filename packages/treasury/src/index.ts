export { TreasuryAccount } from './treasury';
export type { DepositRecord, TokenPort, TreasuryOptions, TreasuryState } from './treasury';
