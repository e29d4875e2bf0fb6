/**
 * @reflex/ledger
 *
 * Reflection accounting, exemptions, allowances and the staged-copy journal
 */

export * from './state';
export * from './journal';
export { ExemptionRegistry } from './exemptions';
export { AllowanceBook, NEVER, isExpired } from './allowances';
export type { BlockInfo } from './allowances';
export { ReflectionLedger, INITIAL_REFLECTION_RATE } from './reflection';
export type { LedgerSnapshot } from './reflection';
export { checkLedgerInvariants } from './invariants';
export type { InvariantReport } from './invariants';
export { Host } from './runtime';
export type { CallContext, ContractEvent, ExecutionResult, HostOptions, HostedContract, ReceiveMsg } from './runtime';
