export type LedgerErrorCode =
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'WHALE_LIMIT_EXCEEDED'
  | 'ARITHMETIC'
  | 'INVALID_CONFIG'
  | 'TREASURY_FORWARD_FAILED'
  | 'UNAUTHORIZED'
  | 'INVALID_ADDRESS'
  | 'CAP_EXCEEDED';

export type LedgerErrorDetails = Record<string, string | number | boolean | null>;

/**
 * Every failure that aborts a ledger transaction. Callers see exactly one code;
 * the host discards all staged state when one of these escapes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: LedgerErrorDetails;
  public override readonly cause?: unknown;

  constructor(input: { code: LedgerErrorCode; message: string; details?: LedgerErrorDetails; cause?: unknown }) {
    super(input.message);
    this.name = 'LedgerError';
    this.code = input.code;
    this.details = input.details ?? {};
    this.cause = input.cause;
  }
}

export function insufficientBalance(account: string, balance: bigint, required: bigint): LedgerError {
  return new LedgerError({
    code: 'INSUFFICIENT_BALANCE',
    message: 'insufficient_balance',
    details: { account, balance: balance.toString(), required: required.toString() },
  });
}

export function arithmeticError(message: string, details?: LedgerErrorDetails): LedgerError {
  return new LedgerError({ code: 'ARITHMETIC', message, details });
}

export function invalidConfig(message: string, details?: LedgerErrorDetails): LedgerError {
  return new LedgerError({ code: 'INVALID_CONFIG', message, details });
}

export function unauthorized(message: string, details?: LedgerErrorDetails): LedgerError {
  return new LedgerError({ code: 'UNAUTHORIZED', message, details });
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  if (!(err instanceof LedgerError)) return false;
  return code === undefined || err.code === code;
}

