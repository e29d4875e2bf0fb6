import { isAddress } from 'viem';
import { z } from 'zod';

import { MAX_UINT128 } from './math';

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), 'Invalid EVM address')
  .transform((v) => v.toLowerCase());

export const BigIntStringSchema = z
  .string()
  .regex(/^[0-9]+$/, 'Expected an integer string');

/** Decimal string on the wire, bigint in memory, bounded to Uint128. */
export const AmountSchema = BigIntStringSchema.transform((v) => BigInt(v)).refine(
  (v) => v <= MAX_UINT128,
  'Amount exceeds Uint128',
);

export const BpsSchema = z.number().int().min(0).max(10_000);

export const TaxRatesSchema = z.object({
  burnBps: BpsSchema,
  reflectBps: BpsSchema,
  treasuryBps: BpsSchema,
});

export type TaxRates = z.infer<typeof TaxRatesSchema>;

export const FractionSchema = z.object({
  numerator: z.bigint().nonnegative(),
  denominator: z.bigint().positive(),
});

export type Fraction = z.infer<typeof FractionSchema>;

/** `"1/100"` or a bare integer such as `"1"`. */
export const FractionStringSchema = z
  .string()
  .trim()
  .regex(/^[0-9]+(\/[0-9]+)?$/, 'Expected a fraction like "1/100"')
  .transform((v, ctx): Fraction => {
    const [num, den = '1'] = v.split('/');
    const denominator = BigInt(den);
    if (denominator === 0n) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Fraction denominator must be positive' });
      return z.NEVER;
    }
    return { numerator: BigInt(num ?? '0'), denominator };
  });

export const AntiWhaleConfigSchema = z.object({
  maxTransaction: FractionSchema,
  maxWallet: FractionSchema,
});

export type AntiWhaleConfig = z.infer<typeof AntiWhaleConfigSchema>;

export const TaxSplitSchema = z.object({
  gross: BigIntStringSchema,
  net: BigIntStringSchema,
  burn: BigIntStringSchema,
  reflect: BigIntStringSchema,
  treasury: BigIntStringSchema,
  taxed: z.boolean(),
});

export type TaxSplitResponse = z.infer<typeof TaxSplitSchema>;

export const TaxQuoteRequestSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: BigIntStringSchema,
});

export type TaxQuoteRequest = z.infer<typeof TaxQuoteRequestSchema>;

export const LedgerSnapshotSchema = z.object({
  totalSupply: BigIntStringSchema,
  totalReflected: BigIntStringSchema,
  totalExcludedTrue: BigIntStringSchema,
  inTransit: BigIntStringSchema,
  includedSupply: BigIntStringSchema,
  rate: z.string(),
});

export type LedgerSnapshotResponse = z.infer<typeof LedgerSnapshotSchema>;

export const ExemptionSchema = z.object({
  address: z.string(),
  taxExempt: z.boolean(),
  reflectionExcluded: z.boolean(),
});

export type ExemptionResponse = z.infer<typeof ExemptionSchema>;

export const GenesisSchema = z.object({
  admin: AddressSchema,
  minter: AddressSchema.nullable().default(null),
  cap: AmountSchema.nullable().default(null),
  treasury: AddressSchema.nullable().default(null),
  initialBalances: z
    .array(z.object({ address: AddressSchema, amount: AmountSchema }))
    .default([]),
  taxExempt: z.array(AddressSchema).default([]),
  reflectionExcluded: z.array(AddressSchema).default([]),
});

export type Genesis = z.infer<typeof GenesisSchema>;
