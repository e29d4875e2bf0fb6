import fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  AddressSchema,
  BigIntStringSchema,
  ExemptionSchema,
  HealthResponseSchema,
  LedgerSnapshotSchema,
  TaxQuoteRequestSchema,
  TaxRatesSchema,
  TaxSplitSchema,
  formatTokenAmount,
  isLedgerError,
  type ExemptionResponse,
  type LedgerErrorCode,
  type LedgerSnapshotResponse,
  type TaxSplitResponse,
} from '@reflex/shared';
import { formatTaxDisplay, totalTaxBps, type TaxSplit } from '@reflex/fees';
import { loadConfig, type AppConfig } from '@reflex/config';

import type { Chain } from './chain';
import { createMetrics, type Metrics } from './obs/metrics';

declare module 'fastify' {
  interface FastifyRequest {
    reflexStart?: bigint;
  }
}

export type CreateServerOptions = {
  logger?: boolean;
  config?: AppConfig;
  chain: Chain;
  metrics?: Metrics;
};

const ErrorSchema = z.object({ message: z.string(), code: z.string().optional() });

const ExpirationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('never') }),
  z.object({ kind: z.literal('atHeight'), height: z.number().int() }),
  z.object({ kind: z.literal('atTime'), time: z.number().int() }),
]);

const PageQuerySchema = z.object({
  startAfter: AddressSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  INSUFFICIENT_BALANCE: 400,
  INSUFFICIENT_ALLOWANCE: 400,
  WHALE_LIMIT_EXCEEDED: 400,
  ARITHMETIC: 400,
  INVALID_CONFIG: 400,
  TREASURY_FORWARD_FAILED: 400,
  UNAUTHORIZED: 403,
  INVALID_ADDRESS: 400,
  CAP_EXCEEDED: 400,
};

function toSplitResponse(split: TaxSplit): TaxSplitResponse {
  return {
    gross: split.gross.toString(),
    net: split.net.toString(),
    burn: split.burn.toString(),
    reflect: split.reflect.toString(),
    treasury: split.treasury.toString(),
    taxed: split.taxed,
  };
}

export function createServer(options: CreateServerOptions): FastifyInstance {
  const config = options.config ?? loadConfig(process.env);
  const { token, treasury } = options.chain;

  const app = fastify({
    logger: options.logger ?? { level: config.logLevel },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const metrics = options.metrics ?? createMetrics({ collectDefault: config.nodeEnv !== 'test' });

  app.addHook('onRequest', async (request, reply) => {
    request.reflexStart = process.hrtime.bigint();
    reply.header('x-request-id', request.id);
    request.log.info({ requestId: request.id, method: request.method, url: request.url }, 'request.start');
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = request.reflexStart;
    const durationMs = start ? Number((process.hrtime.bigint() - start) / 1_000_000n) : null;

    if (config.metrics.enabled && durationMs != null) {
      const route = request.routeOptions.url ?? request.url;
      metrics.httpRequestDurationMs
        .labels({ method: request.method, route, status: String(reply.statusCode) })
        .observe(durationMs);
    }

    request.log.info(
      { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode, durationMs },
      'request.end',
    );
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ message: 'invalid_request', code: 'VALIDATION' });
    }
    if (isLedgerError(error)) {
      return reply.code(STATUS_BY_CODE[error.code]).send({ message: error.message, code: error.code });
    }
    request.log.error({ err: error }, 'request.failed');
    return reply.code(500).send({ message: 'internal_error' });
  });

  const api = app.withTypeProvider<ZodTypeProvider>();

  const counted = <T>(query: string, fn: () => T): T => {
    try {
      const result = fn();
      metrics.queriesTotal.labels({ query, status: 'ok' }).inc();
      return result;
    } catch (err) {
      metrics.queriesTotal.labels({ query, status: 'error' }).inc();
      throw err;
    }
  };

  api.get('/health', { schema: { response: { 200: HealthResponseSchema } } }, async () => {
    return { status: 'ok' } as const;
  });

  if (config.metrics.enabled) {
    api.get('/metrics', async (_request, reply) => {
      reply.header('content-type', metrics.registry.contentType);
      return metrics.registry.metrics();
    });
  }

  api.get(
    '/v1/supply',
    {
      schema: {
        response: {
          200: z.object({
            name: z.string(),
            symbol: z.string(),
            decimals: z.number().int(),
            totalSupply: BigIntStringSchema,
            formatted: z.string(),
          }),
        },
      },
    },
    async () =>
      counted('supply', () => {
        const info = token.tokenInfo();
        const totalSupply = token.totalSupply();
        // Gauges are float64; exact only up to 2^53 smallest units, the response carries the exact value.
        metrics.totalSupply.set(Number(totalSupply));
        return {
          ...info,
          totalSupply: totalSupply.toString(),
          formatted: formatTokenAmount(totalSupply, info.decimals),
        };
      }),
  );

  api.get(
    '/v1/balances/:address',
    {
      schema: {
        params: z.object({ address: AddressSchema }),
        response: {
          200: z.object({ address: z.string(), balance: BigIntStringSchema, formatted: z.string() }),
        },
      },
    },
    async (request) =>
      counted('balance', () => {
        const balance = token.balanceOf(request.params.address);
        return {
          address: request.params.address,
          balance: balance.toString(),
          formatted: formatTokenAmount(balance, token.tokenInfo().decimals),
        };
      }),
  );

  api.get(
    '/v1/accounts',
    {
      schema: {
        querystring: PageQuerySchema,
        response: {
          200: z.object({ accounts: z.array(z.object({ address: z.string(), balance: BigIntStringSchema })) }),
        },
      },
    },
    async (request) =>
      counted('accounts', () => ({
        accounts: token.allAccounts(request.query).map((address) => ({
          address,
          balance: token.balanceOf(address).toString(),
        })),
      })),
  );

  api.get(
    '/v1/allowances/:owner',
    {
      schema: {
        params: z.object({ owner: AddressSchema }),
        querystring: PageQuerySchema,
        response: {
          200: z.object({
            owner: z.string(),
            allowances: z.array(
              z.object({ spender: z.string(), amount: BigIntStringSchema, expires: ExpirationSchema }),
            ),
          }),
        },
      },
    },
    async (request) =>
      counted('all_allowances', () => {
        const { owner } = request.params;
        return {
          owner,
          allowances: token.allAllowances(owner, request.query).map((entry) => ({
            spender: entry.spender,
            amount: entry.amount.toString(),
            expires: entry.expires,
          })),
        };
      }),
  );

  api.get(
    '/v1/allowances/:owner/:spender',
    {
      schema: {
        params: z.object({ owner: AddressSchema, spender: AddressSchema }),
        response: {
          200: z.object({
            owner: z.string(),
            spender: z.string(),
            amount: BigIntStringSchema,
            expires: ExpirationSchema,
          }),
        },
      },
    },
    async (request) =>
      counted('allowance', () => {
        const { owner, spender } = request.params;
        const entry = token.allowance(owner, spender);
        return { owner, spender, amount: entry.amount.toString(), expires: entry.expires };
      }),
  );

  api.get(
    '/v1/tax/rates',
    {
      schema: {
        response: {
          200: TaxRatesSchema.extend({ totalBps: z.number().int(), display: z.string() }),
        },
      },
    },
    async () =>
      counted('tax_rates', () => {
        const rates = token.taxRates();
        const totalBps = totalTaxBps(rates);
        return { ...rates, totalBps, display: formatTaxDisplay(rates) };
      }),
  );

  api.post(
    '/v1/tax/quote',
    {
      schema: {
        body: TaxQuoteRequestSchema,
        response: { 200: TaxSplitSchema, 400: ErrorSchema },
      },
    },
    async (request) =>
      counted('tax_quote', () => {
        const { from, to, amount } = request.body;
        return toSplitResponse(token.quoteTax(from, to, BigInt(amount)));
      }),
  );

  api.get(
    '/v1/exemptions',
    { schema: { response: { 200: z.object({ exemptions: z.array(ExemptionSchema) }) } } },
    async () =>
      counted('exemptions', () => {
        const exemptions: ExemptionResponse[] = token.exemptions();
        return { exemptions };
      }),
  );

  api.get(
    '/v1/exemptions/:address',
    {
      schema: {
        params: z.object({ address: AddressSchema }),
        response: { 200: ExemptionSchema },
      },
    },
    async (request) =>
      counted('exemption', (): ExemptionResponse => ({
        address: request.params.address,
        ...token.exemption(request.params.address),
      })),
  );

  api.get(
    '/v1/ledger',
    { schema: { response: { 200: LedgerSnapshotSchema } } },
    async () =>
      counted('ledger', (): LedgerSnapshotResponse => {
        const snapshot = token.ledgerSnapshot();
        return {
          totalSupply: snapshot.totalSupply.toString(),
          totalReflected: snapshot.totalReflected.toString(),
          totalExcludedTrue: snapshot.totalExcludedTrue.toString(),
          inTransit: snapshot.inTransit.toString(),
          includedSupply: snapshot.includedSupply.toString(),
          rate: snapshot.rate,
        };
      }),
  );

  api.get(
    '/v1/anti-whale',
    {
      schema: {
        response: {
          200: z.object({ maxTransaction: BigIntStringSchema.nullable(), maxWallet: BigIntStringSchema.nullable() }),
        },
      },
    },
    async () =>
      counted('anti_whale', () => {
        const limits = token.antiWhaleLimits();
        return {
          maxTransaction: limits.maxTransaction?.toString() ?? null,
          maxWallet: limits.maxWallet?.toString() ?? null,
        };
      }),
  );

  api.get(
    '/v1/treasury',
    {
      schema: {
        response: {
          200: z.object({
            address: z.string(),
            booked: BigIntStringSchema,
            held: BigIntStringSchema,
            deposits: z.number().int(),
          }),
          404: ErrorSchema,
        },
      },
    },
    async (_request, reply) => {
      if (treasury === null) {
        return reply.code(404).send({ message: 'not_found' });
      }
      return counted('treasury', () => ({
        address: treasury.address,
        booked: treasury.balance().toString(),
        held: token.balanceOf(treasury.address).toString(),
        deposits: treasury.deposits().length,
      }));
    },
  );

  return app;
}
