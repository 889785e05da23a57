import { z } from 'zod';

const decimalString = z.string().regex(/^\d+(\.\d{1,9})?$/, 'must be a decimal with at most 9 places');

const solanaProviderSchema = z.enum(['DEXSCREENER', 'JUPITER_PRICE', 'JUPITER_QUOTE']);
const tonProviderSchema = z.enum(['DEXSCREENER', 'TONAPI', 'STONFI']);

const reserveSchema = z
  .object({
    swap: decimalString,
    transfer: decimalString
  })
  .strict();

export const swapConfigSchema = z
  .object({
    quote: z
      .object({
        provider_timeout_ms: z.number().int().positive().default(5_000),
        solana_providers: z
          .array(solanaProviderSchema)
          .min(1)
          .default(['DEXSCREENER', 'JUPITER_PRICE', 'JUPITER_QUOTE']),
        ton_providers: z.array(tonProviderSchema).min(1).default(['DEXSCREENER', 'TONAPI', 'STONFI'])
      })
      .strict()
      .default({}),
    execution: z
      .object({
        max_submission_attempts: z.number().int().positive().default(3),
        rpc_retry_attempts: z.number().int().positive().default(3),
        rpc_retry_backoff_ms: z.number().int().nonnegative().default(500),
        rpc_timeout_ms: z.number().int().positive().default(10_000),
        submit_timeout_ms: z.number().int().positive().default(30_000),
        confirm_timeout_ms: z.number().int().positive().default(30_000),
        confirm_poll_interval_ms: z.number().int().positive().default(2_000),
        lock_ttl_seconds: z.number().int().positive().default(180),
        lock_wait_ms: z.number().int().nonnegative().default(30_000),
        lock_poll_interval_ms: z.number().int().positive().default(250),
        journal_ttl_seconds: z.number().int().positive().default(86_400)
      })
      .strict()
      .default({}),
    reserves: z
      .object({
        solana: reserveSchema.default({ swap: '0.01', transfer: '0.0001' }),
        ton: reserveSchema.default({ swap: '0.05', transfer: '0.003' })
      })
      .strict()
      .default({}),
    solana: z
      .object({
        jupiter_free_url: z.string().url().default('https://lite-api.jup.ag'),
        jupiter_pro_url: z.string().url().default('https://api.jup.ag'),
        priority_fee_lamports: z.number().int().nonnegative().default(100_000)
      })
      .strict()
      .default({}),
    ton: z
      .object({
        tonapi_url: z.string().url().default('https://tonapi.io'),
        stonfi_api_url: z.string().url().default('https://api.ston.fi'),
        pton_address: z.string().min(1).default('EQBnGWMCf3-FZZq1W4IWcWiGAc3PHuZ0_H-7sad2oY00o83S')
      })
      .strict()
      .default({}),
    market: z
      .object({
        dexscreener_url: z.string().url().default('https://api.dexscreener.com'),
        coingecko_url: z.string().url().default('https://api.coingecko.com/api/v3')
      })
      .strict()
      .default({})
  })
  .strict();

export type SwapConfig = z.infer<typeof swapConfigSchema>;
