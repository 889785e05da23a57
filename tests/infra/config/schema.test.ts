import { describe, expect, it } from 'vitest';
import { swapConfigSchema } from '../../../src/infra/config/schema';
import { loadSwapConfig, parseSwapConfig } from '../../../src/infra/config/swap_config';

describe('swapConfigSchema', () => {
  it('fills every section with defaults', () => {
    const parsed = swapConfigSchema.parse({});

    expect(parsed.quote.solana_providers).toEqual(['DEXSCREENER', 'JUPITER_PRICE', 'JUPITER_QUOTE']);
    expect(parsed.quote.ton_providers).toEqual(['DEXSCREENER', 'TONAPI', 'STONFI']);
    expect(parsed.execution.max_submission_attempts).toBe(3);
    expect(parsed.reserves.solana).toEqual({ swap: '0.01', transfer: '0.0001' });
    expect(parsed.reserves.ton).toEqual({ swap: '0.05', transfer: '0.003' });
  });

  it('keeps overrides and defaults the rest of a section', () => {
    const parsed = swapConfigSchema.parse({
      execution: { confirm_timeout_ms: 5_000 },
      reserves: { solana: { swap: '0.02', transfer: '0.0002' } }
    });

    expect(parsed.execution.confirm_timeout_ms).toBe(5_000);
    expect(parsed.execution.lock_ttl_seconds).toBe(180);
    expect(parsed.reserves.solana.swap).toBe('0.02');
    expect(parsed.reserves.ton.swap).toBe('0.05');
  });

  it('rejects unknown providers and reserves with too many decimals', () => {
    expect(swapConfigSchema.safeParse({ quote: { ton_providers: ['JUPITER_PRICE'] } }).success).toBe(
      false
    );
    expect(
      swapConfigSchema.safeParse({ reserves: { ton: { swap: '0.0000000001', transfer: '0.003' } } })
        .success
    ).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(swapConfigSchema.safeParse({ execution: { mode: 'PAPER' } }).success).toBe(false);
  });
});

describe('loadSwapConfig', () => {
  it('uses defaults without a path', () => {
    expect(loadSwapConfig().execution.rpc_retry_attempts).toBe(3);
  });

  it('reads the bundled config file', () => {
    const config = loadSwapConfig('config/swap.config.json');

    expect(config.quote.provider_timeout_ms).toBe(5_000);
    expect(config.execution.journal_ttl_seconds).toBe(86_400);
  });

  it('wraps schema errors', () => {
    expect(() => parseSwapConfig({ execution: { max_submission_attempts: 0 } })).toThrowError(
      /swap config schema validation failed/
    );
  });
});
