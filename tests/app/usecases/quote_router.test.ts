import { describe, expect, it, vi, type Mock } from 'vitest';
import type { PriceProviderPort } from '../../../src/app/ports/price_provider_port';
import { createQuoteRouter, toProviderRequest } from '../../../src/app/usecases/quote_router';
import { DexscreenerPriceProvider } from '../../../src/adapters/pricing/dexscreener_provider';
import { StonfiSimulateProvider } from '../../../src/adapters/pricing/stonfi_simulate_provider';
import { TonApiRatesProvider } from '../../../src/adapters/pricing/tonapi_rates_provider';
import { StonfiClient } from '../../../src/adapters/ton/stonfi_client';
import { TonApiClient } from '../../../src/adapters/ton/tonapi_client';
import { NoLiquidityDataError } from '../../../src/domain/errors';
import type { Chain, Quote, QuoteRequest, QuoteSource } from '../../../src/domain/model/types';
import { createTestLogger } from '../../support/fakes';

const request: QuoteRequest = {
  chain: 'SOLANA',
  direction: 'NATIVE_TO_TOKEN',
  counterAsset: 'TokenMint',
  amountHuman: '0.5',
  tokenDecimals: 6
};

function fakeProvider(
  name: QuoteSource,
  chain: Chain,
  result: () => Promise<Quote | null>
): PriceProviderPort & { tryQuote: Mock<PriceProviderPort['tryQuote']> } {
  return { name, chain, tryQuote: vi.fn<PriceProviderPort['tryQuote']>(result) };
}

function quoteFrom(source: QuoteSource, outputAmountRaw: bigint): Quote {
  return { outputAmountRaw, priceImpactPct: null, source, fetchedAt: '2026-01-01T00:00:00.000Z' };
}

describe('toProviderRequest', () => {
  it('scales the input with the decimals of the offered asset', () => {
    expect(toProviderRequest(request)).toMatchObject({
      amountInRaw: 500_000_000n,
      inputDecimals: 9,
      outputDecimals: 6
    });
    expect(
      toProviderRequest({ ...request, direction: 'TOKEN_TO_NATIVE', amountHuman: '2.5' })
    ).toMatchObject({ amountInRaw: 2_500_000n, inputDecimals: 6, outputDecimals: 9 });
  });
});

describe('createQuoteRouter', () => {
  it('returns the first usable quote in priority order', async () => {
    const first = fakeProvider('DEXSCREENER', 'SOLANA', async () => null);
    const second = fakeProvider('JUPITER_PRICE', 'SOLANA', async () => quoteFrom('JUPITER_PRICE', 1_234n));
    const third = fakeProvider('JUPITER_QUOTE', 'SOLANA', async () => quoteFrom('JUPITER_QUOTE', 9_999n));
    const router = createQuoteRouter({
      providers: [first, second, third],
      logger: createTestLogger(),
      providerTimeoutMs: 1_000
    });

    const quote = await router.quote(request);

    expect(quote.source).toBe('JUPITER_PRICE');
    expect(quote.outputAmountRaw).toBe(1_234n);
    expect(first.tryQuote).toHaveBeenCalledTimes(1);
    expect(third.tryQuote).not.toHaveBeenCalled();
  });

  it('only consults providers of the requested chain', async () => {
    const ton = fakeProvider('TONAPI', 'TON', async () => quoteFrom('TONAPI', 1n));
    const solana = fakeProvider('DEXSCREENER', 'SOLANA', async () => quoteFrom('DEXSCREENER', 42n));
    const router = createQuoteRouter({ providers: [ton, solana], logger: createTestLogger(), providerTimeoutMs: 1_000 });

    await expect(router.quote(request)).resolves.toMatchObject({ source: 'DEXSCREENER' });
    expect(ton.tryQuote).not.toHaveBeenCalled();
  });

  it('gives the same answer for the same market data', async () => {
    const provider = fakeProvider('DEXSCREENER', 'SOLANA', async () => quoteFrom('DEXSCREENER', 777n));
    const router = createQuoteRouter({ providers: [provider], logger: createTestLogger(), providerTimeoutMs: 1_000 });

    const first = await router.quote(request);
    const second = await router.quote(request);

    expect(second.outputAmountRaw).toBe(first.outputAmountRaw);
    expect(provider.tryQuote).toHaveBeenNthCalledWith(1, expect.objectContaining({ amountInRaw: 500_000_000n }), expect.any(AbortSignal));
  });

  it('moves on when a provider hangs past the timeout and aborts it', async () => {
    let hungSignal: AbortSignal | undefined;
    const hanging: PriceProviderPort = {
      name: 'DEXSCREENER',
      chain: 'SOLANA',
      tryQuote: (_request, signal) => {
        hungSignal = signal;
        return new Promise<Quote | null>(() => undefined);
      }
    };
    const fallback = fakeProvider('JUPITER_PRICE', 'SOLANA', async () => quoteFrom('JUPITER_PRICE', 5n));
    const logger = createTestLogger();
    const router = createQuoteRouter({ providers: [hanging, fallback], logger, providerTimeoutMs: 10 });

    await expect(router.quote(request)).resolves.toMatchObject({ source: 'JUPITER_PRICE' });
    expect(hungSignal?.aborted).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('quote provider failed', {
      chain: 'SOLANA',
      provider: 'DEXSCREENER',
      error: 'DEXSCREENER quote timed out after 10ms'
    });
  });

  it('fails with NoLiquidityData when every TON provider answers HTTP 500', async () => {
    const fetchMock = vi.fn(async () => new Response('boom', { status: 500 }));
    vi.stubGlobal('fetch', fetchMock);
    const router = createQuoteRouter({
      providers: [
        new DexscreenerPriceProvider('TON', { baseUrl: 'https://dex.example', timeoutMs: 1_000 }),
        new TonApiRatesProvider(new TonApiClient({ baseUrl: 'https://tonapi.example', timeoutMs: 1_000 })),
        new StonfiSimulateProvider(new StonfiClient({ baseUrl: 'https://stonfi.example', timeoutMs: 1_000 }), 'pton')
      ],
      logger: createTestLogger(),
      providerTimeoutMs: 1_000
    });

    const error = await router
      .quote({ ...request, chain: 'TON', counterAsset: 'EQjetton', tokenDecimals: 9 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NoLiquidityDataError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(error instanceof NoLiquidityDataError ? error.failures : []).toEqual([
      { provider: 'DEXSCREENER', reason: 'Dexscreener tokens failed: HTTP 500 boom' },
      { provider: 'TONAPI', reason: 'TonAPI rates failed: HTTP 500 boom' },
      { provider: 'STONFI', reason: 'STON.fi simulate failed: HTTP 500 boom' }
    ]);
  });
});
