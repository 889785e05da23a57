import { describe, expect, it, vi } from 'vitest';
import { StonfiClient } from '../../../src/adapters/ton/stonfi_client';
import { TonApiClient } from '../../../src/adapters/ton/tonapi_client';
import { CoingeckoProvider } from '../../../src/adapters/market_data/coingecko_provider';
import { jsonResponse } from '../../support/fakes';

function stubFetch(respond: (url: string) => Response) {
  const fetchMock = vi.fn(async (url: string | URL, _init?: RequestInit) => respond(String(url)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('TonApiClient', () => {
  const client = new TonApiClient({ baseUrl: 'https://tonapi.example', apiKey: 'test-key', timeoutMs: 1_000 });

  it('reads jetton decimals with a bearer token', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ metadata: { decimals: '6' } }));

    await expect(client.getJettonDecimals('jetton')).resolves.toBe(6);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
  });

  it('treats a missing jetton wallet as a zero balance', async () => {
    stubFetch(() => new Response('not found', { status: 404 }));

    await expect(client.getJettonBalance('owner', 'jetton')).resolves.toBe(0n);
  });

  it('reads the jetton balance', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ balance: '123456789' }));

    await expect(client.getJettonBalance('owner', 'jetton')).resolves.toBe(123_456_789n);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://tonapi.example/v2/accounts/owner/jettons/jetton');
  });

  it('resolves a message hash to its transaction', async () => {
    stubFetch(() => jsonResponse({ hash: 'abc', success: false, compute_phase: { exit_code: 7 } }));

    await expect(client.findTransactionByMessageHash('msg')).resolves.toEqual({
      hash: 'abc',
      success: false,
      exitCode: 7
    });
  });

  it('fails a transaction whose action phase could not send the message', async () => {
    stubFetch(() =>
      jsonResponse({
        hash: 'abc',
        success: true,
        compute_phase: { exit_code: 0 },
        action_phase: { success: false, result_code: 37 }
      })
    );

    await expect(client.findTransactionByMessageHash('msg')).resolves.toEqual({
      hash: 'abc',
      success: false,
      exitCode: 37
    });
  });

  it('returns null for a message not indexed yet', async () => {
    stubFetch(() => new Response('', { status: 404 }));

    await expect(client.findTransactionByMessageHash('msg')).resolves.toBeNull();
  });

  it('falls back to the single rate entry when keyed by another address form', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ rates: { '0:abcd': { prices: { TON: 0.5, USD: '1.5' } } } })
    );

    await expect(client.getRate('EQjetton')).resolves.toEqual({ priceInTon: 0.5, priceInUsd: 1.5 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://tonapi.example/v2/rates?tokens=EQjetton&currencies=ton%2Cusd'
    );
  });
});

describe('StonfiClient', () => {
  const client = new StonfiClient({ baseUrl: 'https://stonfi.example', timeoutMs: 1_000 });

  it('simulates with slippage as a fraction', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        router_address: 'router',
        router: { pton_master_address: 'pton' },
        ask_units: '5000',
        min_ask_units: '4950',
        price_impact: '0.0125'
      })
    );

    const simulation = await client.simulateSwap({
      offerAddress: 'offer',
      askAddress: 'ask',
      offerUnits: 1_000n,
      slippageBps: 100
    });

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://stonfi.example/v1/swap/simulate?offer_address=offer&ask_address=ask&units=1000&slippage_tolerance=0.01&dex_v2=true'
    );
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(simulation).toMatchObject({
      routerAddress: 'router',
      ptonAddress: 'pton',
      askUnits: 5_000n,
      minAskUnits: 4_950n
    });
    expect(simulation.priceImpactPct).toBeCloseTo(1.25, 6);
  });

  it('requires a router address', async () => {
    stubFetch(() => jsonResponse({ ask_units: '5000', min_ask_units: '4950' }));

    await expect(
      client.simulateSwap({ offerAddress: 'offer', askAddress: 'ask', offerUnits: 1n, slippageBps: 100 })
    ).rejects.toThrowError('Router address not found in STON.fi simulate response');
  });
});

describe('CoingeckoProvider', () => {
  const provider = new CoingeckoProvider({ baseUrl: 'https://gecko.example/api/v3', timeoutMs: 1_000 });

  it('reads the native USD price by coin id', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ 'the-open-network': { usd: 3.2 } }));

    await expect(provider.fetchNativeUsdPrice('TON')).resolves.toBe(3.2);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://gecko.example/api/v3/simple/price?ids=the-open-network&vs_currencies=usd'
    );
  });

  it('fails without a positive price', async () => {
    stubFetch(() => jsonResponse({}));

    await expect(provider.fetchNativeUsdPrice('SOLANA')).rejects.toThrowError(
      'CoinGecko returned no USD price for solana'
    );
  });
});
