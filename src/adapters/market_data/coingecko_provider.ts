import type { MarketDataPort } from '../../app/ports/market_data_port';
import { CHAIN_INFO } from '../../domain/chains';
import type { Chain } from '../../domain/model/types';
import { fetchJson, isRecord } from '../http/fetch_json';

export interface CoingeckoProviderOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class CoingeckoProvider implements MarketDataPort {
  private readonly baseUrl: string;

  constructor(private readonly options: CoingeckoProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async fetchNativeUsdPrice(chain: Chain): Promise<number> {
    const { coingeckoId } = CHAIN_INFO[chain];
    const url = new URL(`${this.baseUrl}/simple/price`);
    url.searchParams.set('ids', coingeckoId);
    url.searchParams.set('vs_currencies', 'usd');

    const payload = await fetchJson(url, {
      label: 'CoinGecko simple price',
      timeoutMs: this.options.timeoutMs
    });

    const entry = isRecord(payload) ? payload[coingeckoId] : undefined;
    const usd = isRecord(entry) ? entry.usd : undefined;
    if (typeof usd !== 'number' || !Number.isFinite(usd) || usd <= 0) {
      throw new Error(`CoinGecko returned no USD price for ${coingeckoId}`);
    }

    return usd;
  }
}
