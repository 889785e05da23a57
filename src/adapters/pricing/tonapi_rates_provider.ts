import type { PriceProviderPort } from '../../app/ports/price_provider_port';
import type { ProviderQuoteRequest, Quote } from '../../domain/model/types';
import { convertWithNativePrice, parseScaledPrice } from '../../domain/utils/amounts';
import { nowIso } from '../../domain/utils/time';
import type { TonApiClient } from '../ton/tonapi_client';

export class TonApiRatesProvider implements PriceProviderPort {
  readonly name = 'TONAPI' as const;

  readonly chain = 'TON' as const;

  constructor(private readonly client: Pick<TonApiClient, 'getRate'>) {}

  async tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null> {
    const rate = await this.client.getRate(request.counterAsset, signal);
    if (!rate || rate.priceInTon === null) {
      return null;
    }

    const nativePerToken = parseScaledPrice(rate.priceInTon);
    if (nativePerToken === null) {
      return null;
    }

    const outputAmountRaw = convertWithNativePrice(
      request.direction,
      request.amountInRaw,
      request.inputDecimals,
      request.outputDecimals,
      nativePerToken
    );
    if (outputAmountRaw <= 0n) {
      return null;
    }

    return {
      outputAmountRaw,
      priceImpactPct: null,
      source: this.name,
      fetchedAt: nowIso(),
      market: rate.priceInUsd === null ? undefined : { priceUsd: rate.priceInUsd }
    };
  }
}
