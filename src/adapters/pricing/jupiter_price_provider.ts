import type { PriceProviderPort } from '../../app/ports/price_provider_port';
import { WSOL_MINT } from '../../domain/chains';
import type { ProviderQuoteRequest, Quote } from '../../domain/model/types';
import { convertWithNativePrice, parseScaledPrice } from '../../domain/utils/amounts';
import { nowIso } from '../../domain/utils/time';
import type { JupiterClient } from '../solana/jupiter_client';

/** Free Jupiter price endpoint, token price in SOL. Carries no liquidity so no impact estimate. */
export class JupiterPriceProvider implements PriceProviderPort {
  readonly name = 'JUPITER_PRICE' as const;

  readonly chain = 'SOLANA' as const;

  constructor(private readonly client: Pick<JupiterClient, 'getPrice'>) {}

  async tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null> {
    const price = await this.client.getPrice(request.counterAsset, WSOL_MINT, signal);
    const nativePerToken = price === null ? null : parseScaledPrice(price);
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
      fetchedAt: nowIso()
    };
  }
}
