import type { PriceProviderPort } from '../../app/ports/price_provider_port';
import { WSOL_MINT } from '../../domain/chains';
import type { ProviderQuoteRequest, Quote } from '../../domain/model/types';
import { nowIso } from '../../domain/utils/time';
import type { JupiterClient } from '../solana/jupiter_client';

// only shapes the route, the quoted outAmount does not depend on it
const QUOTE_SLIPPAGE_BPS = 50;

export class JupiterQuoteProvider implements PriceProviderPort {
  readonly name = 'JUPITER_QUOTE' as const;

  readonly chain = 'SOLANA' as const;

  constructor(private readonly client: Pick<JupiterClient, 'getQuote'>) {}

  async tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null> {
    const nativeIn = request.direction === 'NATIVE_TO_TOKEN';
    const quote = await this.client.getQuote(
      {
        inputMint: nativeIn ? WSOL_MINT : request.counterAsset,
        outputMint: nativeIn ? request.counterAsset : WSOL_MINT,
        amountRaw: request.amountInRaw,
        slippageBps: QUOTE_SLIPPAGE_BPS
      },
      signal
    );

    if (quote.outAmountAtomic <= 0n) {
      return null;
    }

    return {
      outputAmountRaw: quote.outAmountAtomic,
      priceImpactPct: quote.priceImpactPct === null ? null : Math.min(quote.priceImpactPct, 100),
      source: this.name,
      fetchedAt: nowIso()
    };
  }
}
