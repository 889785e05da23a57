import type { Chain, ProviderQuoteRequest, Quote, QuoteSource } from '../../domain/model/types';

export interface PriceProviderPort {
  readonly name: QuoteSource;
  readonly chain: Chain;
  /**
   * Resolves to null when the provider has no usable price for the asset. Transport and
   * payload errors are thrown and treated the same way by the router.
   */
  tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null>;
}
