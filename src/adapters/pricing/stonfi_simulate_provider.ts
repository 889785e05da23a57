import type { PriceProviderPort } from '../../app/ports/price_provider_port';
import type { ProviderQuoteRequest, Quote } from '../../domain/model/types';
import { nowIso } from '../../domain/utils/time';
import type { StonfiClient } from '../ton/stonfi_client';

const SIMULATE_SLIPPAGE_BPS = 100;

export class StonfiSimulateProvider implements PriceProviderPort {
  readonly name = 'STONFI' as const;

  readonly chain = 'TON' as const;

  constructor(
    private readonly client: Pick<StonfiClient, 'simulateSwap'>,
    private readonly ptonAddress: string
  ) {}

  async tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null> {
    const nativeIn = request.direction === 'NATIVE_TO_TOKEN';
    const simulation = await this.client.simulateSwap(
      {
        offerAddress: nativeIn ? this.ptonAddress : request.counterAsset,
        askAddress: nativeIn ? request.counterAsset : this.ptonAddress,
        offerUnits: request.amountInRaw,
        slippageBps: SIMULATE_SLIPPAGE_BPS
      },
      signal
    );

    if (simulation.askUnits <= 0n) {
      return null;
    }

    return {
      outputAmountRaw: simulation.askUnits,
      priceImpactPct: simulation.priceImpactPct,
      source: this.name,
      fetchedAt: nowIso()
    };
  }
}
