import type { Chain } from '../../domain/model/types';

export interface MarketDataPort {
  fetchNativeUsdPrice(chain: Chain): Promise<number>;
}
