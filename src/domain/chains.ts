import type { Chain } from './model/types';

export interface ChainInfo {
  nativeSymbol: string;
  nativeDecimals: number;
  dexscreenerChainId: string;
  coingeckoId: string;
}

export const CHAIN_INFO: Record<Chain, ChainInfo> = {
  SOLANA: {
    nativeSymbol: 'SOL',
    nativeDecimals: 9,
    dexscreenerChainId: 'solana',
    coingeckoId: 'solana'
  },
  TON: {
    nativeSymbol: 'TON',
    nativeDecimals: 9,
    dexscreenerChainId: 'ton',
    coingeckoId: 'the-open-network'
  }
};

export const WSOL_MINT = 'So11111111111111111111111111111111111111112';

// native TON as it appears in Dexscreener pairs
export const TON_NATIVE_ADDRESS = 'EQAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAM9c';
