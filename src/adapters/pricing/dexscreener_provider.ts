import { Address } from '@ton/core';
import type { PriceProviderPort } from '../../app/ports/price_provider_port';
import { CHAIN_INFO, TON_NATIVE_ADDRESS, WSOL_MINT } from '../../domain/chains';
import type { Chain, ProviderQuoteRequest, Quote } from '../../domain/model/types';
import {
  convertWithNativePrice,
  estimatePriceImpactPct,
  parseScaledPrice
} from '../../domain/utils/amounts';
import { nowIso } from '../../domain/utils/time';
import { fetchJson, isRecord } from '../http/fetch_json';

export interface DexscreenerProviderOptions {
  baseUrl: string;
  timeoutMs: number;
}

interface DexscreenerPair {
  priceNative: string;
  priceUsd?: number;
  liquidityUsd?: number;
  marketCapUsd?: number;
}

const NATIVE_QUOTE_ADDRESS: Record<Chain, string> = {
  SOLANA: WSOL_MINT,
  TON: TON_NATIVE_ADDRESS
};

function readOptionalNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : undefined;
}

function sameAsset(chain: Chain, left: string, right: string): boolean {
  if (left === right) {
    return true;
  }
  if (chain !== 'TON') {
    return false;
  }

  // bounceable and non-bounceable forms of one jetton master
  try {
    return Address.parse(left).equals(Address.parse(right));
  } catch {
    return false;
  }
}

export class DexscreenerPriceProvider implements PriceProviderPort {
  readonly name = 'DEXSCREENER' as const;

  private readonly baseUrl: string;

  constructor(
    readonly chain: Chain,
    private readonly options: DexscreenerProviderOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private pickPair(payload: unknown, counterAsset: string): DexscreenerPair | null {
    if (!isRecord(payload) || !Array.isArray(payload.pairs)) {
      return null;
    }

    const { dexscreenerChainId, nativeSymbol } = CHAIN_INFO[this.chain];
    let best: DexscreenerPair | null = null;

    for (const pair of payload.pairs) {
      if (!isRecord(pair) || pair.chainId !== dexscreenerChainId) {
        continue;
      }

      const { baseToken, quoteToken } = pair;
      if (!isRecord(baseToken) || !isRecord(quoteToken) || typeof baseToken.address !== 'string') {
        continue;
      }
      if (!sameAsset(this.chain, baseToken.address, counterAsset)) {
        continue;
      }

      const quotedInNative =
        quoteToken.address === NATIVE_QUOTE_ADDRESS[this.chain] ||
        (this.chain === 'TON' && quoteToken.symbol === nativeSymbol);
      if (!quotedInNative || typeof pair.priceNative !== 'string') {
        continue;
      }

      const candidate: DexscreenerPair = {
        priceNative: pair.priceNative,
        priceUsd: readOptionalNumber(pair.priceUsd),
        liquidityUsd: isRecord(pair.liquidity) ? readOptionalNumber(pair.liquidity.usd) : undefined,
        marketCapUsd: readOptionalNumber(pair.marketCap) ?? readOptionalNumber(pair.fdv)
      };

      if (!best || (candidate.liquidityUsd ?? 0) > (best.liquidityUsd ?? 0)) {
        best = candidate;
      }
    }

    return best;
  }

  async tryQuote(request: ProviderQuoteRequest, signal: AbortSignal): Promise<Quote | null> {
    const payload = await fetchJson(
      `${this.baseUrl}/latest/dex/tokens/${encodeURIComponent(request.counterAsset)}`,
      { label: 'Dexscreener tokens', timeoutMs: this.options.timeoutMs, signal }
    );

    const pair = this.pickPair(payload, request.counterAsset);
    if (!pair) {
      return null;
    }

    const nativePerToken = parseScaledPrice(pair.priceNative);
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
      priceImpactPct: this.estimateImpact(request, pair),
      source: this.name,
      fetchedAt: nowIso(),
      market: {
        priceUsd: pair.priceUsd,
        liquidityUsd: pair.liquidityUsd,
        marketCapUsd: pair.marketCapUsd
      }
    };
  }

  private estimateImpact(request: ProviderQuoteRequest, pair: DexscreenerPair): number | null {
    const amount = Number(request.amountHuman);
    const priceNative = Number(pair.priceNative);
    if (pair.priceUsd === undefined || !Number.isFinite(amount) || !(priceNative > 0)) {
      return null;
    }

    const tradeUsd =
      request.direction === 'NATIVE_TO_TOKEN'
        ? amount * (pair.priceUsd / priceNative)
        : amount * pair.priceUsd;

    return estimatePriceImpactPct(tradeUsd, pair.liquidityUsd);
  }
}
