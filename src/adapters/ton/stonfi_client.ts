import type { TonClient } from '@ton/ton';
import { DEX, pTON } from '@ston-fi/sdk';
import type { SwapDirection } from '../../domain/model/types';
import { fetchJson, isRecord } from '../http/fetch_json';

export interface StonfiSimulateRequest {
  offerAddress: string;
  askAddress: string;
  offerUnits: bigint;
  slippageBps: number;
}

export interface StonfiSimulation {
  routerAddress: string;
  ptonAddress: string | null;
  askUnits: bigint;
  minAskUnits: bigint;
  priceImpactPct: number | null;
}

export interface StonfiClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class StonfiClient {
  private readonly baseUrl: string;

  constructor(private readonly options: StonfiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async simulateSwap(request: StonfiSimulateRequest, signal?: AbortSignal): Promise<StonfiSimulation> {
    const url = new URL(`${this.baseUrl}/v1/swap/simulate`);
    url.searchParams.set('offer_address', request.offerAddress);
    url.searchParams.set('ask_address', request.askAddress);
    url.searchParams.set('units', request.offerUnits.toString());
    // tolerance is a fraction, 100 bps = 0.01
    url.searchParams.set('slippage_tolerance', String(request.slippageBps / 10_000));
    url.searchParams.set('dex_v2', 'true');

    const payload = await fetchJson(url, {
      label: 'STON.fi simulate',
      timeoutMs: this.options.timeoutMs,
      method: 'POST',
      signal
    });

    if (!isRecord(payload)) {
      throw new Error('STON.fi simulate payload is not an object');
    }

    const { router_address: routerAddress, ask_units: askUnits, min_ask_units: minAskUnits } = payload;
    if (typeof routerAddress !== 'string' || routerAddress === '') {
      throw new Error('Router address not found in STON.fi simulate response');
    }
    if (typeof askUnits !== 'string' || typeof minAskUnits !== 'string') {
      throw new Error('STON.fi simulate payload is missing ask_units/min_ask_units');
    }

    const router = payload.router;
    const ptonAddress =
      isRecord(router) && typeof router.pton_master_address === 'string'
        ? router.pton_master_address
        : null;
    const impact = typeof payload.price_impact === 'string' ? Number(payload.price_impact) : NaN;

    return {
      routerAddress,
      ptonAddress,
      askUnits: BigInt(askUnits),
      minAskUnits: BigInt(minAskUnits),
      priceImpactPct: Number.isFinite(impact) ? Math.min(Math.abs(impact) * 100, 100) : null
    };
  }
}

export interface TonSwapTxRequest {
  direction: SwapDirection;
  routerAddress: string;
  ptonAddress: string;
  walletAddress: string;
  jettonAddress: string;
  offerAmountRaw: bigint;
  minAskAmountRaw: bigint;
}

export interface TonSwapTxParams {
  to: string;
  value: bigint;
  bodyBase64: string | null;
}

export interface TonSwapRouter {
  getSwapTxParams(request: TonSwapTxRequest): Promise<TonSwapTxParams>;
}

/** Builds router messages with the v2.1 STON.fi contracts, reading jetton wallets through the node. */
export class StonfiSdkRouter implements TonSwapRouter {
  constructor(private readonly client: TonClient) {}

  async getSwapTxParams(request: TonSwapTxRequest): Promise<TonSwapTxParams> {
    const router = this.client.open(DEX.v2_1.Router.create(request.routerAddress));
    const proxyTon = pTON.v2_1.create(request.ptonAddress);

    const params =
      request.direction === 'NATIVE_TO_TOKEN'
        ? await router.getSwapTonToJettonTxParams({
            userWalletAddress: request.walletAddress,
            receiverAddress: request.walletAddress,
            refundAddress: request.walletAddress,
            proxyTon,
            offerAmount: request.offerAmountRaw,
            askJettonAddress: request.jettonAddress,
            minAskAmount: request.minAskAmountRaw
          })
        : await router.getSwapJettonToTonTxParams({
            userWalletAddress: request.walletAddress,
            receiverAddress: request.walletAddress,
            refundAddress: request.walletAddress,
            proxyTon,
            offerAmount: request.offerAmountRaw,
            offerJettonAddress: request.jettonAddress,
            minAskAmount: request.minAskAmountRaw
          });

    return {
      to: params.to.toString(),
      value: params.value,
      bodyBase64: params.body ? params.body.toBoc().toString('base64') : null
    };
  }
}
