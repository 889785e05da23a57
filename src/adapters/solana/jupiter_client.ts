import { fetchJson, isRecord } from '../http/fetch_json';

export interface JupiterQuoteRequest {
  inputMint: string;
  outputMint: string;
  amountRaw: bigint;
  slippageBps: number;
}

export interface JupiterQuote {
  raw: Record<string, unknown>;
  inAmountAtomic: bigint;
  outAmountAtomic: bigint;
  priceImpactPct: number | null;
}

export interface JupiterSwapRequest {
  userPublicKey: string;
  quote: JupiterQuote;
  minOutputRaw: bigint;
  priorityFeeLamports: number;
}

export interface JupiterSwapTransaction {
  swapTransaction: string;
  lastValidBlockHeight: number;
  prioritizationFeeLamports: number;
}

export interface JupiterClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class JupiterClient {
  private readonly baseUrl: string;

  constructor(private readonly options: JupiterClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {};
  }

  async getQuote(request: JupiterQuoteRequest, signal?: AbortSignal): Promise<JupiterQuote> {
    const url = new URL(`${this.baseUrl}/swap/v1/quote`);
    url.searchParams.set('inputMint', request.inputMint);
    url.searchParams.set('outputMint', request.outputMint);
    url.searchParams.set('amount', request.amountRaw.toString());
    url.searchParams.set('slippageBps', String(request.slippageBps));
    url.searchParams.set('swapMode', 'ExactIn');

    const payload = await fetchJson(url, {
      label: 'Jupiter quote',
      timeoutMs: this.options.timeoutMs,
      headers: this.headers(),
      signal
    });

    if (!isRecord(payload)) {
      throw new Error('Jupiter quote payload is not an object');
    }

    const { inAmount, outAmount, priceImpactPct } = payload;
    if (typeof inAmount !== 'string' || typeof outAmount !== 'string') {
      throw new Error('Jupiter quote payload is missing inAmount/outAmount');
    }

    const impactFraction = typeof priceImpactPct === 'string' ? Number(priceImpactPct) : NaN;

    return {
      raw: payload,
      inAmountAtomic: BigInt(inAmount),
      outAmountAtomic: BigInt(outAmount),
      // reported as a fraction
      priceImpactPct: Number.isFinite(impactFraction) ? impactFraction * 100 : null
    };
  }

  async getSwapTransaction(request: JupiterSwapRequest): Promise<JupiterSwapTransaction> {
    const body: Record<string, unknown> = {
      userPublicKey: request.userPublicKey,
      quoteResponse: {
        ...request.quote.raw,
        otherAmountThreshold: request.minOutputRaw.toString()
      },
      wrapAndUnwrapSol: true,
      dynamicComputeUnitLimit: true
    };
    if (request.priorityFeeLamports > 0) {
      body.prioritizationFeeLamports = request.priorityFeeLamports;
    }

    const payload = await fetchJson(`${this.baseUrl}/swap/v1/swap`, {
      label: 'Jupiter swap build',
      timeoutMs: this.options.timeoutMs,
      method: 'POST',
      headers: this.headers(),
      body
    });

    if (!isRecord(payload) || typeof payload.swapTransaction !== 'string') {
      throw new Error('Jupiter swap payload is missing swapTransaction');
    }

    return {
      swapTransaction: payload.swapTransaction,
      lastValidBlockHeight:
        typeof payload.lastValidBlockHeight === 'number' ? payload.lastValidBlockHeight : 0,
      prioritizationFeeLamports:
        typeof payload.prioritizationFeeLamports === 'number' ? payload.prioritizationFeeLamports : 0
    };
  }

  /** Price of `mint` denominated in `vsToken`, or null when Jupiter has none. */
  async getPrice(mint: string, vsToken: string, signal?: AbortSignal): Promise<string | null> {
    const url = new URL(`${this.baseUrl}/price/v2`);
    url.searchParams.set('ids', mint);
    url.searchParams.set('vsToken', vsToken);

    const payload = await fetchJson(url, {
      label: 'Jupiter price',
      timeoutMs: this.options.timeoutMs,
      headers: this.headers(),
      signal
    });

    if (!isRecord(payload) || !isRecord(payload.data)) {
      throw new Error('Jupiter price payload is missing data');
    }

    const entry = payload.data[mint];
    if (!isRecord(entry)) {
      return null;
    }

    return typeof entry.price === 'string' || typeof entry.price === 'number'
      ? String(entry.price)
      : null;
  }
}
