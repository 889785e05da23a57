import { fetchJson, HttpStatusError, isRecord } from '../http/fetch_json';

const DEFAULT_JETTON_DECIMALS = 9;

export interface TonApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface TonApiTransaction {
  hash: string;
  success: boolean;
  exitCode: number | null;
}

export interface TonApiRate {
  priceInTon: number | null;
  priceInUsd: number | null;
}

function readNumeric(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export class TonApiClient {
  private readonly baseUrl: string;

  constructor(private readonly options: TonApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {};
  }

  private get(path: string, label: string, signal?: AbortSignal): Promise<unknown> {
    return fetchJson(`${this.baseUrl}${path}`, {
      label,
      timeoutMs: this.options.timeoutMs,
      headers: this.headers(),
      signal
    });
  }

  async getJettonDecimals(jettonAddress: string): Promise<number> {
    const payload = await this.get(
      `/v2/jettons/${encodeURIComponent(jettonAddress)}`,
      'TonAPI jetton info'
    );
    if (!isRecord(payload) || !isRecord(payload.metadata)) {
      return DEFAULT_JETTON_DECIMALS;
    }

    const decimals = readNumeric(payload.metadata.decimals);
    return decimals !== null && Number.isInteger(decimals) && decimals >= 0
      ? decimals
      : DEFAULT_JETTON_DECIMALS;
  }

  async getJettonBalance(ownerAddress: string, jettonAddress: string): Promise<bigint> {
    let payload: unknown;
    try {
      payload = await this.get(
        `/v2/accounts/${encodeURIComponent(ownerAddress)}/jettons/${encodeURIComponent(jettonAddress)}`,
        'TonAPI jetton balance'
      );
    } catch (error) {
      // no jetton wallet deployed yet
      if (error instanceof HttpStatusError && error.status === 404) {
        return 0n;
      }
      throw error;
    }

    if (!isRecord(payload) || typeof payload.balance !== 'string') {
      throw new Error('TonAPI jetton balance payload is missing balance');
    }

    return BigInt(payload.balance);
  }

  /** Transaction spawned by an inbound message, or null while it is not indexed yet. */
  async findTransactionByMessageHash(messageHash: string): Promise<TonApiTransaction | null> {
    let payload: unknown;
    try {
      payload = await this.get(
        `/v2/blockchain/messages/${encodeURIComponent(messageHash)}/transaction`,
        'TonAPI message lookup'
      );
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        return null;
      }
      throw error;
    }

    if (!isRecord(payload) || typeof payload.success !== 'boolean') {
      throw new Error('TonAPI transaction payload is missing success flag');
    }

    const computePhase = isRecord(payload.compute_phase) ? payload.compute_phase : {};
    const actionPhase = isRecord(payload.action_phase) ? payload.action_phase : {};
    // a message the wallet could not send fails the action phase only
    const actionFailed = actionPhase.success === false;
    return {
      hash: typeof payload.hash === 'string' ? payload.hash : messageHash,
      success: payload.success && !actionFailed,
      exitCode: actionFailed ? readNumeric(actionPhase.result_code) : readNumeric(computePhase.exit_code)
    };
  }

  async getRate(tokenAddress: string, signal?: AbortSignal): Promise<TonApiRate | null> {
    const query = new URLSearchParams({ tokens: tokenAddress, currencies: 'ton,usd' });
    const payload = await this.get(`/v2/rates?${query.toString()}`, 'TonAPI rates', signal);
    if (!isRecord(payload) || !isRecord(payload.rates)) {
      throw new Error('TonAPI rates payload is missing rates');
    }

    // rates may come back keyed by the raw form of the address
    const entries = Object.values(payload.rates);
    const entry = payload.rates[tokenAddress] ?? (entries.length === 1 ? entries[0] : undefined);
    if (!isRecord(entry) || !isRecord(entry.prices)) {
      return null;
    }

    return {
      priceInTon: readNumeric(entry.prices.TON),
      priceInUsd: readNumeric(entry.prices.USD)
    };
  }
}
