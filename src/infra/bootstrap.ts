import { Connection } from '@solana/web3.js';
import { TonClient } from '@ton/ton';
import { createClient } from 'redis';
import type { ChainRegistry } from '../app/ports/chain_port';
import type { LockPort } from '../app/ports/lock_port';
import type { LoggerPort } from '../app/ports/logger_port';
import type { PriceProviderPort } from '../app/ports/price_provider_port';
import type { SubmissionJournalPort } from '../app/ports/submission_journal_port';
import { createQuoteRouter } from '../app/usecases/quote_router';
import type { ExecutionSettings } from '../app/usecases/submission';
import { createSwapExecutor, type SwapExecutor } from '../app/usecases/swap_executor';
import { getWalletBalance } from '../app/usecases/wallet_balance';
import { withdrawNative } from '../app/usecases/withdraw_native';
import { AesGcmSecretCodec } from '../adapters/crypto/aes_gcm_secret_codec';
import { MemorySubmissionJournal } from '../adapters/journal/memory_submission_journal';
import { RedisSubmissionJournal } from '../adapters/journal/redis_submission_journal';
import { MemoryLockAdapter } from '../adapters/lock/memory_lock';
import { RedisLockAdapter } from '../adapters/lock/redis_lock';
import { CoingeckoProvider } from '../adapters/market_data/coingecko_provider';
import { DexscreenerPriceProvider } from '../adapters/pricing/dexscreener_provider';
import { JupiterPriceProvider } from '../adapters/pricing/jupiter_price_provider';
import { JupiterQuoteProvider } from '../adapters/pricing/jupiter_quote_provider';
import { StonfiSimulateProvider } from '../adapters/pricing/stonfi_simulate_provider';
import { TonApiRatesProvider } from '../adapters/pricing/tonapi_rates_provider';
import { JupiterClient } from '../adapters/solana/jupiter_client';
import { SolanaAdapter } from '../adapters/solana/solana_adapter';
import { StonfiClient, StonfiSdkRouter } from '../adapters/ton/stonfi_client';
import { TonAdapter } from '../adapters/ton/ton_adapter';
import { TonApiClient } from '../adapters/ton/tonapi_client';
import type {
  Chain,
  WalletBalance,
  WithdrawRequest,
  WithdrawResult
} from '../domain/model/types';
import { loadEnv, type Env } from './config/env';
import type { SwapConfig } from './config/schema';
import { loadSwapConfig } from './config/swap_config';
import { createLogger } from './logging/logger';

export interface SwapRuntime {
  executor: SwapExecutor;
  withdraw(request: WithdrawRequest): Promise<WithdrawResult>;
  walletBalance(chain: Chain, address: string): Promise<WalletBalance>;
  stop(): Promise<void>;
}

interface Coordination {
  lock: LockPort;
  journal: SubmissionJournalPort;
  close(): Promise<void>;
}

async function createCoordination(
  env: Env,
  config: SwapConfig,
  logger: LoggerPort
): Promise<Coordination> {
  if (!env.REDIS_URL) {
    logger.warn('REDIS_URL not set, wallet locks and submission journal are process-local');
    return {
      lock: new MemoryLockAdapter(),
      journal: new MemorySubmissionJournal(),
      async close() {}
    };
  }

  const redis = createClient({
    url: env.REDIS_URL
  });

  redis.on('error', (error: unknown) => {
    logger.error('Redis client error', {
      error: error instanceof Error ? error.message : String(error)
    });
  });

  await redis.connect();

  return {
    lock: new RedisLockAdapter(redis, logger),
    journal: new RedisSubmissionJournal(redis, config.execution.journal_ttl_seconds),
    async close() {
      await redis.quit();
    }
  };
}

export function toExecutionSettings(config: SwapConfig): ExecutionSettings {
  const { execution } = config;

  return {
    maxSubmissionAttempts: execution.max_submission_attempts,
    rpcRetryAttempts: execution.rpc_retry_attempts,
    rpcRetryBackoffMs: execution.rpc_retry_backoff_ms,
    confirmTimeoutMs: execution.confirm_timeout_ms,
    lockTtlSeconds: execution.lock_ttl_seconds,
    lockWaitMs: execution.lock_wait_ms,
    lockPollIntervalMs: execution.lock_poll_interval_ms
  };
}

export async function bootstrap(): Promise<SwapRuntime> {
  const env = loadEnv();
  const config = loadSwapConfig(env.SWAP_CONFIG_PATH);
  const logger = createLogger('swap');
  const bootLogger = createLogger('bootstrap');
  const { execution } = config;

  const coordination = await createCoordination(env, config, createLogger('lock'));

  const connections = env.SOLANA_RPC_URLS.map((url) => new Connection(url, 'confirmed'));
  const jupiterFree = new JupiterClient({
    baseUrl: config.solana.jupiter_free_url,
    timeoutMs: execution.rpc_timeout_ms
  });
  const jupiterPro = env.JUPITER_API_KEY
    ? new JupiterClient({
        baseUrl: config.solana.jupiter_pro_url,
        apiKey: env.JUPITER_API_KEY,
        timeoutMs: execution.rpc_timeout_ms
      })
    : null;
  const jupiterSwap = jupiterPro ?? jupiterFree;

  const tonClients = env.TON_RPC_URLS.map(
    (endpoint) =>
      new TonClient({
        endpoint,
        apiKey: env.TON_RPC_API_KEY,
        timeout: execution.rpc_timeout_ms
      })
  );
  const [tonPrimary] = tonClients;
  if (!tonPrimary) {
    throw new Error('TON_RPC_URLS must list at least one endpoint');
  }
  const tonApi = new TonApiClient({
    baseUrl: config.ton.tonapi_url,
    apiKey: env.TONAPI_KEY,
    timeoutMs: execution.rpc_timeout_ms
  });
  const stonfi = new StonfiClient({
    baseUrl: config.ton.stonfi_api_url,
    timeoutMs: execution.rpc_timeout_ms
  });

  const chains: ChainRegistry = {
    SOLANA: new SolanaAdapter(connections, jupiterSwap, createLogger('solana'), {
      rpcTimeoutMs: execution.rpc_timeout_ms,
      submitTimeoutMs: execution.submit_timeout_ms,
      confirmPollIntervalMs: execution.confirm_poll_interval_ms,
      priorityFeeLamports: config.solana.priority_fee_lamports,
      reserves: config.reserves.solana
    }),
    TON: new TonAdapter(tonClients, tonApi, stonfi, new StonfiSdkRouter(tonPrimary), createLogger('ton'), {
      rpcTimeoutMs: execution.rpc_timeout_ms,
      submitTimeoutMs: execution.submit_timeout_ms,
      confirmPollIntervalMs: execution.confirm_poll_interval_ms,
      ptonAddress: config.ton.pton_address,
      reserves: config.reserves.ton
    })
  };

  const providerTimeoutMs = config.quote.provider_timeout_ms;
  const dexscreenerOptions = { baseUrl: config.market.dexscreener_url, timeoutMs: providerTimeoutMs };
  const providers: PriceProviderPort[] = [];

  for (const name of config.quote.solana_providers) {
    if (name === 'DEXSCREENER') {
      providers.push(new DexscreenerPriceProvider('SOLANA', dexscreenerOptions));
    } else if (name === 'JUPITER_PRICE') {
      providers.push(new JupiterPriceProvider(jupiterFree));
    } else if (jupiterPro) {
      providers.push(new JupiterQuoteProvider(jupiterPro));
    } else {
      bootLogger.warn('JUPITER_QUOTE provider skipped, JUPITER_API_KEY not set');
    }
  }

  for (const name of config.quote.ton_providers) {
    if (name === 'DEXSCREENER') {
      providers.push(new DexscreenerPriceProvider('TON', dexscreenerOptions));
    } else if (name === 'TONAPI') {
      providers.push(new TonApiRatesProvider(tonApi));
    } else {
      providers.push(new StonfiSimulateProvider(stonfi, config.ton.pton_address));
    }
  }

  const settings = toExecutionSettings(config);
  const codec = new AesGcmSecretCodec(env.WALLET_SECRET_PASSPHRASE);
  const marketData = new CoingeckoProvider({
    baseUrl: config.market.coingecko_url,
    timeoutMs: providerTimeoutMs
  });

  const executor = createSwapExecutor({
    chains,
    quoteRouter: createQuoteRouter({ providers, logger: createLogger('quote'), providerTimeoutMs }),
    codec,
    lock: coordination.lock,
    journal: coordination.journal,
    logger,
    settings
  });

  bootLogger.info('swap runtime ready', {
    solana_endpoints: connections.length,
    jupiter_pro: jupiterPro !== null,
    providers: providers.map((provider) => `${provider.chain}:${provider.name}`)
  });

  return {
    executor,
    withdraw(request) {
      return withdrawNative(
        {
          chains,
          codec,
          lock: coordination.lock,
          journal: coordination.journal,
          logger,
          settings
        },
        request
      );
    },
    walletBalance(chain, address) {
      return getWalletBalance({ chains, marketData, logger }, chain, address);
    },
    async stop() {
      await coordination.close();
      bootLogger.info('swap runtime stopped');
    }
  };
}
