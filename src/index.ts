export { bootstrap, toExecutionSettings, type SwapRuntime } from './infra/bootstrap';
export { createSwapExecutor, validateSwapRequest } from './app/usecases/swap_executor';
export type { ExecuteOptions, SwapExecutor, SwapHandle } from './app/usecases/swap_executor';
export { createQuoteRouter, type QuoteRouter } from './app/usecases/quote_router';
export { withdrawNative } from './app/usecases/withdraw_native';
export { getWalletBalance } from './app/usecases/wallet_balance';
export type { ChainPort, ChainRegistry } from './app/ports/chain_port';
export type { PriceProviderPort } from './app/ports/price_provider_port';
export { AesGcmSecretCodec } from './adapters/crypto/aes_gcm_secret_codec';
export * from './domain/errors';
export * from './domain/model/types';
export type { SwapState } from './domain/model/swap_state';
