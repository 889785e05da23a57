export const CHAIN_VALUES = ['SOLANA', 'TON'] as const;

export type Chain = (typeof CHAIN_VALUES)[number];

export type SwapDirection = 'NATIVE_TO_TOKEN' | 'TOKEN_TO_NATIVE';

export type QuoteSource = 'DEXSCREENER' | 'JUPITER_PRICE' | 'JUPITER_QUOTE' | 'TONAPI' | 'STONFI';

export type GasOperation = 'SWAP' | 'TRANSFER';

export interface WalletHandle {
  chainAddress: string;
  encryptedSecret: string;
}

export interface SwapRequest {
  chain: Chain;
  wallet: WalletHandle;
  direction: SwapDirection;
  counterAsset: string;
  amount: string;
  slippageBps: number;
  clientReference?: string;
}

export interface WithdrawRequest {
  chain: Chain;
  wallet: WalletHandle;
  destination: string;
  amount: string;
  clientReference?: string;
}

export interface MarketSnapshot {
  priceUsd?: number;
  liquidityUsd?: number;
  marketCapUsd?: number;
}

export interface Quote {
  outputAmountRaw: bigint;
  priceImpactPct: number | null;
  source: QuoteSource;
  fetchedAt: string;
  market?: MarketSnapshot;
}

export interface QuoteRequest {
  chain: Chain;
  direction: SwapDirection;
  counterAsset: string;
  amountHuman: string;
  tokenDecimals: number;
}

/** QuoteRequest with the input amount already scaled, as handed to each provider. */
export interface ProviderQuoteRequest extends QuoteRequest {
  amountInRaw: bigint;
  inputDecimals: number;
  outputDecimals: number;
}

export type SwapOutcome = 'CONFIRMED' | 'UNKNOWN';

export interface SwapResult {
  success: boolean;
  outcome: SwapOutcome;
  reference: string;
  chain: Chain;
  direction: SwapDirection;
  txId: string;
  explorerUrl: string;
  amountInRaw: bigint;
  quotedOutputRaw: bigint;
  minOutputRaw: bigint;
  outputAmountRaw: bigint | null;
  gasConsumedRaw: bigint | null;
  quote: Quote;
  attempts: number;
}

export interface WithdrawResult {
  success: boolean;
  outcome: SwapOutcome;
  reference: string;
  chain: Chain;
  txId: string;
  explorerUrl: string;
  amountRaw: bigint;
  gasConsumedRaw: bigint | null;
}

export type SubmissionStatus = 'INTENT' | 'CONFIRMED' | 'FAILED' | 'UNKNOWN';

export interface SubmissionRecord {
  reference: string;
  chain: Chain;
  walletAddress: string;
  txId: string;
  attempt: number;
  status: SubmissionStatus;
  created_at: string;
  updated_at: string;
  error?: string;
}

export interface WalletBalance {
  chain: Chain;
  address: string;
  balanceRaw: bigint;
  balance: string;
  usdValue: number | null;
}
