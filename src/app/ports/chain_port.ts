import type { Chain, GasOperation, SwapDirection } from '../../domain/model/types';

export interface SolanaUnsignedTx {
  chain: 'SOLANA';
  walletAddress: string;
  /** Native lamports the transaction debits besides the network fee. */
  requiredNativeRaw: bigint;
  serializedBase64: string;
}

export interface TonUnsignedTx {
  chain: 'TON';
  walletAddress: string;
  /** nanoTON attached to the outgoing message, forwarded gas included. */
  requiredNativeRaw: bigint;
  destination: string;
  valueRaw: bigint;
  bodyBase64: string | null;
  bounce: boolean;
}

export type UnsignedTx = SolanaUnsignedTx | TonUnsignedTx;

export type SecretMaterial =
  | { chain: 'SOLANA'; seed: Uint8Array }
  | { chain: 'TON'; mnemonic: string[] };

export interface BuildSwapParams {
  direction: SwapDirection;
  counterAsset: string;
  amountRaw: bigint;
  minOutputRaw: bigint;
  walletAddress: string;
  slippageBps: number;
}

export interface BuildTransferParams {
  from: string;
  to: string;
  amountRaw: bigint;
}

export interface SubmitHooks {
  /** Runs after signing and before the first byte goes to the network. */
  onSigned(txId: string): Promise<void>;
}

export type ConfirmationStatus = 'CONFIRMED' | 'FAILED' | 'PENDING';

export interface TransactionConfirmation {
  status: ConfirmationStatus;
  error?: string;
  /** On-chain transaction id when it differs from the id returned at submission. */
  transactionHash?: string;
}

export interface ChainPort {
  readonly chain: Chain;
  validateAddress(address: string): boolean;
  toSmallestUnit(amount: string): bigint;
  toHumanUnit(raw: bigint): string;
  gasReserveRaw(operation: GasOperation): bigint;
  /** Link for a transaction id, or for `transactionHash` once confirmation reports one. */
  explorerUrl(txId: string): string;
  getNativeBalance(address: string): Promise<bigint>;
  getTokenDecimals(token: string): Promise<number>;
  getTokenBalance(owner: string, token: string): Promise<bigint>;
  buildSwapTransaction(params: BuildSwapParams): Promise<UnsignedTx>;
  buildTransferTransaction(params: BuildTransferParams): Promise<UnsignedTx>;
  decodeSecretMaterial(plaintext: Uint8Array): SecretMaterial;
  signAndSubmit(tx: UnsignedTx, secret: SecretMaterial, hooks: SubmitHooks): Promise<string>;
  confirmTransaction(txId: string, timeoutMs: number): Promise<TransactionConfirmation>;
}

export type ChainRegistry = Record<Chain, ChainPort>;
