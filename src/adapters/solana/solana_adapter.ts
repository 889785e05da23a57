import {
  Keypair,
  PublicKey,
  SendTransactionError,
  SystemProgram,
  TransactionMessage,
  VersionedTransaction,
  type Connection
} from '@solana/web3.js';
import bs58 from 'bs58';
import type {
  BuildSwapParams,
  BuildTransferParams,
  ChainPort,
  SecretMaterial,
  SubmitHooks,
  TransactionConfirmation,
  UnsignedTx
} from '../../app/ports/chain_port';
import type { LoggerPort } from '../../app/ports/logger_port';
import { WSOL_MINT } from '../../domain/chains';
import {
  InvalidInputError,
  KeyDecryptionFailedError,
  NetworkTimeoutError,
  NoLiquidityDataError,
  RpcUnavailableError,
  SubmissionFailedError,
  SwapError
} from '../../domain/errors';
import type { GasOperation } from '../../domain/model/types';
import { toHumanUnit, toSmallestUnit } from '../../domain/utils/amounts';
import { sleep, withTimeout } from '../../domain/utils/time';
import { formatFetchError, HttpStatusError, isRecord } from '../http/fetch_json';
import { callRpc } from '../rpc_call';
import type { JupiterClient } from './jupiter_client';

const SOLANA_SEED_LENGTH = 32;

export type SolanaRpc = Pick<
  Connection,
  | 'getBalance'
  | 'getParsedAccountInfo'
  | 'getParsedTokenAccountsByOwner'
  | 'getLatestBlockhash'
  | 'sendRawTransaction'
  | 'getSignatureStatuses'
>;

export type JupiterSwapApi = Pick<JupiterClient, 'getQuote' | 'getSwapTransaction'>;

export interface SolanaAdapterOptions {
  rpcTimeoutMs: number;
  submitTimeoutMs: number;
  confirmPollIntervalMs: number;
  priorityFeeLamports: number;
  reserves: { swap: string; transfer: string };
}

function parsePublicKey(address: string, field: string): PublicKey {
  try {
    return new PublicKey(address);
  } catch (error) {
    throw new InvalidInputError(`${field} is not a Solana address: ${formatFetchError(error)}`);
  }
}

function readParsedInfo(data: unknown): Record<string, unknown> | null {
  if (!isRecord(data) || !isRecord(data.parsed) || !isRecord(data.parsed.info)) {
    return null;
  }

  return data.parsed.info;
}

export class SolanaAdapter implements ChainPort {
  readonly chain = 'SOLANA' as const;

  private readonly swapReserveRaw: bigint;

  private readonly transferReserveRaw: bigint;

  constructor(
    private readonly connections: SolanaRpc[],
    private readonly jupiter: JupiterSwapApi,
    private readonly logger: LoggerPort,
    private readonly options: SolanaAdapterOptions
  ) {
    if (connections.length === 0) {
      throw new Error('SolanaAdapter needs at least one RPC connection');
    }
    this.swapReserveRaw = toSmallestUnit(options.reserves.swap);
    this.transferReserveRaw = toSmallestUnit(options.reserves.transfer);
  }

  validateAddress(address: string): boolean {
    try {
      return bs58.decode(address).length === 32;
    } catch {
      return false;
    }
  }

  toSmallestUnit(amount: string): bigint {
    return toSmallestUnit(amount);
  }

  toHumanUnit(raw: bigint): string {
    return toHumanUnit(raw);
  }

  gasReserveRaw(operation: GasOperation): bigint {
    return operation === 'SWAP' ? this.swapReserveRaw : this.transferReserveRaw;
  }

  explorerUrl(txId: string): string {
    return `https://solscan.io/tx/${txId}`;
  }

  /** Tries each endpoint in configured order; the first answer wins. */
  private async withFailover<T>(label: string, call: (rpc: SolanaRpc) => Promise<T>): Promise<T> {
    const failures: string[] = [];

    for (const [index, rpc] of this.connections.entries()) {
      try {
        return await callRpc(label, this.options.rpcTimeoutMs, () => call(rpc));
      } catch (error) {
        const reason = formatFetchError(error);
        failures.push(`#${index}: ${reason}`);
        this.logger.warn('Solana RPC endpoint failed', { label, endpoint: index, error: reason });
      }
    }

    throw new RpcUnavailableError(
      `${label} failed on all ${this.connections.length} Solana endpoints (${failures.join('; ')})`
    );
  }

  private get primary(): SolanaRpc {
    const [first] = this.connections;
    if (!first) {
      throw new Error('SolanaAdapter has no RPC connection');
    }
    return first;
  }

  async getNativeBalance(address: string): Promise<bigint> {
    const owner = parsePublicKey(address, 'wallet address');
    const lamports = await this.withFailover('getBalance', (rpc) => rpc.getBalance(owner, 'confirmed'));
    return BigInt(lamports);
  }

  async getTokenDecimals(token: string): Promise<number> {
    if (token === WSOL_MINT) {
      return 9;
    }

    const mint = parsePublicKey(token, 'token mint');
    const account = await this.withFailover('getParsedAccountInfo', (rpc) =>
      rpc.getParsedAccountInfo(mint)
    );
    const info = readParsedInfo(account.value?.data);
    if (!info || typeof info.decimals !== 'number') {
      throw new InvalidInputError(`${token} is not an SPL token mint`);
    }

    return info.decimals;
  }

  async getTokenBalance(owner: string, token: string): Promise<bigint> {
    const ownerKey = parsePublicKey(owner, 'wallet address');
    const mint = parsePublicKey(token, 'token mint');
    const accounts = await this.withFailover('getParsedTokenAccountsByOwner', (rpc) =>
      rpc.getParsedTokenAccountsByOwner(ownerKey, { mint })
    );

    let total = 0n;
    for (const { account } of accounts.value) {
      const info = readParsedInfo(account.data);
      const tokenAmount = info?.tokenAmount;
      if (isRecord(tokenAmount) && typeof tokenAmount.amount === 'string') {
        total += BigInt(tokenAmount.amount);
      }
    }

    return total;
  }

  /** 5xx, 429 and unreadable payloads are transient; any other 4xx means Jupiter has no route. */
  private async jupiterCall<T>(label: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof SwapError) {
        throw error;
      }
      if (error instanceof HttpStatusError) {
        if (error.status < 500 && error.status !== 429) {
          throw new NoLiquidityDataError([{ provider: 'JUPITER', reason: error.message }]);
        }
        throw new RpcUnavailableError(error.message);
      }
      throw new RpcUnavailableError(`${label} failed: ${formatFetchError(error)}`);
    }
  }

  async buildSwapTransaction(params: BuildSwapParams): Promise<UnsignedTx> {
    const nativeIn = params.direction === 'NATIVE_TO_TOKEN';
    const quote = await this.jupiterCall('Jupiter quote', () =>
      this.jupiter.getQuote({
        inputMint: nativeIn ? WSOL_MINT : params.counterAsset,
        outputMint: nativeIn ? params.counterAsset : WSOL_MINT,
        amountRaw: params.amountRaw,
        slippageBps: params.slippageBps
      })
    );

    if (quote.outAmountAtomic < params.minOutputRaw) {
      throw new NoLiquidityDataError([
        {
          provider: 'JUPITER',
          reason: `route returns ${quote.outAmountAtomic.toString()}, below minimum ${params.minOutputRaw.toString()}`
        }
      ]);
    }

    const swap = await this.jupiterCall('Jupiter swap build', () =>
      this.jupiter.getSwapTransaction({
        userPublicKey: params.walletAddress,
        quote,
        minOutputRaw: params.minOutputRaw,
        priorityFeeLamports: this.options.priorityFeeLamports
      })
    );

    const priorityFee = BigInt(swap.prioritizationFeeLamports);

    return {
      chain: 'SOLANA',
      walletAddress: params.walletAddress,
      requiredNativeRaw: nativeIn ? params.amountRaw + priorityFee : priorityFee,
      serializedBase64: swap.swapTransaction
    };
  }

  async buildTransferTransaction(params: BuildTransferParams): Promise<UnsignedTx> {
    const from = parsePublicKey(params.from, 'wallet address');
    const to = parsePublicKey(params.to, 'destination');
    const { blockhash } = await this.withFailover('getLatestBlockhash', (rpc) =>
      rpc.getLatestBlockhash('confirmed')
    );

    const message = new TransactionMessage({
      payerKey: from,
      recentBlockhash: blockhash,
      instructions: [
        SystemProgram.transfer({
          fromPubkey: from,
          toPubkey: to,
          lamports: params.amountRaw
        })
      ]
    }).compileToV0Message();

    return {
      chain: 'SOLANA',
      walletAddress: params.from,
      requiredNativeRaw: params.amountRaw,
      serializedBase64: Buffer.from(new VersionedTransaction(message).serialize()).toString('base64')
    };
  }

  decodeSecretMaterial(plaintext: Uint8Array): SecretMaterial {
    if (plaintext.length !== SOLANA_SEED_LENGTH) {
      throw new KeyDecryptionFailedError(
        `Solana secret must be a ${SOLANA_SEED_LENGTH}-byte seed, got ${plaintext.length} bytes`
      );
    }

    return { chain: 'SOLANA', seed: plaintext };
  }

  async signAndSubmit(tx: UnsignedTx, secret: SecretMaterial, hooks: SubmitHooks): Promise<string> {
    if (tx.chain !== 'SOLANA' || secret.chain !== 'SOLANA') {
      throw new Error('SolanaAdapter can only submit Solana transactions');
    }

    const keypair = Keypair.fromSeed(secret.seed);
    if (keypair.publicKey.toBase58() !== tx.walletAddress) {
      throw new KeyDecryptionFailedError('Decrypted Solana key does not match the wallet address');
    }

    const transaction = VersionedTransaction.deserialize(Buffer.from(tx.serializedBase64, 'base64'));
    transaction.sign([keypair]);

    const [signature] = transaction.signatures;
    if (!signature) {
      throw new Error('Signed Solana transaction has no signature');
    }

    const txId = bs58.encode(signature);
    await hooks.onSigned(txId);

    try {
      await withTimeout(
        this.primary.sendRawTransaction(transaction.serialize(), {
          skipPreflight: false,
          maxRetries: 3
        }),
        this.options.submitTimeoutMs,
        () =>
          new NetworkTimeoutError(
            `Solana submission timed out after ${this.options.submitTimeoutMs}ms`,
            true
          )
      );
    } catch (error) {
      if (error instanceof NetworkTimeoutError) {
        throw error;
      }
      if (error instanceof SendTransactionError) {
        throw new SubmissionFailedError(`Solana node rejected transaction: ${error.message}`);
      }
      throw new NetworkTimeoutError(
        `Solana submission outcome unknown: ${formatFetchError(error)}`,
        true
      );
    }

    this.logger.info('Transaction submitted', { chain: this.chain, txId });
    return txId;
  }

  async confirmTransaction(txId: string, timeoutMs: number): Promise<TransactionConfirmation> {
    const startedAt = Date.now();
    let lastError: string | undefined;

    // checks at least once, so a zero timeout is a single status check
    for (;;) {
      try {
        const statuses = await this.withFailover('getSignatureStatuses', (rpc) =>
          rpc.getSignatureStatuses([txId], { searchTransactionHistory: true })
        );
        const status = statuses.value[0];

        if (status?.err) {
          return { status: 'FAILED', error: JSON.stringify(status.err) };
        }

        if (status?.confirmationStatus === 'confirmed' || status?.confirmationStatus === 'finalized') {
          return { status: 'CONFIRMED' };
        }
      } catch (error) {
        lastError = formatFetchError(error);
      }

      if (Date.now() - startedAt >= timeoutMs) {
        break;
      }
      await sleep(this.options.confirmPollIntervalMs);
    }

    return {
      status: 'PENDING',
      error: lastError ?? `confirmation timeout after ${timeoutMs}ms`
    };
  }
}
