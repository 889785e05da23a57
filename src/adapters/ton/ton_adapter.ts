import {
  Address,
  Cell,
  SendMode,
  WalletContractV4,
  beginCell,
  external,
  internal,
  storeMessage,
  type TonClient
} from '@ton/ton';
import { mnemonicToPrivateKey } from '@ton/crypto';
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
import {
  InvalidInputError,
  KeyDecryptionFailedError,
  NetworkTimeoutError,
  RpcUnavailableError,
  SubmissionFailedError,
  SwapError
} from '../../domain/errors';
import type { GasOperation } from '../../domain/model/types';
import { toHumanUnit, toSmallestUnit } from '../../domain/utils/amounts';
import { sleep, withTimeout } from '../../domain/utils/time';
import { formatFetchError, HttpStatusError, isRecord } from '../http/fetch_json';
import { callRpc } from '../rpc_call';
import type { StonfiClient, TonSwapRouter } from './stonfi_client';
import type { TonApiClient } from './tonapi_client';

const MNEMONIC_WORD_COUNT = 24;
const FRIENDLY_ADDRESS_PATTERN = /^(EQ|UQ)[A-Za-z0-9_-]{46}$/;

export type TonRpc = Pick<TonClient, 'getBalance' | 'isContractDeployed' | 'runMethod' | 'sendFile'>;

export type TonApiLookup = Pick<
  TonApiClient,
  'getJettonDecimals' | 'getJettonBalance' | 'findTransactionByMessageHash'
>;

export type StonfiSimulator = Pick<StonfiClient, 'simulateSwap'>;

export interface TonAdapterOptions {
  rpcTimeoutMs: number;
  submitTimeoutMs: number;
  confirmPollIntervalMs: number;
  ptonAddress: string;
  reserves: { swap: string; transfer: string };
}

function parseAddress(address: string, field: string): Address {
  try {
    return Address.parse(address);
  } catch (error) {
    throw new InvalidInputError(`${field} is not a TON address: ${formatFetchError(error)}`);
  }
}

function isHttpRejection(error: unknown): boolean {
  return isRecord(error) && isRecord(error.response);
}

export class TonAdapter implements ChainPort {
  readonly chain = 'TON' as const;

  private readonly swapReserveRaw: bigint;

  private readonly transferReserveRaw: bigint;

  constructor(
    private readonly rpcs: TonRpc[],
    private readonly tonapi: TonApiLookup,
    private readonly stonfi: StonfiSimulator,
    private readonly router: TonSwapRouter,
    private readonly logger: LoggerPort,
    private readonly options: TonAdapterOptions
  ) {
    if (rpcs.length === 0) {
      throw new Error('TonAdapter needs at least one RPC endpoint');
    }
    this.swapReserveRaw = toSmallestUnit(options.reserves.swap);
    this.transferReserveRaw = toSmallestUnit(options.reserves.transfer);
  }

  validateAddress(address: string): boolean {
    try {
      if (Address.isRaw(address)) {
        Address.parseRaw(address);
        return true;
      }
      if (!FRIENDLY_ADDRESS_PATTERN.test(address)) {
        return false;
      }
      return !Address.parseFriendly(address).isTestOnly;
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
    return `https://tonscan.org/tx/${txId}`;
  }

  /** Tries each endpoint in configured order; the first answer wins. */
  private async withFailover<T>(label: string, call: (rpc: TonRpc) => Promise<T>): Promise<T> {
    const failures: string[] = [];

    for (const [index, rpc] of this.rpcs.entries()) {
      try {
        return await callRpc(label, this.options.rpcTimeoutMs, () => call(rpc));
      } catch (error) {
        const reason = formatFetchError(error);
        failures.push(`#${index}: ${reason}`);
        this.logger.warn('TON RPC endpoint failed', { label, endpoint: index, error: reason });
      }
    }

    throw new RpcUnavailableError(
      `${label} failed on all ${this.rpcs.length} TON endpoints (${failures.join('; ')})`
    );
  }

  private get primary(): TonRpc {
    const [first] = this.rpcs;
    if (!first) {
      throw new Error('TonAdapter has no RPC endpoint');
    }
    return first;
  }

  private async tonApiCall<T>(label: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof SwapError) {
        throw error;
      }
      if (error instanceof HttpStatusError && error.status < 500) {
        throw new InvalidInputError(`${label} rejected: ${error.message}`);
      }
      throw new RpcUnavailableError(`${label} failed: ${formatFetchError(error)}`);
    }
  }

  async getNativeBalance(address: string): Promise<bigint> {
    const owner = parseAddress(address, 'wallet address');
    return this.withFailover('TON getBalance', (rpc) => rpc.getBalance(owner));
  }

  async getTokenDecimals(token: string): Promise<number> {
    return this.tonApiCall('TonAPI jetton info', () => this.tonapi.getJettonDecimals(token));
  }

  async getTokenBalance(owner: string, token: string): Promise<bigint> {
    return this.tonApiCall('TonAPI jetton balance', () => this.tonapi.getJettonBalance(owner, token));
  }

  async buildSwapTransaction(params: BuildSwapParams): Promise<UnsignedTx> {
    const nativeIn = params.direction === 'NATIVE_TO_TOKEN';
    const simulation = await this.tonApiCall('STON.fi simulate', () =>
      this.stonfi.simulateSwap({
        offerAddress: nativeIn ? this.options.ptonAddress : params.counterAsset,
        askAddress: nativeIn ? params.counterAsset : this.options.ptonAddress,
        offerUnits: params.amountRaw,
        slippageBps: params.slippageBps
      })
    );

    const txParams = await callRpc('STON.fi router params', this.options.rpcTimeoutMs, () =>
      this.router.getSwapTxParams({
        direction: params.direction,
        routerAddress: simulation.routerAddress,
        ptonAddress: simulation.ptonAddress ?? this.options.ptonAddress,
        walletAddress: params.walletAddress,
        jettonAddress: params.counterAsset,
        offerAmountRaw: params.amountRaw,
        minAskAmountRaw: params.minOutputRaw
      })
    );

    return {
      chain: 'TON',
      walletAddress: params.walletAddress,
      // router value carries the offer (for TON in) and the forwarded gas
      requiredNativeRaw: txParams.value,
      destination: txParams.to,
      valueRaw: txParams.value,
      bodyBase64: txParams.bodyBase64,
      bounce: true
    };
  }

  async buildTransferTransaction(params: BuildTransferParams): Promise<UnsignedTx> {
    parseAddress(params.from, 'wallet address');
    parseAddress(params.to, 'destination');

    return {
      chain: 'TON',
      walletAddress: params.from,
      requiredNativeRaw: params.amountRaw,
      destination: params.to,
      valueRaw: params.amountRaw,
      bodyBase64: null,
      bounce: false
    };
  }

  decodeSecretMaterial(plaintext: Uint8Array): SecretMaterial {
    const words = Buffer.from(plaintext).toString('utf8').trim().split(/\s+/);
    if (words.length !== MNEMONIC_WORD_COUNT || words.some((word) => !/^[a-z]+$/.test(word))) {
      throw new KeyDecryptionFailedError(
        `TON secret must be a ${MNEMONIC_WORD_COUNT}-word mnemonic, got ${words.length} words`
      );
    }

    return { chain: 'TON', mnemonic: words };
  }

  private async readSeqno(address: Address): Promise<{ seqno: number; deployed: boolean }> {
    const deployed = await this.withFailover('TON isContractDeployed', (rpc) =>
      rpc.isContractDeployed(address)
    );
    if (!deployed) {
      return { seqno: 0, deployed };
    }

    const result = await this.withFailover('TON seqno', (rpc) => rpc.runMethod(address, 'seqno'));
    return { seqno: result.stack.readNumber(), deployed };
  }

  async signAndSubmit(tx: UnsignedTx, secret: SecretMaterial, hooks: SubmitHooks): Promise<string> {
    if (tx.chain !== 'TON' || secret.chain !== 'TON') {
      throw new Error('TonAdapter can only submit TON transactions');
    }

    const keyPair = await mnemonicToPrivateKey(secret.mnemonic);
    const wallet = WalletContractV4.create({ workchain: 0, publicKey: keyPair.publicKey });
    if (!wallet.address.equals(parseAddress(tx.walletAddress, 'wallet address'))) {
      throw new KeyDecryptionFailedError('Decrypted TON mnemonic does not match the wallet address');
    }

    const { seqno, deployed } = await this.readSeqno(wallet.address);
    const transfer = wallet.createTransfer({
      seqno,
      secretKey: keyPair.secretKey,
      // without IGNORE_ERRORS an unpayable message aborts the wallet transaction
      sendMode: SendMode.PAY_GAS_SEPARATELY,
      messages: [
        internal({
          to: Address.parse(tx.destination),
          value: tx.valueRaw,
          bounce: tx.bounce,
          body: tx.bodyBase64 ? Cell.fromBase64(tx.bodyBase64) : undefined
        })
      ]
    });

    const message = external({
      to: wallet.address,
      init: deployed ? undefined : wallet.init,
      body: transfer
    });
    const boc = beginCell().store(storeMessage(message)).endCell();
    const txId = boc.hash().toString('hex');

    await hooks.onSigned(txId);

    try {
      await withTimeout(
        this.primary.sendFile(boc.toBoc()),
        this.options.submitTimeoutMs,
        () =>
          new NetworkTimeoutError(`TON submission timed out after ${this.options.submitTimeoutMs}ms`, true)
      );
    } catch (error) {
      if (error instanceof NetworkTimeoutError) {
        throw error;
      }
      if (isHttpRejection(error)) {
        throw new SubmissionFailedError(`TON node rejected message: ${formatFetchError(error)}`);
      }
      throw new NetworkTimeoutError(`TON submission outcome unknown: ${formatFetchError(error)}`, true);
    }

    this.logger.info('Transaction submitted', { chain: this.chain, txId, seqno });
    return txId;
  }

  async confirmTransaction(txId: string, timeoutMs: number): Promise<TransactionConfirmation> {
    const startedAt = Date.now();
    let lastError: string | undefined;

    // checks at least once, so a zero timeout is a single status check
    for (;;) {
      try {
        const transaction = await this.tonapi.findTransactionByMessageHash(txId);
        if (transaction) {
          return transaction.success
            ? { status: 'CONFIRMED', transactionHash: transaction.hash }
            : {
                status: 'FAILED',
                error: `transaction aborted (exit code ${transaction.exitCode ?? 'unknown'})`,
                transactionHash: transaction.hash
              };
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
