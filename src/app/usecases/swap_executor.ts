import { randomUUID } from 'node:crypto';
import type { ChainPort, ChainRegistry, UnsignedTx } from '../ports/chain_port';
import type { LockPort } from '../ports/lock_port';
import type { LoggerPort } from '../ports/logger_port';
import type { SecretCodecPort } from '../ports/secret_codec_port';
import type { SubmissionJournalPort } from '../ports/submission_journal_port';
import { CHAIN_INFO } from '../../domain/chains';
import {
  InsufficientFundsError,
  InvalidInputError,
  SubmissionFailedError,
  SwapCancelledError,
  SwapError,
  WalletBusyError
} from '../../domain/errors';
import {
  assertSwapStateTransition,
  canTransitionSwapState,
  isCancellableSwapState,
  isTerminalSwapState,
  type SwapState
} from '../../domain/model/swap_state';
import type {
  SubmissionRecord,
  SubmissionStatus,
  SwapRequest,
  SwapResult
} from '../../domain/model/types';
import {
  MAX_SLIPPAGE_BPS,
  computeMinOutput,
  isPositiveDecimal,
  parseDecimalAmount
} from '../../domain/utils/amounts';
import type { QuoteRouter } from './quote_router';
import {
  acquireWalletLock,
  confirmSafely,
  decryptWalletSecret,
  keepWalletLock,
  recordSubmissionStatus,
  submitWithJournal,
  type ExecutionSettings
} from './submission';
import { retryTransient, toErrorMessage } from './usecase_utils';

export interface SwapExecutorDependencies {
  chains: ChainRegistry;
  quoteRouter: QuoteRouter;
  codec: SecretCodecPort;
  lock: LockPort;
  journal: SubmissionJournalPort;
  logger: LoggerPort;
  settings: ExecutionSettings;
  createReference?: () => string;
}

export interface SwapHandle {
  reference: string;
  result: Promise<SwapResult>;
  /** False once the swap is past BALANCE_CHECKED; the result then settles as usual. */
  cancel(): boolean;
  state(): SwapState;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface SwapExecutor {
  start(request: SwapRequest): SwapHandle;
  execute(request: SwapRequest, options?: ExecuteOptions): Promise<SwapResult>;
  getSubmissionStatus(reference: string): Promise<SubmissionRecord | null>;
}

interface StateTracker {
  readonly current: SwapState;
  transition(to: SwapState): void;
}

function createStateTracker(reference: string, logger: LoggerPort): StateTracker {
  let current: SwapState = 'RECEIVED';

  return {
    get current() {
      return current;
    },
    transition(to) {
      assertSwapStateTransition(current, to);
      logger.info('swap state changed', { reference, from: current, to });
      current = to;
    }
  };
}

export function validateSwapRequest(request: SwapRequest, chainPort: ChainPort): void {
  if (!isPositiveDecimal(request.amount)) {
    throw new InvalidInputError(`amount must be a positive decimal, got "${request.amount}"`);
  }

  if (
    !Number.isInteger(request.slippageBps) ||
    request.slippageBps < 0 ||
    request.slippageBps > MAX_SLIPPAGE_BPS
  ) {
    throw new InvalidInputError(`slippageBps must be an integer in 0..${MAX_SLIPPAGE_BPS}`);
  }

  if (!chainPort.validateAddress(request.counterAsset)) {
    throw new InvalidInputError(`counterAsset ${request.counterAsset} is not a valid ${request.chain} address`);
  }

  if (!chainPort.validateAddress(request.wallet.chainAddress)) {
    throw new InvalidInputError(
      `wallet ${request.wallet.chainAddress} is not a valid ${request.chain} address`
    );
  }

  if (request.direction === 'NATIVE_TO_TOKEN') {
    parseDecimalAmount(request.amount, CHAIN_INFO[request.chain].nativeDecimals);
  }
}

export function createSwapExecutor(dependencies: SwapExecutorDependencies): SwapExecutor {
  const { chains, quoteRouter, codec, lock, journal, logger, settings } = dependencies;
  const createReference = dependencies.createReference ?? randomUUID;
  const retryPolicy = { attempts: settings.rpcRetryAttempts, backoffMs: settings.rpcRetryBackoffMs };

  const recordStatus = (reference: string, status: SubmissionStatus, error?: string): Promise<void> =>
    recordSubmissionStatus(journal, logger, reference, status, error);

  const runSwap = async (
    request: SwapRequest,
    reference: string,
    tracker: StateTracker,
    signal: AbortSignal
  ): Promise<SwapResult> => {
    const chainPort = chains[request.chain];
    const walletAddress = request.wallet.chainAddress;
    const nativeIn = request.direction === 'NATIVE_TO_TOKEN';
    const retry = <T>(label: string, task: () => Promise<T>): Promise<T> =>
      retryTransient(label, retryPolicy, logger, task);
    const checkpoint = (): void => {
      if (signal.aborted) {
        throw new SwapCancelledError(tracker.current);
      }
    };

    validateSwapRequest(request, chainPort);
    tracker.transition('VALIDATED');
    checkpoint();

    const lockToken = await acquireWalletLock({
      lock,
      walletAddress,
      settings,
      signal,
      stateLabel: tracker.current
    });
    const hold = keepWalletLock({
      lock,
      walletAddress,
      token: lockToken,
      ttlSeconds: settings.lockTtlSeconds,
      logger
    });
    const assertLockHeld = (): void => {
      if (!hold.held()) {
        throw new WalletBusyError(walletAddress);
      }
    };

    try {
      checkpoint();

      if (request.clientReference !== undefined) {
        const existing = await journal.find(reference);
        if (existing) {
          throw new InvalidInputError(
            `Reference ${reference} already has a submission (${existing.status})`
          );
        }
      }

      const tokenDecimals = await retry('getTokenDecimals', () =>
        chainPort.getTokenDecimals(request.counterAsset)
      );
      const amountInRaw = parseDecimalAmount(
        request.amount,
        nativeIn ? CHAIN_INFO[request.chain].nativeDecimals : tokenDecimals
      );

      const quote = await quoteRouter.quote({
        chain: request.chain,
        direction: request.direction,
        counterAsset: request.counterAsset,
        amountHuman: request.amount,
        tokenDecimals
      });
      const minOutputRaw = computeMinOutput(quote.outputAmountRaw, request.slippageBps);
      tracker.transition('QUOTED');
      checkpoint();

      const reserveRaw = chainPort.gasReserveRaw('SWAP');
      const nativeBefore = await retry('getNativeBalance', () => chainPort.getNativeBalance(walletAddress));
      if (nativeIn) {
        const requiredRaw = amountInRaw + reserveRaw;
        if (nativeBefore < requiredRaw) {
          throw new InsufficientFundsError('NATIVE', requiredRaw, nativeBefore);
        }
      } else {
        const tokenBefore = await retry('getTokenBalance', () =>
          chainPort.getTokenBalance(walletAddress, request.counterAsset)
        );
        if (tokenBefore < amountInRaw) {
          throw new InsufficientFundsError('TOKEN', amountInRaw, tokenBefore);
        }
        if (nativeBefore < reserveRaw) {
          throw new InsufficientFundsError('NATIVE', reserveRaw, nativeBefore);
        }
      }
      tracker.transition('BALANCE_CHECKED');
      checkpoint();

      const buildTx = (): Promise<UnsignedTx> =>
        retry('buildSwapTransaction', () =>
          chainPort.buildSwapTransaction({
            direction: request.direction,
            counterAsset: request.counterAsset,
            amountRaw: amountInRaw,
            minOutputRaw,
            walletAddress,
            slippageBps: request.slippageBps
          })
        );
      // the router decides the forwarded value, so the static reserve is checked again here
      const assertAffordable = (tx: UnsignedTx): UnsignedTx => {
        if (tx.requiredNativeRaw > nativeBefore) {
          throw new InsufficientFundsError('NATIVE', tx.requiredNativeRaw, nativeBefore);
        }
        return tx;
      };

      const firstTx = await buildTx();
      checkpoint();
      tracker.transition('TX_BUILT');
      assertAffordable(firstTx);
      assertLockHeld();

      const secret = decryptWalletSecret(codec, chainPort, request.wallet, logger);
      const submission = await submitWithJournal({
        chainPort,
        journal,
        logger,
        reference,
        walletAddress,
        secret,
        maxAttempts: settings.maxSubmissionAttempts,
        firstTx,
        rebuild: async () => {
          const tx = assertAffordable(await buildTx());
          assertLockHeld();
          return tx;
        },
        onStep: (step) => {
          tracker.transition(step === 'REBUILD' ? 'TX_BUILT' : step);
        }
      });

      const { txId } = submission;
      const confirmation = await confirmSafely(chainPort, txId, settings.confirmTimeoutMs);
      const summary = {
        reference,
        chain: request.chain,
        direction: request.direction,
        txId,
        explorerUrl: chainPort.explorerUrl(confirmation.transactionHash ?? txId),
        amountInRaw,
        quotedOutputRaw: quote.outputAmountRaw,
        minOutputRaw,
        quote,
        attempts: submission.attempts
      };

      if (confirmation.status === 'FAILED') {
        await recordStatus(reference, 'FAILED', confirmation.error);
        throw new SubmissionFailedError(
          `Transaction ${txId} failed on chain: ${confirmation.error ?? 'no detail'}`,
          true
        );
      }

      if (confirmation.status === 'PENDING') {
        await recordStatus(reference, 'UNKNOWN', confirmation.error);
        tracker.transition('UNKNOWN_OUTCOME');
        logger.warn('swap outcome unknown, query status by reference', {
          reference,
          tx_id: txId,
          error: confirmation.error
        });
        return {
          ...summary,
          success: false,
          outcome: 'UNKNOWN',
          outputAmountRaw: null,
          gasConsumedRaw: null
        };
      }

      await recordStatus(reference, 'CONFIRMED');

      let outputAmountRaw: bigint | null = null;
      let gasConsumedRaw: bigint | null = null;
      try {
        const nativeAfter = await retry('getNativeBalance', () => chainPort.getNativeBalance(walletAddress));
        if (nativeIn) {
          const gas = nativeBefore - nativeAfter - amountInRaw;
          gasConsumedRaw = gas >= 0n ? gas : null;
        } else {
          const delta = nativeAfter - nativeBefore;
          if (delta >= 0n) {
            outputAmountRaw = delta;
          } else {
            // proceeds not credited yet, the net change is what gas cost
            gasConsumedRaw = -delta;
          }
        }
      } catch (error) {
        logger.warn('post-swap reconciliation failed', { reference, tx_id: txId, error: toErrorMessage(error) });
      }

      tracker.transition('RECONCILED');
      logger.info('swap confirmed', {
        reference,
        tx_id: txId,
        output_raw: outputAmountRaw,
        gas_raw: gasConsumedRaw
      });

      return {
        ...summary,
        success: true,
        outcome: 'CONFIRMED',
        outputAmountRaw,
        gasConsumedRaw
      };
    } finally {
      hold.stop();
      try {
        await lock.releaseWalletLock(walletAddress, lockToken);
      } catch (error) {
        logger.warn('wallet lock release failed', { wallet: walletAddress, error: toErrorMessage(error) });
      }
    }
  };

  const start = (request: SwapRequest): SwapHandle => {
    const reference = request.clientReference ?? createReference();
    const controller = new AbortController();
    const tracker = createStateTracker(reference, logger);

    const result = runSwap(request, reference, tracker, controller.signal).catch((error: unknown) => {
      if (error instanceof SwapCancelledError && canTransitionSwapState(tracker.current, 'CANCELLED')) {
        tracker.transition('CANCELLED');
      } else if (!isTerminalSwapState(tracker.current)) {
        tracker.transition('FAILED');
      }

      logger.warn('swap ended without success', {
        reference,
        state: tracker.current,
        kind: error instanceof SwapError ? error.kind : 'UNEXPECTED',
        error: toErrorMessage(error)
      });
      throw error;
    });

    return {
      reference,
      result,
      cancel() {
        if (!isCancellableSwapState(tracker.current)) {
          return false;
        }
        controller.abort();
        return true;
      },
      state() {
        return tracker.current;
      }
    };
  };

  return {
    start,

    async execute(request, options = {}) {
      const handle = start(request);
      const { signal } = options;
      const onAbort = (): void => {
        handle.cancel();
      };

      if (signal?.aborted) {
        handle.cancel();
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        return await handle.result;
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }
    },

    async getSubmissionStatus(reference) {
      const record = await journal.find(reference);
      if (!record || record.status === 'CONFIRMED' || record.status === 'FAILED') {
        return record;
      }

      const confirmation = await confirmSafely(chains[record.chain], record.txId, 0);
      if (confirmation.status === 'PENDING') {
        return record;
      }

      await journal.updateStatus(
        reference,
        confirmation.status,
        confirmation.status === 'FAILED' ? confirmation.error : undefined
      );
      return journal.find(reference);
    }
  };
}
