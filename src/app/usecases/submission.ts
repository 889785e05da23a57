import type { ChainPort, SecretMaterial, TransactionConfirmation, UnsignedTx } from '../ports/chain_port';
import type { LockPort } from '../ports/lock_port';
import type { LoggerPort } from '../ports/logger_port';
import type { SecretCodecPort } from '../ports/secret_codec_port';
import type { SubmissionJournalPort } from '../ports/submission_journal_port';
import {
  KeyDecryptionFailedError,
  NetworkTimeoutError,
  SubmissionFailedError,
  SwapCancelledError,
  WalletBusyError,
  isTransientError
} from '../../domain/errors';
import type { SubmissionStatus, WalletHandle } from '../../domain/model/types';
import { nowIso, sleep } from '../../domain/utils/time';
import { toErrorMessage } from './usecase_utils';

export interface ExecutionSettings {
  maxSubmissionAttempts: number;
  rpcRetryAttempts: number;
  rpcRetryBackoffMs: number;
  confirmTimeoutMs: number;
  lockTtlSeconds: number;
  lockWaitMs: number;
  lockPollIntervalMs: number;
}

export interface WalletLockWait {
  lock: LockPort;
  walletAddress: string;
  settings: Pick<ExecutionSettings, 'lockTtlSeconds' | 'lockWaitMs' | 'lockPollIntervalMs'>;
  signal?: AbortSignal;
  /** State reported when the wait is cancelled. */
  stateLabel?: string;
}

/** Polls the wallet lock until it is free or `lockWaitMs` has passed. */
export async function acquireWalletLock(wait: WalletLockWait): Promise<string> {
  const { lock, walletAddress, settings, signal } = wait;
  const deadline = Date.now() + settings.lockWaitMs;

  for (;;) {
    if (signal?.aborted) {
      throw new SwapCancelledError(wait.stateLabel ?? 'VALIDATED');
    }

    const token = await lock.acquireWalletLock(walletAddress, settings.lockTtlSeconds);
    if (token !== null) {
      return token;
    }

    if (Date.now() >= deadline) {
      throw new WalletBusyError(walletAddress);
    }
    await sleep(settings.lockPollIntervalMs);
  }
}

export interface WalletLockHold {
  /** False once an extension found the lock expired or owned by someone else. */
  held(): boolean;
  stop(): void;
}

export interface WalletLockKeepAlive {
  lock: LockPort;
  walletAddress: string;
  token: string;
  ttlSeconds: number;
  logger: LoggerPort;
}

/** Extends the wallet lock every third of its TTL until stopped. */
export function keepWalletLock(keepAlive: WalletLockKeepAlive): WalletLockHold {
  const { lock, walletAddress, token, ttlSeconds, logger } = keepAlive;
  let held = true;

  const timer = setInterval(
    () => {
      void lock.extendWalletLock(walletAddress, token, ttlSeconds).then(
        (extended) => {
          if (!extended && held) {
            held = false;
            logger.error('wallet lock lost while the operation was running', { wallet: walletAddress });
          }
        },
        (error: unknown) => {
          logger.warn('wallet lock extension failed', { wallet: walletAddress, error: toErrorMessage(error) });
        }
      );
    },
    Math.max(1, Math.floor((ttlSeconds * 1000) / 3))
  );

  return {
    held: () => held,
    stop: () => {
      clearInterval(timer);
    }
  };
}

export function decryptWalletSecret(
  codec: SecretCodecPort,
  chainPort: ChainPort,
  wallet: WalletHandle,
  logger: LoggerPort
): SecretMaterial {
  try {
    return chainPort.decodeSecretMaterial(codec.decrypt(wallet.encryptedSecret));
  } catch (error) {
    if (error instanceof KeyDecryptionFailedError) {
      logger.error('wallet secret decryption failed', {
        chain: chainPort.chain,
        wallet: wallet.chainAddress,
        error: error.message
      });
    }
    throw error;
  }
}

export type SubmissionStep = 'SIGNED' | 'SUBMITTED' | 'REBUILD';

export interface SubmissionLoop {
  chainPort: ChainPort;
  journal: SubmissionJournalPort;
  logger: LoggerPort;
  reference: string;
  walletAddress: string;
  secret: SecretMaterial;
  maxAttempts: number;
  firstTx: UnsignedTx;
  /** Builds and re-checks a fresh transaction after the node rejected the previous one. */
  rebuild: () => Promise<UnsignedTx>;
  onStep?: (step: SubmissionStep) => void;
}

export interface SubmissionOutcome {
  txId: string;
  attempts: number;
  /** The broadcast timed out; only confirmation can tell whether it landed. */
  broadcastUnconfirmed: boolean;
}

/**
 * Signs and broadcasts with the journal intent written before any byte leaves the process.
 * Explicit rejections are rebuilt up to `maxAttempts`; a broadcast without answer is never
 * sent again.
 */
export async function submitWithJournal(loop: SubmissionLoop): Promise<SubmissionOutcome> {
  const { chainPort, journal, logger, reference, walletAddress, secret, maxAttempts, onStep } = loop;
  let tx = loop.firstTx;

  for (let attempt = 1; ; attempt += 1) {
    const signed: { txId: string | null } = { txId: null };

    try {
      const txId = await chainPort.signAndSubmit(tx, secret, {
        async onSigned(txIdToSend) {
          signed.txId = txIdToSend;
          onStep?.('SIGNED');
          const timestamp = nowIso();
          await journal.recordIntent({
            reference,
            chain: chainPort.chain,
            walletAddress,
            txId: txIdToSend,
            attempt,
            status: 'INTENT',
            created_at: timestamp,
            updated_at: timestamp
          });
        }
      });

      onStep?.('SUBMITTED');
      return { txId, attempts: attempt, broadcastUnconfirmed: false };
    } catch (error) {
      const signedTxId = signed.txId;
      if (error instanceof NetworkTimeoutError && error.broadcastAttempted && signedTxId !== null) {
        logger.warn('broadcast unanswered, resolving by confirmation', {
          reference,
          tx_id: signedTxId,
          attempt
        });
        onStep?.('SUBMITTED');
        return { txId: signedTxId, attempts: attempt, broadcastUnconfirmed: true };
      }

      if (error instanceof KeyDecryptionFailedError) {
        logger.error('wallet key rejected at signing', {
          reference,
          chain: chainPort.chain,
          wallet: walletAddress,
          error: error.message
        });
      }

      if (signedTxId !== null) {
        await journal.updateStatus(reference, 'FAILED', toErrorMessage(error));
      }

      const rejected = error instanceof SubmissionFailedError && !error.landedOnChain;
      const transientBeforeSigning = signedTxId === null && isTransientError(error);
      if (attempt >= maxAttempts || (!rejected && !transientBeforeSigning)) {
        throw error;
      }

      logger.warn('submission rejected, rebuilding', {
        reference,
        attempt,
        error: toErrorMessage(error)
      });

      if (rejected) {
        if (signedTxId !== null) {
          onStep?.('REBUILD');
        }
        tx = await loop.rebuild();
      }
    }
  }
}

export async function confirmSafely(
  chainPort: ChainPort,
  txId: string,
  timeoutMs: number
): Promise<TransactionConfirmation> {
  try {
    return await chainPort.confirmTransaction(txId, timeoutMs);
  } catch (error) {
    return { status: 'PENDING', error: toErrorMessage(error) };
  }
}

/** Post-broadcast journal write; an outage is logged, never turned into a failed swap. */
export async function recordSubmissionStatus(
  journal: SubmissionJournalPort,
  logger: LoggerPort,
  reference: string,
  status: SubmissionStatus,
  error?: string
): Promise<void> {
  try {
    await journal.updateStatus(reference, status, error);
  } catch (journalError) {
    logger.error('submission journal update failed', {
      reference,
      status,
      error: toErrorMessage(journalError)
    });
  }
}
