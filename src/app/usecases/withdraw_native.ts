import { randomUUID } from 'node:crypto';
import type { ChainRegistry } from '../ports/chain_port';
import type { LockPort } from '../ports/lock_port';
import type { LoggerPort } from '../ports/logger_port';
import type { SecretCodecPort } from '../ports/secret_codec_port';
import type { SubmissionJournalPort } from '../ports/submission_journal_port';
import { CHAIN_INFO } from '../../domain/chains';
import {
  InsufficientFundsError,
  InvalidInputError,
  SubmissionFailedError,
  WalletBusyError
} from '../../domain/errors';
import type { WithdrawRequest, WithdrawResult } from '../../domain/model/types';
import { isPositiveDecimal, parseDecimalAmount } from '../../domain/utils/amounts';
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

export interface WithdrawNativeDependencies {
  chains: ChainRegistry;
  codec: SecretCodecPort;
  lock: LockPort;
  journal: SubmissionJournalPort;
  logger: LoggerPort;
  settings: ExecutionSettings;
  createReference?: () => string;
}

export async function withdrawNative(
  dependencies: WithdrawNativeDependencies,
  request: WithdrawRequest
): Promise<WithdrawResult> {
  const { chains, codec, lock, journal, logger, settings } = dependencies;
  const chainPort = chains[request.chain];
  const walletAddress = request.wallet.chainAddress;
  const reference = request.clientReference ?? (dependencies.createReference ?? randomUUID)();
  const retryPolicy = { attempts: settings.rpcRetryAttempts, backoffMs: settings.rpcRetryBackoffMs };

  if (!isPositiveDecimal(request.amount)) {
    throw new InvalidInputError(`amount must be a positive decimal, got "${request.amount}"`);
  }
  const amountRaw = parseDecimalAmount(request.amount, CHAIN_INFO[request.chain].nativeDecimals);
  if (!chainPort.validateAddress(request.destination)) {
    throw new InvalidInputError(`destination ${request.destination} is not a valid ${request.chain} address`);
  }
  if (!chainPort.validateAddress(walletAddress)) {
    throw new InvalidInputError(`wallet ${walletAddress} is not a valid ${request.chain} address`);
  }

  const lockToken = await acquireWalletLock({ lock, walletAddress, settings });
  const hold = keepWalletLock({
    lock,
    walletAddress,
    token: lockToken,
    ttlSeconds: settings.lockTtlSeconds,
    logger
  });

  try {
    if (request.clientReference !== undefined) {
      const existing = await journal.find(reference);
      if (existing) {
        throw new InvalidInputError(`Reference ${reference} already has a submission (${existing.status})`);
      }
    }

    const balanceBefore = await retryTransient('getNativeBalance', retryPolicy, logger, () =>
      chainPort.getNativeBalance(walletAddress)
    );
    const requiredRaw = amountRaw + chainPort.gasReserveRaw('TRANSFER');
    if (balanceBefore < requiredRaw) {
      throw new InsufficientFundsError('NATIVE', requiredRaw, balanceBefore);
    }

    const buildTx = async () => {
      const tx = await retryTransient('buildTransferTransaction', retryPolicy, logger, () =>
        chainPort.buildTransferTransaction({
          from: walletAddress,
          to: request.destination,
          amountRaw
        })
      );
      if (tx.requiredNativeRaw > balanceBefore) {
        throw new InsufficientFundsError('NATIVE', tx.requiredNativeRaw, balanceBefore);
      }
      if (!hold.held()) {
        throw new WalletBusyError(walletAddress);
      }
      return tx;
    };

    const firstTx = await buildTx();
    const secret = decryptWalletSecret(codec, chainPort, request.wallet, logger);
    const { txId } = await submitWithJournal({
      chainPort,
      journal,
      logger,
      reference,
      walletAddress,
      secret,
      maxAttempts: settings.maxSubmissionAttempts,
      firstTx,
      rebuild: buildTx
    });

    const confirmation = await confirmSafely(chainPort, txId, settings.confirmTimeoutMs);
    const summary = {
      reference,
      chain: request.chain,
      txId,
      explorerUrl: chainPort.explorerUrl(confirmation.transactionHash ?? txId),
      amountRaw
    };

    if (confirmation.status === 'FAILED') {
      await recordSubmissionStatus(journal, logger, reference, 'FAILED', confirmation.error);
      throw new SubmissionFailedError(
        `Withdrawal ${txId} failed on chain: ${confirmation.error ?? 'no detail'}`,
        true
      );
    }

    if (confirmation.status === 'PENDING') {
      await recordSubmissionStatus(journal, logger, reference, 'UNKNOWN', confirmation.error);
      logger.warn('withdrawal outcome unknown, query status by reference', { reference, tx_id: txId });
      return { ...summary, success: false, outcome: 'UNKNOWN', gasConsumedRaw: null };
    }

    await recordSubmissionStatus(journal, logger, reference, 'CONFIRMED');

    let gasConsumedRaw: bigint | null = null;
    try {
      const balanceAfter = await chainPort.getNativeBalance(walletAddress);
      const gas = balanceBefore - balanceAfter - amountRaw;
      gasConsumedRaw = gas >= 0n ? gas : null;
    } catch (error) {
      logger.warn('post-withdrawal reconciliation failed', { reference, error: toErrorMessage(error) });
    }

    logger.info('withdrawal confirmed', { reference, tx_id: txId, gas_raw: gasConsumedRaw });
    return { ...summary, success: true, outcome: 'CONFIRMED', gasConsumedRaw };
  } finally {
    hold.stop();
    try {
      await lock.releaseWalletLock(walletAddress, lockToken);
    } catch (error) {
      logger.warn('wallet lock release failed', { wallet: walletAddress, error: toErrorMessage(error) });
    }
  }
}
