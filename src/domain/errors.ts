export type SwapErrorKind =
  | 'INVALID_INPUT'
  | 'NO_LIQUIDITY_DATA'
  | 'INSUFFICIENT_FUNDS'
  | 'KEY_DECRYPTION_FAILED'
  | 'RPC_UNAVAILABLE'
  | 'NETWORK_TIMEOUT'
  | 'SUBMISSION_FAILED'
  | 'WALLET_BUSY'
  | 'CANCELLED';

export type FundsAsset = 'NATIVE' | 'TOKEN';

export class SwapError extends Error {
  constructor(
    readonly kind: SwapErrorKind,
    message: string,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = 'SwapError';
  }
}

export class InvalidInputError extends SwapError {
  constructor(message: string) {
    super('INVALID_INPUT', message, false);
    this.name = 'InvalidInputError';
  }
}

export interface ProviderFailure {
  provider: string;
  reason: string;
}

export class NoLiquidityDataError extends SwapError {
  constructor(readonly failures: ProviderFailure[]) {
    const detail = failures.map((failure) => `${failure.provider}: ${failure.reason}`).join('; ');
    super('NO_LIQUIDITY_DATA', `No usable quote from any provider (${detail || 'none configured'})`, true);
    this.name = 'NoLiquidityDataError';
  }
}

export class InsufficientFundsError extends SwapError {
  readonly shortfallRaw: bigint;

  constructor(
    readonly asset: FundsAsset,
    readonly requiredRaw: bigint,
    readonly availableRaw: bigint
  ) {
    super(
      'INSUFFICIENT_FUNDS',
      `Insufficient ${asset.toLowerCase()} balance: required ${requiredRaw.toString()}, available ${availableRaw.toString()}`,
      false
    );
    this.name = 'InsufficientFundsError';
    this.shortfallRaw = requiredRaw - availableRaw;
  }
}

export class KeyDecryptionFailedError extends SwapError {
  constructor(message: string) {
    super('KEY_DECRYPTION_FAILED', message, false);
    this.name = 'KeyDecryptionFailedError';
  }
}

export class RpcUnavailableError extends SwapError {
  constructor(message: string) {
    super('RPC_UNAVAILABLE', message, true);
    this.name = 'RpcUnavailableError';
  }
}

export class NetworkTimeoutError extends SwapError {
  constructor(
    message: string,
    readonly broadcastAttempted = false
  ) {
    super('NETWORK_TIMEOUT', message, !broadcastAttempted);
    this.name = 'NetworkTimeoutError';
  }
}

export class SubmissionFailedError extends SwapError {
  constructor(
    message: string,
    readonly landedOnChain = false
  ) {
    // a transaction that failed on chain was broadcast, rebuilding it is a new swap
    super('SUBMISSION_FAILED', message, !landedOnChain);
    this.name = 'SubmissionFailedError';
  }
}

export class WalletBusyError extends SwapError {
  constructor(walletAddress: string) {
    super('WALLET_BUSY', `Another operation is in flight for wallet ${walletAddress}`, true);
    this.name = 'WalletBusyError';
  }
}

export class SwapCancelledError extends SwapError {
  constructor(state: string) {
    super('CANCELLED', `Swap cancelled in state ${state}`, true);
    this.name = 'SwapCancelledError';
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof RpcUnavailableError || error instanceof NetworkTimeoutError;
}
