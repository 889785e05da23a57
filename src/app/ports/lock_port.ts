export interface LockPort {
  /** Resolves to an owner token, or null while another holder owns the wallet. */
  acquireWalletLock(walletAddress: string, ttlSeconds: number): Promise<string | null>;
  /** Restarts the TTL; false when `token` no longer owns the lock. */
  extendWalletLock(walletAddress: string, token: string, ttlSeconds: number): Promise<boolean>;
  releaseWalletLock(walletAddress: string, token: string): Promise<void>;
}
