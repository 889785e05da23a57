import { randomUUID } from 'node:crypto';
import type { LockPort } from '../../app/ports/lock_port';

interface HeldLock {
  token: string;
  expiresAt: number;
}

/** Single-process wallet lock with the same token and TTL semantics as the Redis adapter. */
export class MemoryLockAdapter implements LockPort {
  private readonly held = new Map<string, HeldLock>();

  constructor(private readonly now: () => number = Date.now) {}

  async acquireWalletLock(walletAddress: string, ttlSeconds: number): Promise<string | null> {
    const current = this.held.get(walletAddress);
    if (current && current.expiresAt > this.now()) {
      return null;
    }

    const token = randomUUID();
    this.held.set(walletAddress, { token, expiresAt: this.now() + ttlSeconds * 1000 });
    return token;
  }

  async extendWalletLock(walletAddress: string, token: string, ttlSeconds: number): Promise<boolean> {
    const current = this.held.get(walletAddress);
    if (!current || current.token !== token || current.expiresAt <= this.now()) {
      return false;
    }

    current.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  async releaseWalletLock(walletAddress: string, token: string): Promise<void> {
    if (this.held.get(walletAddress)?.token === token) {
      this.held.delete(walletAddress);
    }
  }
}
