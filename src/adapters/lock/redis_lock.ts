import { randomUUID } from 'node:crypto';
import type { LockPort } from '../../app/ports/lock_port';
import type { LoggerPort } from '../../app/ports/logger_port';

const WALLET_LOCK_PREFIX = 'lock:wallet:';

export interface RedisLike {
  set(...args: unknown[]): Promise<string | null>;
  get(...args: unknown[]): Promise<string | null>;
  del(...args: unknown[]): Promise<number>;
  expire(...args: unknown[]): Promise<boolean | number>;
}

export class RedisLockAdapter implements LockPort {
  constructor(
    private readonly redis: RedisLike,
    private readonly logger: LoggerPort
  ) {}

  async acquireWalletLock(walletAddress: string, ttlSeconds: number): Promise<string | null> {
    const token = randomUUID();
    const result = await this.redis.set(`${WALLET_LOCK_PREFIX}${walletAddress}`, token, {
      NX: true,
      EX: ttlSeconds
    });

    return result === 'OK' ? token : null;
  }

  async extendWalletLock(walletAddress: string, token: string, ttlSeconds: number): Promise<boolean> {
    const key = `${WALLET_LOCK_PREFIX}${walletAddress}`;
    const currentToken = await this.redis.get(key);
    if (currentToken !== token) {
      this.logger.warn('Wallet lock token mismatch on extend', { walletAddress });
      return false;
    }

    const extended = await this.redis.expire(key, ttlSeconds);
    return extended === true || extended === 1;
  }

  async releaseWalletLock(walletAddress: string, token: string): Promise<void> {
    const key = `${WALLET_LOCK_PREFIX}${walletAddress}`;
    const currentToken = await this.redis.get(key);
    if (currentToken === token) {
      await this.redis.del(key);
    } else {
      this.logger.warn('Wallet lock token mismatch on release', { walletAddress });
    }
  }
}
