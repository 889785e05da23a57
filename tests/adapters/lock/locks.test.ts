import { describe, expect, it } from 'vitest';
import { MemoryLockAdapter } from '../../../src/adapters/lock/memory_lock';
import { RedisLockAdapter } from '../../../src/adapters/lock/redis_lock';
import { createTestLogger, FakeRedis } from '../../support/fakes';

describe('RedisLockAdapter', () => {
  it('holds one token per wallet with a TTL', async () => {
    const redis = new FakeRedis();
    const lock = new RedisLockAdapter(redis, createTestLogger());

    const token = await lock.acquireWalletLock('wallet-a', 180);

    expect(token).not.toBeNull();
    expect(redis.values.get('lock:wallet:wallet-a')).toBe(token);
    expect(redis.ttls.get('lock:wallet:wallet-a')).toBe(180);
    expect(await lock.acquireWalletLock('wallet-a', 180)).toBeNull();
    expect(await lock.acquireWalletLock('wallet-b', 180)).not.toBeNull();
  });

  it('releases only with the owner token', async () => {
    const redis = new FakeRedis();
    const logger = createTestLogger();
    const lock = new RedisLockAdapter(redis, logger);
    const token = await lock.acquireWalletLock('wallet-a', 60);

    await lock.releaseWalletLock('wallet-a', 'someone-else');
    expect(redis.values.has('lock:wallet:wallet-a')).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Wallet lock token mismatch on release', {
      walletAddress: 'wallet-a'
    });

    await lock.releaseWalletLock('wallet-a', token ?? '');
    expect(redis.values.has('lock:wallet:wallet-a')).toBe(false);
  });

  it('extends the TTL only for the owner token', async () => {
    const redis = new FakeRedis();
    const logger = createTestLogger();
    const lock = new RedisLockAdapter(redis, logger);
    const token = await lock.acquireWalletLock('wallet-a', 60);

    expect(await lock.extendWalletLock('wallet-a', token ?? '', 90)).toBe(true);
    expect(redis.ttls.get('lock:wallet:wallet-a')).toBe(90);

    expect(await lock.extendWalletLock('wallet-a', 'someone-else', 120)).toBe(false);
    expect(redis.ttls.get('lock:wallet:wallet-a')).toBe(90);
    expect(logger.warn).toHaveBeenCalledWith('Wallet lock token mismatch on extend', {
      walletAddress: 'wallet-a'
    });
  });

  it('reports a lock that already expired as lost', async () => {
    const redis = new FakeRedis();
    const lock = new RedisLockAdapter(redis, createTestLogger());
    const token = await lock.acquireWalletLock('wallet-a', 60);
    redis.values.delete('lock:wallet:wallet-a');

    expect(await lock.extendWalletLock('wallet-a', token ?? '', 60)).toBe(false);
  });
});

describe('MemoryLockAdapter', () => {
  it('pushes the expiry out when the owner extends', async () => {
    let now = 1_000;
    const lock = new MemoryLockAdapter(() => now);
    const token = await lock.acquireWalletLock('wallet-a', 10);

    now += 8_000;
    expect(await lock.extendWalletLock('wallet-a', token ?? '', 10)).toBe(true);
    now += 8_000;
    expect(await lock.acquireWalletLock('wallet-a', 10)).toBeNull();
    expect(await lock.extendWalletLock('wallet-a', 'stale', 10)).toBe(false);
  });

  it('refuses to extend a lock whose TTL has passed', async () => {
    let now = 1_000;
    const lock = new MemoryLockAdapter(() => now);
    const token = await lock.acquireWalletLock('wallet-a', 10);

    now += 10_000;
    expect(await lock.extendWalletLock('wallet-a', token ?? '', 10)).toBe(false);
  });

  it('frees the wallet once the TTL has passed', async () => {
    let now = 1_000;
    const lock = new MemoryLockAdapter(() => now);

    expect(await lock.acquireWalletLock('wallet-a', 10)).not.toBeNull();
    expect(await lock.acquireWalletLock('wallet-a', 10)).toBeNull();

    now += 10_000;
    expect(await lock.acquireWalletLock('wallet-a', 10)).not.toBeNull();
  });

  it('ignores a release with a stale token', async () => {
    const lock = new MemoryLockAdapter();
    const token = await lock.acquireWalletLock('wallet-a', 10);

    await lock.releaseWalletLock('wallet-a', 'stale');
    expect(await lock.acquireWalletLock('wallet-a', 10)).toBeNull();

    await lock.releaseWalletLock('wallet-a', token ?? '');
    expect(await lock.acquireWalletLock('wallet-a', 10)).not.toBeNull();
  });
});
