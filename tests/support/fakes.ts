import { vi, type Mock } from 'vitest';
import type { LoggerPort } from '../../src/app/ports/logger_port';
import type { RedisLike } from '../../src/adapters/lock/redis_lock';
import { isRecord } from '../../src/adapters/http/fetch_json';

export interface TestLogger extends LoggerPort {
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createTestLogger(): TestLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

/** Map-backed stand-in for the redis commands the adapters use; EX is recorded, not enforced. */
export class FakeRedis implements RedisLike {
  readonly values = new Map<string, string>();

  readonly ttls = new Map<string, number>();

  async set(...args: unknown[]): Promise<string | null> {
    const [key, value, options] = args;
    if (typeof key !== 'string' || typeof value !== 'string') {
      throw new Error('FakeRedis.set expects string key and value');
    }

    if (isRecord(options) && options.NX === true && this.values.has(key)) {
      return null;
    }

    this.values.set(key, value);
    if (isRecord(options) && typeof options.EX === 'number') {
      this.ttls.set(key, options.EX);
    }
    return 'OK';
  }

  async get(...args: unknown[]): Promise<string | null> {
    const [key] = args;
    return typeof key === 'string' ? (this.values.get(key) ?? null) : null;
  }

  async expire(...args: unknown[]): Promise<boolean> {
    const [key, seconds] = args;
    if (typeof key !== 'string' || typeof seconds !== 'number' || !this.values.has(key)) {
      return false;
    }

    this.ttls.set(key, seconds);
    return true;
  }

  async del(...args: unknown[]): Promise<number> {
    const [key] = args;
    return typeof key === 'string' && this.values.delete(key) ? 1 : 0;
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}
