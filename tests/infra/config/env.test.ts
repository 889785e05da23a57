import { describe, expect, it } from 'vitest';
import { loadEnv } from '../../../src/infra/config/env';

const baseEnv = {
  SOLANA_RPC_URLS: 'https://rpc-a.example, https://rpc-b.example ,',
  TON_RPC_URLS: 'https://ton-a.example/jsonRPC,https://ton-b.example/jsonRPC',
  WALLET_SECRET_PASSPHRASE: 'test-secret'
};

describe('loadEnv', () => {
  it('splits the Solana failover list', () => {
    const env = loadEnv(baseEnv);

    expect(env.SOLANA_RPC_URLS).toEqual(['https://rpc-a.example', 'https://rpc-b.example']);
    expect(env.TON_RPC_URLS).toEqual(['https://ton-a.example/jsonRPC', 'https://ton-b.example/jsonRPC']);
    expect(env.REDIS_URL).toBeUndefined();
  });

  it('treats blank optional values as unset', () => {
    const env = loadEnv({ ...baseEnv, JUPITER_API_KEY: '  ', REDIS_URL: 'redis://localhost:6379' });

    expect(env.JUPITER_API_KEY).toBeUndefined();
    expect(env.REDIS_URL).toBe('redis://localhost:6379');
  });

  it('lists every missing required variable', () => {
    expect(() => loadEnv({ TON_RPC_URLS: 'https://ton.example' })).toThrowError(
      'Missing required env vars: SOLANA_RPC_URLS, WALLET_SECRET_PASSPHRASE'
    );
  });

  it('rejects an empty failover list', () => {
    expect(() => loadEnv({ ...baseEnv, SOLANA_RPC_URLS: ' , ' })).toThrowError(
      'SOLANA_RPC_URLS must list at least one endpoint'
    );
  });

  it('rejects an empty TON failover list', () => {
    expect(() => loadEnv({ ...baseEnv, TON_RPC_URLS: ',' })).toThrowError(
      'TON_RPC_URLS must list at least one endpoint'
    );
  });
});
