export interface Env {
  SOLANA_RPC_URLS: string[];
  TON_RPC_URLS: string[];
  TON_RPC_API_KEY?: string;
  TONAPI_KEY?: string;
  JUPITER_API_KEY?: string;
  WALLET_SECRET_PASSPHRASE: string;
  REDIS_URL?: string;
  SWAP_CONFIG_PATH?: string;
}

const REQUIRED_ENV_KEYS = ['SOLANA_RPC_URLS', 'TON_RPC_URLS', 'WALLET_SECRET_PASSPHRASE'] as const;

function readOptional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key]?.trim();
  return value ? value : undefined;
}

function readRequired(source: NodeJS.ProcessEnv, key: (typeof REQUIRED_ENV_KEYS)[number]): string {
  const value = readOptional(source, key);
  if (value === undefined) {
    throw new Error(`Missing required env vars: ${key}`);
  }

  return value;
}

function readEndpointList(source: NodeJS.ProcessEnv, key: (typeof REQUIRED_ENV_KEYS)[number]): string[] {
  const urls = readRequired(source, key)
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);

  if (urls.length === 0) {
    throw new Error(`${key} must list at least one endpoint`);
  }

  return urls;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const missing = REQUIRED_ENV_KEYS.filter((key) => readOptional(source, key) === undefined);

  if (missing.length > 0) {
    throw new Error(`Missing required env vars: ${missing.join(', ')}`);
  }

  return {
    SOLANA_RPC_URLS: readEndpointList(source, 'SOLANA_RPC_URLS'),
    TON_RPC_URLS: readEndpointList(source, 'TON_RPC_URLS'),
    TON_RPC_API_KEY: readOptional(source, 'TON_RPC_API_KEY'),
    TONAPI_KEY: readOptional(source, 'TONAPI_KEY'),
    JUPITER_API_KEY: readOptional(source, 'JUPITER_API_KEY'),
    WALLET_SECRET_PASSPHRASE: readRequired(source, 'WALLET_SECRET_PASSPHRASE'),
    REDIS_URL: readOptional(source, 'REDIS_URL'),
    SWAP_CONFIG_PATH: readOptional(source, 'SWAP_CONFIG_PATH')
  };
}
