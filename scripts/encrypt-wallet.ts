import 'dotenv/config';
import { Keypair } from '@solana/web3.js';
import { mnemonicValidate } from '@ton/crypto';
import bs58 from 'bs58';
import { readFileSync, writeFileSync } from 'node:fs';
import { AesGcmSecretCodec } from '../src/adapters/crypto/aes_gcm_secret_codec';

interface CliArgs {
  chain: 'SOLANA' | 'TON';
  input?: string;
  base58?: string;
  mnemonicFile?: string;
  output?: string;
  passphrase: string;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function parseArgs(argv: string[]): CliArgs {
  const argMap = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    const value = argv[i + 1];

    if (!key?.startsWith('--') || !value) {
      continue;
    }

    argMap.set(key, value);
  }

  const chain = argMap.get('--chain')?.toUpperCase();
  const input = argMap.get('--input');
  const base58 = argMap.get('--base58');
  const mnemonicFile = argMap.get('--mnemonic-file');
  const passphrase = argMap.get('--passphrase') ?? process.env.WALLET_SECRET_PASSPHRASE;

  if ((chain !== 'SOLANA' && chain !== 'TON') || !passphrase) {
    throw new Error(
      'Usage: npm run encrypt-wallet -- --chain SOLANA (--input /path/id.json | --base58 "<private-key>") | --chain TON --mnemonic-file /path/words.txt [--output /path/wallet.secret] [--passphrase "..."]'
    );
  }

  if (chain === 'SOLANA' && Boolean(input) === Boolean(base58)) {
    throw new Error('Provide exactly one of --input or --base58 for a Solana wallet');
  }

  if (chain === 'TON' && !mnemonicFile) {
    throw new Error('--mnemonic-file is required for a TON wallet');
  }

  return {
    chain,
    input,
    base58,
    mnemonicFile,
    output: argMap.get('--output'),
    passphrase
  };
}

function seedFromSecretKey(secretKey: Uint8Array): Uint8Array {
  if (secretKey.length === 64) {
    return secretKey.slice(0, 32);
  }

  if (secretKey.length === 32) {
    return secretKey;
  }

  throw new Error(`Solana secret key length must be 32 or 64, got ${secretKey.length}`);
}

function loadSolanaSeed(args: CliArgs): { seed: Uint8Array; address: string } {
  let secretKey: Uint8Array;

  if (args.input) {
    const parsedUnknown: unknown = JSON.parse(readFileSync(args.input, 'utf8'));
    if (!isNumberArray(parsedUnknown)) {
      throw new Error('Wallet input must be a JSON number array');
    }
    secretKey = Uint8Array.from(parsedUnknown);
  } else {
    secretKey = bs58.decode((args.base58 ?? '').trim());
  }

  const seed = seedFromSecretKey(secretKey);
  return { seed, address: Keypair.fromSeed(seed).publicKey.toBase58() };
}

async function loadTonMnemonic(path: string): Promise<Uint8Array> {
  const words = readFileSync(path, 'utf8').trim().split(/\s+/);
  if (words.length !== 24 || !(await mnemonicValidate(words))) {
    throw new Error(`Mnemonic in ${path} is not a valid 24-word TON mnemonic`);
  }

  return Buffer.from(words.join(' '), 'utf8');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const codec = new AesGcmSecretCodec(args.passphrase);

  let plaintext: Uint8Array;
  if (args.chain === 'SOLANA') {
    const { seed, address } = loadSolanaSeed(args);
    console.log(`Solana wallet address: ${address}`);
    plaintext = seed;
  } else {
    plaintext = await loadTonMnemonic(args.mnemonicFile ?? '');
  }

  const encryptedSecret = codec.encrypt(plaintext);
  if (args.output) {
    writeFileSync(args.output, `${encryptedSecret}\n`, 'utf8');
    console.log(`Encrypted secret saved to ${args.output}`);
  } else {
    console.log(encryptedSecret);
  }
}

void main().catch((error: unknown) => {
  console.error('[ERROR] encrypt-wallet failed', error);
  process.exit(1);
});
