import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { CHAIN_VALUES, type Chain, type SwapDirection, type WalletHandle } from '../src/domain/model/types';
import { SwapError } from '../src/domain/errors';
import { bootstrap, type SwapRuntime } from '../src/infra/bootstrap';

const USAGE = [
  'Usage:',
  '  npm run swap -- balance --chain SOLANA|TON --address <address>',
  '  npm run swap -- swap --chain <chain> --wallet <address> --secret-file <path> --direction NATIVE_TO_TOKEN|TOKEN_TO_NATIVE --asset <token> --amount <decimal> [--slippage-bps 100] [--reference <id>]',
  '  npm run swap -- withdraw --chain <chain> --wallet <address> --secret-file <path> --to <address> --amount <decimal> [--reference <id>]',
  '  npm run swap -- status --reference <id>'
].join('\n');

function parseFlags(argv: string[]): Map<string, string> {
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    const value = argv[i + 1];

    if (!key?.startsWith('--') || !value) {
      continue;
    }

    flags.set(key, value);
  }

  return flags;
}

function requireFlag(flags: Map<string, string>, name: string): string {
  const value = flags.get(name);
  if (!value) {
    throw new Error(`Missing ${name}\n${USAGE}`);
  }

  return value;
}

function parseChain(value: string): Chain {
  const chain = CHAIN_VALUES.find((candidate) => candidate === value.toUpperCase());
  if (!chain) {
    throw new Error(`Unknown chain ${value}, expected one of ${CHAIN_VALUES.join(', ')}`);
  }

  return chain;
}

function parseDirection(value: string): SwapDirection {
  if (value === 'NATIVE_TO_TOKEN' || value === 'TOKEN_TO_NATIVE') {
    return value;
  }

  throw new Error(`Unknown direction ${value}`);
}

function readWallet(flags: Map<string, string>): WalletHandle {
  return {
    chainAddress: requireFlag(flags, '--wallet'),
    encryptedSecret: readFileSync(requireFlag(flags, '--secret-file'), 'utf8').trim()
  };
}

function printJson(value: unknown): void {
  console.log(
    JSON.stringify(value, (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item), 2)
  );
}

async function runCommand(runtime: SwapRuntime, command: string, flags: Map<string, string>): Promise<void> {
  switch (command) {
    case 'balance':
      printJson(await runtime.walletBalance(parseChain(requireFlag(flags, '--chain')), requireFlag(flags, '--address')));
      return;
    case 'swap':
      printJson(
        await runtime.executor.execute({
          chain: parseChain(requireFlag(flags, '--chain')),
          wallet: readWallet(flags),
          direction: parseDirection(requireFlag(flags, '--direction')),
          counterAsset: requireFlag(flags, '--asset'),
          amount: requireFlag(flags, '--amount'),
          slippageBps: Number(flags.get('--slippage-bps') ?? '100'),
          clientReference: flags.get('--reference')
        })
      );
      return;
    case 'withdraw':
      printJson(
        await runtime.withdraw({
          chain: parseChain(requireFlag(flags, '--chain')),
          wallet: readWallet(flags),
          destination: requireFlag(flags, '--to'),
          amount: requireFlag(flags, '--amount'),
          clientReference: flags.get('--reference')
        })
      );
      return;
    case 'status':
      printJson(await runtime.executor.getSubmissionStatus(requireFlag(flags, '--reference')));
      return;
    default:
      throw new Error(USAGE);
  }
}

async function main(): Promise<void> {
  const [command = '', ...rest] = process.argv.slice(2);
  const runtime = await bootstrap();

  try {
    await runCommand(runtime, command, parseFlags(rest));
  } finally {
    await runtime.stop();
  }
}

void main().catch((error: unknown) => {
  if (error instanceof SwapError) {
    console.error(`[ERROR] ${error.kind}: ${error.message}`);
  } else {
    console.error('[ERROR] swap command failed', error);
  }
  process.exit(1);
});
