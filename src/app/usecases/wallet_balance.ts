import type { ChainRegistry } from '../ports/chain_port';
import type { LoggerPort } from '../ports/logger_port';
import type { MarketDataPort } from '../ports/market_data_port';
import { CHAIN_INFO } from '../../domain/chains';
import { InvalidInputError } from '../../domain/errors';
import type { Chain, WalletBalance } from '../../domain/model/types';
import { formatRawAmount } from '../../domain/utils/amounts';
import { toErrorMessage } from './usecase_utils';

export interface WalletBalanceDependencies {
  chains: ChainRegistry;
  marketData: MarketDataPort;
  logger: LoggerPort;
}

export async function getWalletBalance(
  dependencies: WalletBalanceDependencies,
  chain: Chain,
  address: string
): Promise<WalletBalance> {
  const { chains, marketData, logger } = dependencies;
  const chainPort = chains[chain];
  if (!chainPort.validateAddress(address)) {
    throw new InvalidInputError(`${address} is not a valid ${chain} address`);
  }

  const balanceRaw = await chainPort.getNativeBalance(address);
  const balance = formatRawAmount(balanceRaw, CHAIN_INFO[chain].nativeDecimals);

  let usdValue: number | null = null;
  try {
    const price = await marketData.fetchNativeUsdPrice(chain);
    usdValue = Number(balance) * price;
  } catch (error) {
    logger.warn('native USD price unavailable', { chain, error: toErrorMessage(error) });
  }

  return { chain, address, balanceRaw, balance, usdValue };
}
