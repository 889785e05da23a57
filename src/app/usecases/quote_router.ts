import type { LoggerPort } from '../ports/logger_port';
import type { PriceProviderPort } from '../ports/price_provider_port';
import { CHAIN_INFO } from '../../domain/chains';
import { NetworkTimeoutError, NoLiquidityDataError, type ProviderFailure } from '../../domain/errors';
import type { ProviderQuoteRequest, Quote, QuoteRequest } from '../../domain/model/types';
import { parseDecimalAmount } from '../../domain/utils/amounts';
import { withTimeout } from '../../domain/utils/time';
import { toErrorMessage } from './usecase_utils';

export interface QuoteRouterDependencies {
  /** Priority order; each chain only consults the providers registered for it. */
  providers: PriceProviderPort[];
  logger: LoggerPort;
  providerTimeoutMs: number;
}

export interface QuoteRouter {
  quote(request: QuoteRequest): Promise<Quote>;
}

export function toProviderRequest(request: QuoteRequest): ProviderQuoteRequest {
  const nativeDecimals = CHAIN_INFO[request.chain].nativeDecimals;
  const nativeIn = request.direction === 'NATIVE_TO_TOKEN';
  const inputDecimals = nativeIn ? nativeDecimals : request.tokenDecimals;

  return {
    ...request,
    amountInRaw: parseDecimalAmount(request.amountHuman, inputDecimals),
    inputDecimals,
    outputDecimals: nativeIn ? request.tokenDecimals : nativeDecimals
  };
}

export function createQuoteRouter(dependencies: QuoteRouterDependencies): QuoteRouter {
  const { providers, logger, providerTimeoutMs } = dependencies;

  return {
    async quote(request) {
      const providerRequest = toProviderRequest(request);
      const failures: ProviderFailure[] = [];

      for (const provider of providers.filter((candidate) => candidate.chain === request.chain)) {
        const controller = new AbortController();
        try {
          const quote = await withTimeout(
            provider.tryQuote(providerRequest, controller.signal),
            providerTimeoutMs,
            () => new NetworkTimeoutError(`${provider.name} quote timed out after ${providerTimeoutMs}ms`)
          );

          if (quote && quote.outputAmountRaw > 0n) {
            logger.info('quote selected', {
              chain: request.chain,
              source: quote.source,
              counter_asset: request.counterAsset,
              output_raw: quote.outputAmountRaw
            });
            return quote;
          }

          failures.push({ provider: provider.name, reason: 'no usable price' });
        } catch (error) {
          failures.push({ provider: provider.name, reason: toErrorMessage(error) });
          logger.warn('quote provider failed', {
            chain: request.chain,
            provider: provider.name,
            error: toErrorMessage(error)
          });
        } finally {
          controller.abort();
        }
      }

      throw new NoLiquidityDataError(failures);
    }
  };
}
