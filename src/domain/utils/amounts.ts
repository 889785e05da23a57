import { InvalidInputError } from '../errors';
import type { SwapDirection } from '../model/types';

export const NATIVE_DECIMALS = 9;
export const PRICE_SCALE_DECIMALS = 18;
export const MAX_SLIPPAGE_BPS = 10_000;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Parses a human decimal string into smallest units of an asset with `decimals` places.
 * Extra fractional digits are rejected instead of rounded.
 */
export function parseDecimalAmount(amount: string, decimals: number): bigint {
  const match = DECIMAL_PATTERN.exec(amount.trim());
  if (!match) {
    throw new InvalidInputError(`Amount must be a plain decimal number, got "${amount}"`);
  }

  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new InvalidInputError(
      `Amount ${amount} has more than ${decimals} fractional digits`
    );
  }

  return BigInt(whole) * pow10(decimals) + BigInt(fraction.padEnd(decimals, '0') || '0');
}

export function formatRawAmount(raw: bigint, decimals: number): string {
  const negative = raw < 0n;
  const magnitude = negative ? -raw : raw;
  const base = pow10(decimals);
  const whole = magnitude / base;
  const fraction = (magnitude % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  const sign = negative ? '-' : '';

  return fraction ? `${sign}${whole.toString()}.${fraction}` : `${sign}${whole.toString()}`;
}

export function toSmallestUnit(amount: string): bigint {
  return parseDecimalAmount(amount, NATIVE_DECIMALS);
}

export function toHumanUnit(raw: bigint): string {
  return formatRawAmount(raw, NATIVE_DECIMALS);
}

export function isPositiveDecimal(amount: string): boolean {
  const match = DECIMAL_PATTERN.exec(amount.trim());
  if (!match) {
    return false;
  }

  return /[1-9]/.test(`${match[1] ?? ''}${match[2] ?? ''}`);
}

export function computeMinOutput(quotedOutputRaw: bigint, slippageBps: number): bigint {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > MAX_SLIPPAGE_BPS) {
    throw new InvalidInputError(`slippageBps must be an integer in 0..${MAX_SLIPPAGE_BPS}`);
  }

  return (quotedOutputRaw * BigInt(MAX_SLIPPAGE_BPS - slippageBps)) / BigInt(MAX_SLIPPAGE_BPS);
}

/**
 * Scales a provider price into an 18-decimal bigint. Returns null for anything that is
 * not a finite positive number.
 */
export function parseScaledPrice(price: string | number): bigint | null {
  let text: string;
  if (typeof price === 'number') {
    if (!Number.isFinite(price) || price <= 0) {
      return null;
    }
    text = price.toFixed(PRICE_SCALE_DECIMALS);
  } else {
    text = price.trim();
    if (!DECIMAL_PATTERN.test(text)) {
      const numeric = Number(text);
      if (text === '' || !Number.isFinite(numeric) || numeric <= 0) {
        return null;
      }
      text = numeric.toFixed(PRICE_SCALE_DECIMALS);
    }
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const fraction = (match[2] ?? '').slice(0, PRICE_SCALE_DECIMALS).padEnd(PRICE_SCALE_DECIMALS, '0');
  const scaled = BigInt(match[1] ?? '0') * pow10(PRICE_SCALE_DECIMALS) + BigInt(fraction);

  return scaled > 0n ? scaled : null;
}

/**
 * Converts an input amount through a price quoted in native units per token.
 */
export function convertWithNativePrice(
  direction: SwapDirection,
  amountInRaw: bigint,
  inputDecimals: number,
  outputDecimals: number,
  nativePerTokenScaled: bigint
): bigint {
  if (nativePerTokenScaled <= 0n) {
    return 0n;
  }

  if (direction === 'NATIVE_TO_TOKEN') {
    return (
      (amountInRaw * pow10(outputDecimals) * pow10(PRICE_SCALE_DECIMALS)) /
      (nativePerTokenScaled * pow10(inputDecimals))
    );
  }

  return (
    (amountInRaw * nativePerTokenScaled * pow10(outputDecimals)) /
    (pow10(PRICE_SCALE_DECIMALS) * pow10(inputDecimals))
  );
}

/**
 * Constant-product style impact heuristic, display only.
 */
export function estimatePriceImpactPct(
  tradeAmountUsd: number,
  liquidityUsd: number | undefined
): number | null {
  if (
    liquidityUsd === undefined ||
    !Number.isFinite(liquidityUsd) ||
    !Number.isFinite(tradeAmountUsd) ||
    liquidityUsd < 0 ||
    tradeAmountUsd < 0
  ) {
    return null;
  }

  const denominator = liquidityUsd + tradeAmountUsd;
  if (denominator <= 0) {
    return null;
  }

  return Math.min((tradeAmountUsd / denominator) * 100, 100);
}
