import { readFileSync } from 'node:fs';
import { swapConfigSchema, type SwapConfig } from './schema';

export function parseSwapConfig(raw: unknown): SwapConfig {
  const parsed = swapConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`swap config schema validation failed: ${parsed.error.message}`);
  }

  return parsed.data;
}

export function loadSwapConfig(path?: string): SwapConfig {
  if (!path) {
    return parseSwapConfig({});
  }

  const payload: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSwapConfig(payload);
}
