import { z } from 'zod';

const configSchema = z.object({
  SELECTOR_CACHE_SIZE: z.coerce.number().int().min(1).default(1024),
  SELECTOR_MAX_DEPTH: z.coerce.number().int().min(1).default(100),
  SELECTOR_MAX_LENGTH: z.coerce.number().int().min(1).default(4096),
});

export type SelectorConfig = {
  cacheSize: number;
  maxDepth: number;
  maxLength: number;
};

export const DEFAULT_MAX_DEPTH = 100;
export const DEFAULT_MAX_LENGTH = 4096;

export function loadSelectorConfig(env: Record<string, string | undefined> = process.env): SelectorConfig {
  const parsed = configSchema.parse({
    SELECTOR_CACHE_SIZE: blankToUndefined(env.SELECTOR_CACHE_SIZE),
    SELECTOR_MAX_DEPTH: blankToUndefined(env.SELECTOR_MAX_DEPTH),
    SELECTOR_MAX_LENGTH: blankToUndefined(env.SELECTOR_MAX_LENGTH),
  });

  return {
    cacheSize: parsed.SELECTOR_CACHE_SIZE,
    maxDepth: parsed.SELECTOR_MAX_DEPTH,
    maxLength: parsed.SELECTOR_MAX_LENGTH,
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  return value;
}
