import { compileSelector, type Selector } from '@/core/selector';
import { loadSelectorConfig } from '@/lib/config';
import { SelectorError } from '@/lib/errors';
import type { ParseOptions } from '@/lib/selector/parser';

const DEFAULT_SELECTOR_CACHE_SIZE = 1024;

export type SelectorCacheOptions = ParseOptions & {
  maxEntries?: number;
  logger?: Pick<Console, 'warn'>;
};

/**
 * Compiled selectors keyed by their exact source text, least recently used
 * evicted first. Compile failures are rethrown and never stored.
 *
 * Eviction only drops the cache's strong reference: while any subscriber
 * still holds an evicted selector, the same instance is handed back for its
 * text instead of a second compile.
 */
export class SelectorCache {
  private readonly maxEntries: number;
  private readonly parseOptions: ParseOptions;
  private readonly logger: Pick<Console, 'warn'>;
  private readonly cache = new Map<string, Selector>();
  private readonly live = new Map<string, WeakRef<Selector>>();
  private readonly collected = new FinalizationRegistry<string>((expression) => {
    if (this.live.get(expression)?.deref() === undefined) {
      this.live.delete(expression);
    }
  });

  constructor(options: SelectorCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_SELECTOR_CACHE_SIZE;
    const safeMax = Number.isFinite(maxEntries) ? Math.max(1, Math.floor(maxEntries)) : DEFAULT_SELECTOR_CACHE_SIZE;
    this.maxEntries = safeMax;
    this.parseOptions = { maxDepth: options.maxDepth, maxLength: options.maxLength };
    this.logger = options.logger ?? console;
  }

  getOrCompile(expression: string): Selector {
    const cached = this.cache.get(expression);
    if (cached) {
      this.cache.delete(expression);
      this.cache.set(expression, cached);
      return cached;
    }

    const retained = this.live.get(expression)?.deref();
    if (retained) {
      this.remember(expression, retained);
      return retained;
    }

    let compiled: Selector;
    try {
      compiled = compileSelector(expression, this.parseOptions);
    } catch (error) {
      if (error instanceof SelectorError) {
        this.logger.warn(`rejected selector at position ${error.position}: ${error.message}`);
      }
      throw error;
    }

    this.live.set(expression, new WeakRef(compiled));
    this.collected.register(compiled, expression);
    this.remember(expression, compiled);

    return compiled;
  }

  has(expression: string): boolean {
    return this.cache.has(expression);
  }

  size(): number {
    return this.cache.size;
  }

  /**
   * Drops every resident entry. Selectors still held elsewhere keep their
   * identity for later lookups.
   */
  clear(): void {
    this.cache.clear();
  }

  private remember(expression: string, selector: Selector): void {
    this.cache.set(expression, selector);

    if (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next().value;
      if (typeof oldest === 'string') {
        this.cache.delete(oldest);
      }
    }
  }
}

let sharedCache: SelectorCache | null = null;

export function getSelectorCache(): SelectorCache {
  if (sharedCache) {
    return sharedCache;
  }

  const config = loadSelectorConfig();
  sharedCache = new SelectorCache({
    maxEntries: config.cacheSize,
    maxDepth: config.maxDepth,
    maxLength: config.maxLength,
  });

  return sharedCache;
}

export function getOrCompileSelector(expression: string): Selector {
  return getSelectorCache().getOrCompile(expression);
}

export function resetSelectorCache(): void {
  sharedCache = null;
}
