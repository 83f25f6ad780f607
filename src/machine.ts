/**
 * Memoizing sequence evaluator
 *
 * A Machine binds one sequence strategy to one bounded cache. Evaluation goes
 * through `lruCalculate`, which reads the cache first and on a miss runs the
 * strategy with a lookup that reads through the same cache.
 *
 * Evaluation is synchronous and mutates the cache, including during nested
 * lookups. Callers sharing a Machine between tasks serialize access
 * themselves.
 */

import { getMachineConfig } from './config/machine-config.js';
import { LRUCache } from './utils/lru-cache.js';
import type { CacheStats } from './utils/lru-cache.js';
import { createDomainError, ErrorHandler } from './utils/error-handler.js';
import { getLogger } from './utils/logger.js';
import {
  CalculationResult,
  CachedTerm,
  DomainErrorCode,
  isValidIndex,
  SequenceIndex,
  SequenceStrategy,
  TermLookup
} from './types/sequence.types.js';

const logger = getLogger('machine');

const byIndex = (a: SequenceIndex, b: SequenceIndex): number => a - b;

export interface MachineOptions {
  capacity?: number;
  maxAge?: number;
}

/**
 * Read-only window onto a machine's cache
 */
export interface CacheView<K> {
  size(): number;
  has(key: K): boolean;
  /** Keys from least to most recently used, as a copy. */
  keys(): K[];
  getStats(): CacheStats;
  getClock(): number;
  prune(): number;
}

let storeOf: <T>(machine: Machine<T>) => LRUCache<SequenceIndex, T>;

export class Machine<T> {
  private store: LRUCache<SequenceIndex, T>;

  static {
    storeOf = machine => machine.store;
  }

  constructor(
    readonly strategy: SequenceStrategy<T>,
    capacity: number,
    maxAge: number
  ) {
    this.store = new LRUCache<SequenceIndex, T>({ maxSize: capacity, maxAge });
  }

  /** The store itself stays private; only `lruCalculate` writes to it. */
  get cache(): CacheView<SequenceIndex> {
    const store = this.store;
    return {
      size: () => store.size(),
      has: (key: SequenceIndex) => store.has(key),
      keys: () => Array.from(store.keys()),
      getStats: () => store.getStats(),
      getClock: () => store.getClock(),
      prune: () => store.prune()
    };
  }

  get capacity(): number {
    return this.store.maxSize;
  }

  get maxAge(): number {
    return this.store.maxAge;
  }

  /**
   * Copy of this machine with an independent deep copy of its cache
   */
  clone(): Machine<T> {
    const copy = new Machine(this.strategy, this.capacity, this.maxAge);
    copy.store = this.store.clone();
    return copy;
  }
}

/**
 * Build a machine whose bounds come from the loaded configuration
 */
export function createMachine<T>(strategy: SequenceStrategy<T>, options: MachineOptions = {}): Machine<T> {
  const config = getMachineConfig();
  return new Machine(strategy, options.capacity ?? config.capacity, options.maxAge ?? config.maxAge);
}

function cacheLookup<T>(cache: LRUCache<SequenceIndex, T>): TermLookup<T> {
  return {
    get: (index: SequenceIndex): T | undefined => cache.get(index),
    closest: (index: SequenceIndex): CachedTerm<T> | undefined => {
      const found = cache.closest(index, byIndex);
      return found && { index: found.key, value: found.value };
    }
  };
}

const emptyLookup: TermLookup<never> = {
  get: () => undefined,
  closest: () => undefined
};

/**
 * Nth term of the machine's sequence, served from the cache when present and
 * cached after a successful computation otherwise. Domain errors leave the
 * cache untouched.
 */
export function lruCalculate<T>(machine: Machine<T>, index: SequenceIndex): CalculationResult<T> {
  const { strategy } = machine;
  const cache = storeOf(machine);

  if (!isValidIndex(index)) {
    const error = createDomainError(DomainErrorCode.INVALID_INDEX, strategy.name, index);
    ErrorHandler.report(error);
    return { ok: false, error };
  }

  const cached = cache.get(index);
  if (cached !== undefined) {
    logger.debug({ module: 'machine', action: 'hit', sequence: strategy.name, index }, `Cache hit for ${strategy.name}(${index})`);
    return { ok: true, value: cached };
  }

  logger.debug({ module: 'machine', action: 'miss', sequence: strategy.name, index }, `Cache miss for ${strategy.name}(${index})`);
  const result = strategy.compute(index, cacheLookup(cache));
  if (!result.ok) {
    ErrorHandler.report(result.error);
    return result;
  }

  cache.set(index, result.value);
  return result;
}

/**
 * Compute a term through the strategy alone, without reading or writing the
 * cache
 */
export function rawCalculate<T>(machine: Machine<T>, index: SequenceIndex): CalculationResult<T> {
  const result = machine.strategy.compute(index, emptyLookup);
  if (!result.ok) {
    ErrorHandler.report(result.error);
  }
  return result;
}
