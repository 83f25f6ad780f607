import type {
  CachedTerm,
  CalculationResult,
  SequenceIndex,
  SequenceStrategy,
  TermLookup
} from '../../src/types/sequence.types.js';

export interface RecordingLookup<T> extends TermLookup<T> {
  calls: string[];
}

/**
 * Lookup over a fixed table that records every call as `get(n)` or
 * `closest(n)`
 */
export function createRecordingLookup<T>(table: Map<SequenceIndex, T> = new Map()): RecordingLookup<T> {
  const calls: string[] = [];
  return {
    calls,
    get(index: SequenceIndex): T | undefined {
      calls.push(`get(${index})`);
      return table.get(index);
    },
    closest(index: SequenceIndex): CachedTerm<T> | undefined {
      calls.push(`closest(${index})`);
      let best: CachedTerm<T> | undefined;
      for (const [key, value] of table) {
        if (key <= index && (best === undefined || key > best.index)) {
          best = { index: key, value };
        }
      }
      return best;
    }
  };
}

export interface CountingStrategy<T> extends SequenceStrategy<T> {
  computed: SequenceIndex[];
}

/**
 * Wrap a strategy, recording the index of every compute call
 */
export function withComputeCount<T>(strategy: SequenceStrategy<T>): CountingStrategy<T> {
  const computed: SequenceIndex[] = [];
  return {
    name: strategy.name,
    computed,
    compute(index: SequenceIndex, lookup: TermLookup<T>): CalculationResult<T> {
      computed.push(index);
      return strategy.compute(index, lookup);
    }
  };
}

export function valueOf<T>(result: CalculationResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
