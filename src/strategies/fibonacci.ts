/**
 * Fibonacci sequence, 0-indexed: F(0) = 0, F(1) = 1, F(n) = F(n-2) + F(n-1).
 *
 * Both predecessors are read through the lookup, `n - 2` first. When either
 * is missing the term is computed iteratively from the base cases.
 */

import { fail, ok } from '../utils/error-handler.js';
import {
  CalculationResult,
  DomainErrorCode,
  isValidIndex,
  MAX_TERM_VALUE,
  SequenceIndex,
  SequenceStrategy,
  TermLookup,
  TermValue
} from '../types/sequence.types.js';

export class Fibonacci implements SequenceStrategy<TermValue> {
  readonly name = 'fibonacci';

  compute(index: SequenceIndex, lookup: TermLookup<TermValue>): CalculationResult<TermValue> {
    if (!isValidIndex(index)) {
      return fail(DomainErrorCode.INVALID_INDEX, this.name, index);
    }
    if (index < 2) {
      return ok(BigInt(index));
    }

    const beforePrevious = lookup.get(index - 2);
    const previous = beforePrevious === undefined ? undefined : lookup.get(index - 1);

    const value = beforePrevious !== undefined && previous !== undefined
      ? beforePrevious + previous
      : Fibonacci.iterate(index);

    if (value === undefined || value > MAX_TERM_VALUE) {
      return fail(DomainErrorCode.OVERFLOW, this.name, index);
    }
    return ok(value);
  }

  /**
   * Walk the recurrence up to `index`, giving up once a term leaves the
   * representable range
   */
  static iterate(index: SequenceIndex): TermValue | undefined {
    let [a, b] = [0n, 1n];
    for (let i = 0; i < index; i++) {
      [a, b] = [b, a + b];
      if (a > MAX_TERM_VALUE) return undefined;
    }
    return a;
  }
}
