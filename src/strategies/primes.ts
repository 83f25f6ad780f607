/**
 * Sequence of primes in ascending order, 1-indexed: P(1) = 2, P(10) = 29.
 * Index 0 lies outside the domain.
 *
 * The search is seeded from the closest cached term below the requested
 * index, when there is one.
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

export class Primes implements SequenceStrategy<TermValue> {
  readonly name = 'primes';

  compute(index: SequenceIndex, lookup: TermLookup<TermValue>): CalculationResult<TermValue> {
    if (!isValidIndex(index) || index === 0) {
      return fail(DomainErrorCode.INVALID_INDEX, this.name, index);
    }

    const seed = lookup.closest(index - 1);
    let position = seed?.index ?? 0;
    let prime = seed?.value ?? 0n;

    while (position < index) {
      prime = Primes.nextPrime(prime);
      position++;
      if (prime > MAX_TERM_VALUE) {
        return fail(DomainErrorCode.OVERFLOW, this.name, index);
      }
    }
    return ok(prime);
  }

  static isPrime(n: TermValue): boolean {
    if (n <= 1n) return false;
    if (n <= 3n) return true;
    if (n % 2n === 0n || n % 3n === 0n) return false;

    for (let step = 5n; step * step <= n; step += 6n) {
      if (n % step === 0n || n % (step + 2n) === 0n) {
        return false;
      }
    }
    return true;
  }

  /**
   * Smallest prime greater than `n`
   */
  static nextPrime(n: TermValue): TermValue {
    if (n < 2n) return 2n;
    if (n === 2n) return 3n;

    let candidate = n % 2n === 0n ? n + 1n : n + 2n;
    while (!Primes.isPrime(candidate)) {
      candidate += 2n;
    }
    return candidate;
  }
}
