/**
 * Partial sums of the harmonic series, 0-indexed: H(0) = 0,
 * H(n) = H(n-1) + 1/n.
 *
 * Resuming from a cached partial sum performs the same float additions in
 * the same order as a cold run, so both paths agree bit for bit.
 */

import { fail, ok } from '../utils/error-handler.js';
import {
  CalculationResult,
  DomainErrorCode,
  isValidIndex,
  SequenceIndex,
  SequenceStrategy,
  TermLookup
} from '../types/sequence.types.js';

export class Harmonic implements SequenceStrategy<number> {
  readonly name = 'harmonic';

  compute(index: SequenceIndex, lookup: TermLookup<number>): CalculationResult<number> {
    if (!isValidIndex(index)) {
      return fail(DomainErrorCode.INVALID_INDEX, this.name, index);
    }
    if (index === 0) {
      return ok(0);
    }

    const seed = lookup.closest(index - 1);
    let sum = seed?.value ?? 0;
    for (let k = (seed?.index ?? 0) + 1; k <= index; k++) {
      sum += 1 / k;
    }

    if (!Number.isFinite(sum)) {
      return fail(DomainErrorCode.OVERFLOW, this.name, index);
    }
    return ok(sum);
  }
}
