/**
 * Sequence Evaluation Types
 * Strongly typed interfaces for strategies, lookups and evaluation results
 */

/** Position within a sequence; a non-negative safe integer. */
export type SequenceIndex = number;

/** Integer term value, bounded by the range of an unsigned 128-bit integer. */
export type TermValue = bigint;

export const MAX_TERM_VALUE: TermValue = (1n << 128n) - 1n;

export type SequenceName = 'fibonacci' | 'primes' | 'harmonic';

export interface CachedTerm<T> {
  index: SequenceIndex;
  value: T;
}

/**
 * Read-through access to terms the machine has already cached.
 * Every hit refreshes the recency of the entry it returns.
 */
export interface TermLookup<T> {
  get(index: SequenceIndex): T | undefined;
  /** Cached term with the greatest index not above `index`. */
  closest(index: SequenceIndex): CachedTerm<T> | undefined;
}

export interface SequenceStrategy<T> {
  readonly name: SequenceName;
  compute(index: SequenceIndex, lookup: TermLookup<T>): CalculationResult<T>;
}

// Enhanced error types for domain failures
export enum DomainErrorCode {
  INVALID_INDEX = 'INVALID_INDEX',
  OVERFLOW = 'OVERFLOW'
}

export interface DomainError extends Error {
  errorCode: DomainErrorCode;
  sequence: SequenceName;
  index: SequenceIndex;
}

export type CalculationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DomainError };

// Type guards
export function isDomainError(error: unknown): error is DomainError {
  if (!(error instanceof Error) || !('errorCode' in error) || !('sequence' in error) || !('index' in error)) {
    return false;
  }
  const errorCode = error.errorCode;
  return Object.values(DomainErrorCode).some(code => code === errorCode);
}

export function isValidIndex(index: unknown): index is SequenceIndex {
  return typeof index === 'number' && Number.isSafeInteger(index) && index >= 0;
}
