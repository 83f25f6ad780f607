import { Fibonacci } from './fibonacci.js';
import { Harmonic } from './harmonic.js';
import { Primes } from './primes.js';
import type { SequenceName, SequenceStrategy, TermValue } from '../types/sequence.types.js';

export { Fibonacci, Harmonic, Primes };

export const SEQUENCE_NAMES: readonly SequenceName[] = ['fibonacci', 'primes', 'harmonic'];

export interface StrategyTypes {
  fibonacci: Fibonacci;
  primes: Primes;
  harmonic: Harmonic;
}

export type AnyStrategy = SequenceStrategy<TermValue> | SequenceStrategy<number>;

export function isSequenceName(name: string): name is SequenceName {
  return SEQUENCE_NAMES.some(known => known === name);
}

export function createStrategy<N extends SequenceName>(name: N): StrategyTypes[N];
export function createStrategy(name: SequenceName): AnyStrategy {
  switch (name) {
    case 'fibonacci': return new Fibonacci();
    case 'primes': return new Primes();
    case 'harmonic': return new Harmonic();
  }
}
