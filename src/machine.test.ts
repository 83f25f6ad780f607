import { jest } from '@jest/globals';
import { createMachine, lruCalculate, Machine, rawCalculate } from './machine.js';
import { resetMachineConfig, updateMachineConfig } from './config/machine-config.js';
import { Fibonacci } from './strategies/fibonacci.js';
import { Harmonic } from './strategies/harmonic.js';
import { Primes } from './strategies/primes.js';
import { DomainErrorCode } from './types/sequence.types.js';
import { valueOf, withComputeCount } from '../test/helpers/index.js';

describe('lruCalculate', () => {
  describe('cache behaviour', () => {
    it('should evict the least recently used term and recompute it later', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 2, 100);

      expect(valueOf(lruCalculate(machine, 0))).toBe(0n);
      expect(valueOf(lruCalculate(machine, 1))).toBe(1n);
      expect(valueOf(lruCalculate(machine, 2))).toBe(1n);
      expect(machine.cache.keys()).toEqual([1, 2]);

      expect(valueOf(lruCalculate(machine, 0))).toBe(0n);
      expect(machine.cache.keys()).toEqual([2, 0]);
      expect(strategy.computed).toEqual([0, 1, 2, 0]);
      expect(machine.cache.getClock()).toBe(6);
    });

    it('should serve repeated requests from the cache', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 4, 50);

      expect(valueOf(lruCalculate(machine, 10))).toBe(55n);
      expect(valueOf(lruCalculate(machine, 10))).toBe(55n);

      expect(strategy.computed).toEqual([10]);
      expect(machine.cache.getStats().hits).toBe(1);
    });

    it('should evict the first of capacity + 1 distinct terms', () => {
      const machine = new Machine(new Fibonacci(), 3, 100);

      for (const index of [10, 20, 30, 40]) {
        lruCalculate(machine, index);
      }

      expect(machine.cache.keys()).toEqual([20, 30, 40]);
    });

    it('should refresh the recency of terms read during computation', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 3, 100);

      lruCalculate(machine, 8);
      lruCalculate(machine, 9);
      lruCalculate(machine, 5);

      expect(valueOf(lruCalculate(machine, 10))).toBe(55n);
      expect(machine.cache.keys()).toEqual([8, 9, 10]);
      expect(strategy.computed).toEqual([8, 9, 5, 10]);
    });

    it('should let a term expire after one tick when max age is zero', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 10, 0);

      expect(valueOf(lruCalculate(machine, 5))).toBe(5n);
      expect(valueOf(lruCalculate(machine, 5))).toBe(5n);
      expect(valueOf(lruCalculate(machine, 7))).toBe(13n);
      expect(machine.cache.has(5)).toBe(false);

      expect(valueOf(lruCalculate(machine, 5))).toBe(5n);
      expect(strategy.computed).toEqual([5, 7, 5]);
      expect(machine.cache.keys()).toEqual([5]);
    });

    it('should retain nothing with a capacity of zero', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 0, 10);

      expect(valueOf(lruCalculate(machine, 10))).toBe(55n);
      expect(valueOf(lruCalculate(machine, 10))).toBe(55n);

      expect(strategy.computed).toEqual([10, 10]);
      expect(machine.cache.size()).toBe(0);
    });

    it('should keep both bounds across a long run of requests', () => {
      const machine = new Machine(new Fibonacci(), 5, 6);
      let seed = 17;

      for (let i = 0; i < 200; i++) {
        seed = (seed * 75 + 74) % 65537;
        const index = seed % 60;

        expect(lruCalculate(machine, index)).toEqual(rawCalculate(machine, index));
        expect(machine.cache.size()).toBeLessThanOrEqual(5);
      }
      expect(machine.cache.prune()).toBe(0);
    });
  });

  describe('cache transparency', () => {
    it('should match direct computation for every index', () => {
      const fibonacci = new Machine(new Fibonacci(), 8, 20);
      const primes = new Machine(new Primes(), 8, 20);

      for (let index = 0; index <= 40; index++) {
        expect(lruCalculate(fibonacci, index)).toEqual(rawCalculate(fibonacci, index));
      }
      for (let index = 40; index >= 1; index--) {
        expect(lruCalculate(primes, index)).toEqual(rawCalculate(primes, index));
      }
      expect(valueOf(lruCalculate(primes, 10))).toBe(29n);
    });

    it('should resume harmonic sums from cached terms without changing them', () => {
      const machine = new Machine(new Harmonic(), 16, 100);

      lruCalculate(machine, 10);

      expect(lruCalculate(machine, 30)).toEqual(rawCalculate(machine, 30));
    });
  });

  describe('domain errors', () => {
    it('should reject a negative index without touching the cache', () => {
      const strategy = withComputeCount(new Fibonacci());
      const machine = new Machine(strategy, 4, 50);
      lruCalculate(machine, 3);
      const before = machine.cache.getStats();

      const result = lruCalculate(machine, -1);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.errorCode).toBe(DomainErrorCode.INVALID_INDEX);
      }
      expect(machine.cache.getStats()).toEqual(before);
      expect(strategy.computed).toEqual([3]);
    });

    it('should leave the cache unwritten when the strategy fails', () => {
      const machine = new Machine(new Primes(), 4, 50);
      lruCalculate(machine, 2);

      const result = lruCalculate(machine, 0);

      expect(result.ok).toBe(false);
      expect(machine.cache.keys()).toEqual([2]);
      expect(machine.cache.getClock()).toBe(1);
    });

    it('should report overflow once at warn level', () => {
      const machine = new Machine(new Fibonacci(), 4, 50);

      const result = lruCalculate(machine, 187);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.errorCode).toBe(DomainErrorCode.OVERFLOW);
      }
      expect(machine.cache.size()).toBe(0);

      const warnings = jest.mocked(console.error).mock.calls
        .map(call => JSON.parse(String(call[0])))
        .filter(entry => entry.action === 'domain-error');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].errorCode).toBe('OVERFLOW');
    });
  });
});

describe('rawCalculate', () => {
  it('should compute without reading or writing the cache', () => {
    const machine = new Machine(new Fibonacci(), 4, 50);

    expect(valueOf(rawCalculate(machine, 26))).toBe(121393n);
    expect(machine.cache.size()).toBe(0);
    expect(machine.cache.getClock()).toBe(0);
  });
});

describe('Machine', () => {
  afterEach(() => {
    resetMachineConfig();
  });

  it('should expose its bounds', () => {
    const machine = new Machine(new Primes(), 12, 3);

    expect(machine.capacity).toBe(12);
    expect(machine.maxAge).toBe(3);
    expect(machine.strategy.name).toBe('primes');
  });

  it('should expose its cache read-only', () => {
    const machine = new Machine(new Fibonacci(), 4, 50);
    lruCalculate(machine, 10);

    const view = machine.cache;
    expect(Object.keys(view).sort()).toEqual(['getClock', 'getStats', 'has', 'keys', 'prune', 'size']);

    view.keys().push(99);
    expect(machine.cache.keys()).toEqual([10]);
    expect(lruCalculate(machine, 10)).toEqual(rawCalculate(machine, 10));
  });

  it('should clone with an independent cache', () => {
    const machine = new Machine(new Fibonacci(), 4, 50);
    lruCalculate(machine, 5);

    const copy = machine.clone();
    lruCalculate(copy, 12);

    expect(machine.cache.keys()).toEqual([5]);
    expect(copy.cache.keys()).toEqual([5, 12]);
    expect(copy.strategy).toBe(machine.strategy);
  });

  it('should take default bounds from configuration', () => {
    const defaults = createMachine(new Fibonacci());
    expect(defaults.capacity).toBe(128);
    expect(defaults.maxAge).toBe(50);

    updateMachineConfig({ capacity: 4 });
    const configured = createMachine(new Fibonacci(), { maxAge: 7 });
    expect(configured.capacity).toBe(4);
    expect(configured.maxAge).toBe(7);
  });
});
