export { Machine, createMachine, lruCalculate, rawCalculate } from './machine.js';
export type { CacheView, MachineOptions } from './machine.js';
export { LRUCache } from './utils/lru-cache.js';
export type { CacheStats, EvictionReason, LRUCacheOptions } from './utils/lru-cache.js';
export { Fibonacci, Harmonic, Primes, SEQUENCE_NAMES, createStrategy, isSequenceName } from './strategies/index.js';
export type { AnyStrategy, StrategyTypes } from './strategies/index.js';
export { ErrorHandler, createDomainError } from './utils/error-handler.js';
export {
  DEFAULT_CONFIG,
  MachineConfigSchema,
  getMachineConfig,
  loadMachineConfig,
  resetMachineConfig,
  updateMachineConfig
} from './config/machine-config.js';
export type { MachineConfig } from './config/machine-config.js';
export { LogLevel, configureLogger, getLogger } from './utils/logger.js';
export type { LogContext, LoggerConfig } from './utils/logger.js';
export { DomainErrorCode, MAX_TERM_VALUE, isDomainError, isValidIndex } from './types/sequence.types.js';
export type {
  CachedTerm,
  CalculationResult,
  DomainError,
  SequenceIndex,
  SequenceName,
  SequenceStrategy,
  TermLookup,
  TermValue
} from './types/sequence.types.js';
