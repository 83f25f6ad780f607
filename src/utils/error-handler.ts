/**
 * Domain Error Handler
 * Creates, formats and sanitizes sequence domain errors
 */

import { getLogger } from './logger.js';
import {
  CalculationResult,
  DomainError,
  DomainErrorCode,
  MAX_TERM_VALUE,
  SequenceIndex,
  SequenceName
} from '../types/sequence.types.js';

const logger = getLogger('error-handler');

export class ErrorHandler {
  private static readonly DESCRIPTIONS = new Map<DomainErrorCode, (sequence: SequenceName, index: SequenceIndex) => string>([
    [DomainErrorCode.INVALID_INDEX, (sequence, index) => `Index ${index} is outside the domain of the ${sequence} sequence`],
    [DomainErrorCode.OVERFLOW, (sequence, index) => `Term ${index} of the ${sequence} sequence exceeds the representable range`],
  ]);

  private static readonly SUGGESTIONS = new Map<DomainErrorCode, string>([
    [DomainErrorCode.INVALID_INDEX, 'Use a non-negative integer index within the sequence domain.'],
    [DomainErrorCode.OVERFLOW, `Request a smaller index; terms are limited to ${MAX_TERM_VALUE}.`],
  ]);

  /**
   * Build a domain error for a sequence and index
   */
  static createDomainError(
    errorCode: DomainErrorCode,
    sequence: SequenceName,
    index: SequenceIndex
  ): DomainError {
    const describe = ErrorHandler.DESCRIPTIONS.get(errorCode);
    const message = describe ? describe(sequence, index) : `Domain error for ${sequence}(${index})`;
    const error = new Error(message);
    error.name = 'DomainError';
    return Object.assign(error, { errorCode, sequence, index });
  }

  static getSuggestion(errorCode: DomainErrorCode): string {
    return ErrorHandler.SUGGESTIONS.get(errorCode) ?? 'No suggestion available for this error';
  }

  /**
   * Log a domain error once, at the point it leaves the evaluator
   */
  static report(error: DomainError): void {
    logger.warn({
      module: 'error-handler',
      action: 'domain-error',
      errorCode: error.errorCode,
      sequence: error.sequence,
      index: error.index,
    }, error.message);
  }

  /**
   * Format error for user display
   */
  static formatError(error: DomainError): string {
    const parts: string[] = [];

    parts.push(`Error: ${error.message}`);
    parts.push(`Type: ${error.errorCode}`);
    parts.push(`Sequence: ${error.sequence}`);
    parts.push(`Index: ${error.index}`);
    parts.push(`Suggestion: ${ErrorHandler.getSuggestion(error.errorCode)}`);

    return parts.join('\n');
  }

  /**
   * Create a plain error response for external consumption
   */
  static sanitizeError(error: DomainError): Record<string, unknown> {
    return {
      error: true,
      code: error.errorCode,
      message: error.message,
      sequence: error.sequence,
      index: error.index,
      suggestion: ErrorHandler.getSuggestion(error.errorCode),
    };
  }
}

export function createDomainError(
  errorCode: DomainErrorCode,
  sequence: SequenceName,
  index: SequenceIndex
): DomainError {
  return ErrorHandler.createDomainError(errorCode, sequence, index);
}

export function ok<T>(value: T): CalculationResult<T> {
  return { ok: true, value };
}

export function fail<T>(errorCode: DomainErrorCode, sequence: SequenceName, index: SequenceIndex): CalculationResult<T> {
  return { ok: false, error: createDomainError(errorCode, sequence, index) };
}
