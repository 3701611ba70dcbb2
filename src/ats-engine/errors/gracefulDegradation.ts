/**
 * Graceful Degradation Utilities
 *
 * Fallback strategies used across the engine:
 * - Unparsable input: a section extractor that throws yields its empty value
 * - Collaborator failure: enhancer errors and timeouts fall back to the
 *   deterministic path
 * - Invariant violation: handled by the optimizer's monotonicity guard
 */

import { ATSLogger } from '../logging/logger';
import { toError } from '../../shared/errors/types';
import { ATSErrorFactory } from './types';

/**
 * Graceful degradation handler
 */
export class GracefulDegradation {
  /**
   * Wrap operation with graceful degradation
   */
  static async withGracefulDegradation<T>(
    operation: () => Promise<T>,
    fallback: () => T,
    operationName: string
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      ATSLogger.logError(toError(error), {
        operation: operationName,
        fallback: 'using_fallback_value'
      });
      return fallback();
    }
  }

  /**
   * Wrap synchronous operation with graceful degradation
   */
  static withGracefulDegradationSync<T>(
    operation: () => T,
    fallback: () => T,
    operationName: string
  ): T {
    try {
      return operation();
    } catch (error) {
      ATSLogger.logError(toError(error), {
        operation: operationName,
        fallback: 'using_fallback_value'
      });
      return fallback();
    }
  }
}

/**
 * Race a promise against a timer. The timer is always cleared so a settled
 * call leaves nothing scheduled.
 *
 * @throws ATSError ENHANCEMENT_TIMEOUT when the timer wins
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(ATSErrorFactory.enhancementTimeout(operation, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
