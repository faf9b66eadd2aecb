/**
 * Error Helpers
 *
 * Construction and inspection of CompilerError results.
 */

import type { CompilerError, Failure } from './types.js';

export function fail(error: CompilerError): Failure {
  return { success: false, error };
}

/**
 * Check whether a filter output or result is a failure.
 */
export function isFailure(value: unknown): value is Failure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === false &&
    'error' in value
  );
}

/**
 * An unmet dependency is the only error a driver recovers from:
 * the representation is reset and compiled again in a later pass.
 */
export function isRetryable(error: CompilerError): boolean {
  return error.code === 'UNMET_DEPENDENCY';
}

/**
 * Human-readable one-line description of an error.
 */
export function describeError(error: CompilerError): string {
  switch (error.code) {
    case 'UNKNOWN_FILTER':
      return `Unknown filter: ${error.filterName}`;
    case 'CANNOT_USE_BINARY_FILTER':
      return `The "${error.filterName}" filter cannot be used on ${error.rep}, which is textual`;
    case 'CANNOT_USE_TEXTUAL_FILTER':
      return `The "${error.filterName}" filter cannot be used on ${error.rep}, which is binary`;
    case 'CANNOT_LAYOUT_BINARY_ITEM':
      return `${error.rep} is binary and cannot be laid out`;
    case 'CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM':
      return `${error.rep} is binary and has no compiled content`;
    case 'NO_SUCH_SNAPSHOT':
      return `${error.rep} has no snapshot named "${error.snapshot}"`;
    case 'UNMET_DEPENDENCY':
      return `Compiled content of ${error.rep} is not available yet`;
    case 'FILTER_OUTPUT_MISSING':
      return error.message;
    case 'DEPENDENCY_CYCLE':
      return `Dependency cycle between: ${error.reps.join(', ')}`;
    case 'LAYOUT_NOT_FOUND':
      return `Layout ${error.layout} used by ${error.rep} does not exist`;
    case 'INVALID_SITE':
      return `Invalid site at ${error.path}: ${error.message}`;
    case 'SITE_READ_FAILED':
      return `Failed to read ${error.path}: ${error.reason}`;
  }
}
