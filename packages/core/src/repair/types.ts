/**
 * Repair result types
 *
 * The checked entry points return RepairResult<T> instead of throwing, so a
 * caller orchestrating a longer pipeline can report what went wrong without
 * ever receiving a half-built lineage.
 */

import type { ValidationReport } from '../graph/validate.js';

// ============================================================================
// Operation Types
// ============================================================================

/**
 * Operation that produced an error
 */
export type RepairOperationType = `parse` | `validate`;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error category for repair failures
 */
export type RepairErrorCategory =
  | `invalidInput` // Input failed schema or reference checks
  | `invalidOptions`; // Tolerances are not usable numbers

/**
 * Detailed error information from a repair operation
 */
export interface RepairError {
  category: RepairErrorCategory;
  /** Human-readable error message */
  message: string;
  /** The operation that failed */
  operation: RepairOperationType;
  /** Validation report when validation rejected the input */
  validationReport?: ValidationReport;
  /** Schema issues as `path: message` strings */
  issues?: string[];
  /** Additional details for debugging */
  details?: Record<string, unknown>;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Usage:
 * ```ts
 * const result = repairMemberGraph(graph, { tol: 1e-4 });
 * if (result.ok) {
 *   const { lines, motherToChildren } = result.value;
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type RepairResult<T> =
  | { ok: true; value: T; warnings?: string[] }
  | { ok: false; error: RepairError };

// ============================================================================
// Result Constructors
// ============================================================================

export function success<T>(value: T, warnings?: string[]): RepairResult<T> {
  return warnings && warnings.length > 0 ? { ok: true, value, warnings } : { ok: true, value };
}

export function failure<T>(error: RepairError): RepairResult<T> {
  return { ok: false, error };
}

export function createRepairError(
  category: RepairErrorCategory,
  message: string,
  operation: RepairOperationType,
  options?: {
    validationReport?: ValidationReport;
    issues?: string[];
    details?: Record<string, unknown>;
  }
): RepairError {
  return {
    category,
    message,
    operation,
    ...options,
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Map over a successful result
 */
export function mapResult<T, U>(result: RepairResult<T>, fn: (value: T) => U): RepairResult<U> {
  if (result.ok) {
    return { ok: true, value: fn(result.value), warnings: result.warnings };
  }
  return result;
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapResult<T>(result: RepairResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Repair failed during ${result.error.operation}: ${result.error.message}`);
}
