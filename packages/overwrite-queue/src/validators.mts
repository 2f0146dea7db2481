/**
 * Option validation shared by the queue and its storage
 */

import { InvalidArgumentError } from './errors.mjs';

/**
 * Validates constructor and call parameters with consistent error messages
 * and assertion signatures for type narrowing
 */
export class OptionsValidator {
  constructor(private readonly componentName: string) {}

  /**
   * Validates that a value is a positive safe integer
   * Throws InvalidArgumentError for zero, negatives, fractions and NaN
   */
  requirePositiveInteger(field: string, value: unknown): asserts value is number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
      throw new InvalidArgumentError(
        `[${this.componentName}] ${field} must be a positive integer, got ${String(value)}`,
        field,
        value
      );
    }
  }

  /**
   * Validates that a number is finite and non-negative
   */
  requireFiniteNonNegativeNumber(field: string, value: unknown): asserts value is number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new InvalidArgumentError(
        `[${this.componentName}] ${field} must be a finite non-negative number, got ${String(value)}`,
        field,
        value
      );
    }
  }

  /**
   * Validates that a value is either undefined or a function
   */
  requireOptionalFunction(
    field: string,
    value: unknown
  ): asserts value is ((...args: never[]) => unknown) | undefined {
    if (value !== undefined && typeof value !== 'function') {
      throw new InvalidArgumentError(
        `[${this.componentName}] ${field} must be a function, got ${typeof value}`,
        field,
        value
      );
    }
  }

  /**
   * Validates that a value is either undefined or a non-empty string
   */
  requireOptionalNonEmptyString(
    field: string,
    value: unknown
  ): asserts value is string | undefined {
    if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
      throw new InvalidArgumentError(
        `[${this.componentName}] ${field} must be a non-empty string, got ${typeof value === 'string' ? 'empty string' : typeof value}`,
        field,
        value
      );
    }
  }
}
