import { describe, expect, it } from 'vitest';

import { InvalidArgumentError } from './errors.mjs';
import { OptionsValidator } from './validators.mjs';

const validator: OptionsValidator = new OptionsValidator('Widget');

describe('OptionsValidator', () => {
  describe('requirePositiveInteger', () => {
    it('should accept positive integers', () => {
      expect(() => validator.requirePositiveInteger('capacity', 1)).not.toThrow();
      expect(() => validator.requirePositiveInteger('capacity', 4096)).not.toThrow();
    });

    it.each([0, -2, 1.5, Number.NaN, Number.POSITIVE_INFINITY, '3', undefined])(
      'should reject %s',
      (value) => {
        expect(() => validator.requirePositiveInteger('capacity', value)).toThrow(
          InvalidArgumentError
        );
      }
    );

    it('should prefix the message with the component name', () => {
      expect(() => validator.requirePositiveInteger('capacity', -2)).toThrow(
        '[Widget] capacity must be a positive integer, got -2'
      );
    });
  });

  describe('requireFiniteNonNegativeNumber', () => {
    it('should accept zero and fractions', () => {
      expect(() => validator.requireFiniteNonNegativeNumber('timeoutMs', 0)).not.toThrow();
      expect(() => validator.requireFiniteNonNegativeNumber('timeoutMs', 0.5)).not.toThrow();
    });

    it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])('should reject %s', (value) => {
      expect(() => validator.requireFiniteNonNegativeNumber('timeoutMs', value)).toThrow(
        InvalidArgumentError
      );
    });
  });

  describe('requireOptionalFunction', () => {
    it('should accept undefined and functions', () => {
      expect(() => validator.requireOptionalFunction('clone', undefined)).not.toThrow();
      expect(() => validator.requireOptionalFunction('clone', (x: number) => x)).not.toThrow();
    });

    it('should reject other values', () => {
      expect(() => validator.requireOptionalFunction('clone', 'copy')).toThrow(
        '[Widget] clone must be a function, got string'
      );
    });
  });

  describe('requireOptionalNonEmptyString', () => {
    it('should accept undefined and non-empty strings', () => {
      expect(() => validator.requireOptionalNonEmptyString('name', undefined)).not.toThrow();
      expect(() => validator.requireOptionalNonEmptyString('name', 'sensor')).not.toThrow();
    });

    it('should reject blank strings and other types', () => {
      expect(() => validator.requireOptionalNonEmptyString('name', '  ')).toThrow(
        '[Widget] name must be a non-empty string, got empty string'
      );
      expect(() => validator.requireOptionalNonEmptyString('name', 42)).toThrow(
        '[Widget] name must be a non-empty string, got number'
      );
    });
  });
});
