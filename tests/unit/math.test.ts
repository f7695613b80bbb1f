/**
 * Unit tests for math utilities
 */

import { describe, it, expect } from 'vitest';
import {
  roundTo,
  stepDecimals,
  roundToStep,
  formatQuantity,
  clamp,
  toNumber,
  formatPercent,
} from '../../src/utils/math.js';

describe('Math Utilities', () => {
  describe('stepDecimals', () => {
    it('should count decimals of plain and exponent steps', () => {
      expect(stepDecimals(0.001)).toBe(3);
      expect(stepDecimals(0.5)).toBe(1);
      expect(stepDecimals(1)).toBe(0);
      expect(stepDecimals(5)).toBe(0);
      expect(stepDecimals(1e-7)).toBe(7);
      expect(stepDecimals(2.5e-7)).toBe(8);
    });

    it('should return 0 for invalid steps', () => {
      expect(stepDecimals(0)).toBe(0);
      expect(stepDecimals(-0.1)).toBe(0);
      expect(stepDecimals(NaN)).toBe(0);
    });
  });

  describe('roundToStep', () => {
    it('should snap float noise to the nearest step', () => {
      expect(roundToStep(0.30000000000000004, 0.1)).toBe(0.3);
      expect(roundToStep(0.0104, 0.001)).toBe(0.01);
      expect(roundToStep(1.26, 0.5)).toBe(1.5);
    });

    it('should floor when rounding down', () => {
      expect(roundToStep(0.0129, 0.001, 'down')).toBe(0.012);
      expect(roundToStep(2.9, 1, 'down')).toBe(2);
      expect(roundToStep(0.00099, 0.001, 'down')).toBe(0);
    });

    it('should not lose a whole step to representation error', () => {
      expect(roundToStep(0.3, 0.1, 'down')).toBe(0.3);
      expect(roundToStep(0.7, 0.1, 'down')).toBe(0.7);
    });

    it('should pass the value through for an invalid step', () => {
      expect(roundToStep(0.123, 0)).toBe(0.123);
    });
  });

  describe('formatQuantity', () => {
    it('should keep the step precision on the wire', () => {
      expect(formatQuantity(0.01, 0.001)).toBe('0.010');
      expect(formatQuantity(3, 1)).toBe('3');
      expect(formatQuantity(0.5, 0.1)).toBe('0.5');
    });
  });

  describe('roundTo', () => {
    it('should round to the given decimals', () => {
      expect(roundTo(0.1 + 0.2, 6)).toBe(0.3);
      expect(roundTo(1.23456, 2)).toBe(1.23);
    });
  });

  describe('clamp', () => {
    it('should bound a value', () => {
      expect(clamp(1.3, 0, 1)).toBe(1);
      expect(clamp(-0.2, 0, 1)).toBe(0);
      expect(clamp(0.4, 0, 1)).toBe(0.4);
    });
  });

  describe('toNumber', () => {
    it('should parse exchange numeric strings', () => {
      expect(toNumber('1000.25')).toBe(1000.25);
      expect(toNumber(7)).toBe(7);
    });

    it('should return NaN for empty or garbage input', () => {
      expect(toNumber('')).toBeNaN();
      expect(toNumber(null)).toBeNaN();
      expect(toNumber(undefined)).toBeNaN();
      expect(toNumber('abc')).toBeNaN();
      expect(toNumber('Infinity')).toBeNaN();
    });
  });

  describe('formatPercent', () => {
    it('should format a ratio', () => {
      expect(formatPercent(0.625)).toBe('62.5%');
      expect(formatPercent(0.9, 0)).toBe('90%');
    });
  });
});
