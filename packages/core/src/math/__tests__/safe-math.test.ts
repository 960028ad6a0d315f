/**
 * Checked arithmetic tests
 */

import { describe, it, expect } from 'vitest';
import { MAX_UINT256 } from '@mintable/types';
import { add, sub, mul, div, pow10 } from '../safe-math.js';
import {
  ArithmeticOverflowError,
  ArithmeticUnderflowError,
  DivisionByZeroError,
  InvalidArgumentError,
} from '../../ledger/ledger-errors.js';

describe('safe-math', () => {
  describe('add', () => {
    it('should add within range', () => {
      expect(add(2n, 3n)).toBe(5n);
      expect(add(MAX_UINT256 - 1n, 1n)).toBe(MAX_UINT256);
    });

    it('should throw ArithmeticOverflowError past 2^256 - 1', () => {
      expect(() => add(MAX_UINT256, 1n)).toThrow(ArithmeticOverflowError);
      expect(() => add(MAX_UINT256, 1n)).toThrow(`Arithmetic overflow: ${MAX_UINT256} + 1`);
    });
  });

  describe('sub', () => {
    it('should subtract down to zero', () => {
      expect(sub(10n, 4n)).toBe(6n);
      expect(sub(7n, 7n)).toBe(0n);
    });

    it('should throw ArithmeticUnderflowError when b > a', () => {
      expect(() => sub(1n, 2n)).toThrow(ArithmeticUnderflowError);
      expect(() => sub(1n, 2n)).toThrow('Arithmetic underflow: 1 - 2');
    });
  });

  describe('mul', () => {
    it('should multiply within range', () => {
      expect(mul(6n, 7n)).toBe(42n);
      expect(mul(0n, MAX_UINT256)).toBe(0n);
    });

    it('should throw ArithmeticOverflowError past 2^256 - 1', () => {
      expect(() => mul(MAX_UINT256, 2n)).toThrow(ArithmeticOverflowError);
      expect(() => mul(1n << 128n, 1n << 128n)).toThrow(ArithmeticOverflowError);
    });
  });

  describe('div', () => {
    it('should truncate', () => {
      expect(div(7n, 2n)).toBe(3n);
      expect(div(0n, 5n)).toBe(0n);
    });

    it('should throw DivisionByZeroError', () => {
      expect(() => div(7n, 0n)).toThrow(DivisionByZeroError);
      expect(() => div(7n, 0n)).toThrow('Division by zero: 7 / 0');
    });
  });

  describe('pow10', () => {
    it('should compute powers of ten', () => {
      expect(pow10(0)).toBe(1n);
      expect(pow10(18)).toBe(1_000_000_000_000_000_000n);
      expect(pow10(77)).toBe(10n ** 77n);
    });

    it('should overflow at 10^78', () => {
      expect(() => pow10(78)).toThrow(ArithmeticOverflowError);
    });

    it('should reject negative or fractional exponents', () => {
      expect(() => pow10(-1)).toThrow(InvalidArgumentError);
      expect(() => pow10(1.5)).toThrow('Exponent must be a non-negative integer, got 1.5');
    });
  });

  it('should expose error codes', () => {
    let caught: unknown;
    try {
      sub(0n, 1n);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ArithmeticUnderflowError);
    expect(caught).toMatchObject({
      code: 'ARITHMETIC_UNDERFLOW',
      name: 'ArithmeticUnderflowError',
    });
  });
});
