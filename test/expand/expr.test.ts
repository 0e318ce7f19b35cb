/**
 * Tests for the #expr evaluator
 */

import { describe, it, expect } from 'vitest';
import { evaluate, formatExprResult, ExprError } from '../../src/expand/expr.js';

describe('evaluate', () => {
  it.each([
    ['1 + 2 * 3', 7],
    ['2 * (3 + 4)', 14],
    ['2 ^ 3 ^ 2', 64],
    ['7 mod 3', 1],
    ['-7 mod 3', -1],
    ['10 / 4', 2.5],
    ['3 = 3 and 2 < 1', 0],
    ['1 <> 2 or 0', 1],
    ['2.5 round 0', 3],
    ['-2.5 round 0', -3],
    ['1e3', 1000],
    ['not 0', 1],
    ['abs -4', 4],
    ['floor 2.7 + 1', 3],
  ])('should evaluate %s', (input, expected) => {
    expect(evaluate(input)).toBe(expected);
  });

  it('should return null for an empty expression', () => {
    expect(evaluate('  ')).toBeNull();
  });

  it.each([
    ['1 / 0', 'Division by zero.'],
    ['foo', 'Unrecognized word "foo".'],
    ['(1', 'Unclosed bracket.'],
    ['1 2', 'Unexpected number.'],
    ['1 )', 'Unexpected closing bracket.'],
    ['2 *', 'Missing operand.'],
    ['1 ; 2', 'Unrecognized punctuation character ";".'],
    ['sqrt -1', 'Invalid argument for sqrt: < 0.'],
  ])('should reject %s', (input, message) => {
    expect(() => evaluate(input)).toThrow(new ExprError(message));
  });
});

describe('formatExprResult', () => {
  it('should print integers without a fraction', () => {
    expect(formatExprResult(14)).toBe('14');
    expect(formatExprResult(-0)).toBe('0');
  });

  it('should print floats with fourteen significant digits', () => {
    expect(formatExprResult(2.5)).toBe('2.5');
    expect(formatExprResult(1 / 3)).toBe('0.33333333333333');
    expect(formatExprResult(Math.PI)).toBe('3.1415926535898');
  });

  it('should use exponent notation for large values', () => {
    expect(formatExprResult(1e20)).toBe('1.0E+20');
  });

  it('should print infinities and NaN in capitals', () => {
    expect(formatExprResult(Infinity)).toBe('INF');
    expect(formatExprResult(-Infinity)).toBe('-INF');
    expect(formatExprResult(NaN)).toBe('NAN');
  });
});
