import {
  ArithmeticError,
  evaluateArithmetic,
  isAllowedExpression,
  tokenize,
} from '../src/domain/utils/arithmetic';

describe('evaluateArithmetic', () => {
  test('respects operator precedence', () => {
    expect(evaluateArithmetic('25 * 4 + 10')).toBe(110);
    expect(evaluateArithmetic('2 + 3 * 4')).toBe(14);
    expect(evaluateArithmetic('10 - 4 - 3')).toBe(3);
    expect(evaluateArithmetic('64 / 4 / 2')).toBe(8);
  });

  test('evaluates parentheses and unary signs', () => {
    expect(evaluateArithmetic('(2 + 3) * 4')).toBe(20);
    expect(evaluateArithmetic('-3 + 5')).toBe(2);
    expect(evaluateArithmetic('-(2 + 2) * +3')).toBe(-12);
  });

  test('handles decimals', () => {
    expect(evaluateArithmetic('7 / 2')).toBe(3.5);
    expect(evaluateArithmetic('.5 * 4')).toBe(2);
    expect(evaluateArithmetic('0.1 + 0.2')).toBeCloseTo(0.3, 10);
  });

  test('rejects division by zero', () => {
    expect(() => evaluateArithmetic('1 / 0')).toThrow(new ArithmeticError('Division by zero'));
    expect(() => evaluateArithmetic('5 / (2 - 2)')).toThrow('Division by zero');
  });

  test('rejects malformed expressions', () => {
    expect(() => evaluateArithmetic('')).toThrow('Empty expression');
    expect(() => evaluateArithmetic('   ')).toThrow('Empty expression');
    expect(() => evaluateArithmetic('2 +')).toThrow('Unexpected end of expression');
    expect(() => evaluateArithmetic('(1 + 2')).toThrow("Missing closing parenthesis for '(' at position 0");
    expect(() => evaluateArithmetic('3 4')).toThrow("Unexpected token '4' at position 2");
    expect(() => evaluateArithmetic('* 2')).toThrow("Unexpected token '*' at position 0");
  });

  test('rejects malformed numbers and foreign characters', () => {
    expect(() => tokenize('1..2')).toThrow('Malformed number at position 0');
    expect(() => tokenize('1 + .')).toThrow('Malformed number at position 4');
    expect(() => tokenize('2 ** x')).toThrow("Unexpected character 'x' at position 5");
  });
});

describe('isAllowedExpression', () => {
  test('accepts digits, operators, dots, parentheses and spaces', () => {
    expect(isAllowedExpression('25 * (4 + 10.5) / 2 - 1')).toBe(true);
  });

  test('rejects anything else', () => {
    expect(isAllowedExpression('25 + import os')).toBe(false);
    expect(isAllowedExpression('2 ** 8; process.exit()')).toBe(false);
    expect(isAllowedExpression('2^8')).toBe(false);
  });
});
