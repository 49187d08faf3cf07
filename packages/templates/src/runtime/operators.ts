/**
 * Arithmetic and comparison operators
 *
 * Two integers give an integer, except under `/`, which always gives a float.
 * A float operand makes the result a float. `//` and `%` floor (the result of
 * `%` takes the sign of the divisor). Undefined operands are rejected
 * everywhere except `~`, which treats them as empty strings.
 */

import { EvalError } from '../errors';
import type { BinaryOperator } from '../parser/ast-nodes';
import { SafeString } from './safe-string';
import {
  compare,
  contains,
  equals,
  Float,
  isInteger,
  isNumber,
  isString,
  makeInt,
  stringify,
  toNumber,
  typeName,
  type NumberValue,
  type Value,
} from './values';

type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

function operandError(operator: string, left: Value, right: Value): EvalError {
  return new EvalError(
    `Unsupported operand types for ${operator}: ${typeName(left)} and ${typeName(right)}`,
  );
}

function checkDivisor(operator: string, right: NumberValue): void {
  if (toNumber(right) === 0) {
    throw new EvalError(`Division by zero in '${operator}'`);
  }
}

function repeat<T>(items: readonly T[], times: number): T[] {
  const result: T[] = [];
  for (let i = 0; i < times; i++) {
    result.push(...items);
  }
  return result;
}

function floorDivide(left: bigint, right: bigint): bigint {
  const quotient = left / right;
  return left % right !== 0n && (left < 0n) !== (right < 0n) ? quotient - 1n : quotient;
}

/**
 * Floored modulo on floats, sign follows the divisor: `-7 % 3` is 2
 */
export function modulo(left: number, right: number): number {
  checkDivisor('%', right);
  return left - right * Math.floor(left / right);
}

const SMALL_OPERATIONS: Partial<Record<ArithmeticOperator, (left: number, right: number) => number>> = {
  '+': (left, right) => left + right,
  '-': (left, right) => left - right,
  '*': (left, right) => left * right,
};

function integerArithmetic(
  operator: Exclude<ArithmeticOperator, '/'>,
  left: number | bigint,
  right: number | bigint,
): Value {
  // Plain numbers while the result stays exact
  if (typeof left === 'number' && typeof right === 'number') {
    const result = SMALL_OPERATIONS[operator]?.(left, right);
    if (result !== undefined && Number.isSafeInteger(result)) {
      return result;
    }
  }

  const a = BigInt(left);
  const b = BigInt(right);
  switch (operator) {
    case '+':
      return makeInt(a + b);
    case '-':
      return makeInt(a - b);
    case '*':
      return makeInt(a * b);
    case '//':
      checkDivisor('//', right);
      return makeInt(floorDivide(a, b));
    case '%':
      checkDivisor('%', right);
      return makeInt(a - b * floorDivide(a, b));
    case '**':
      return b < 0n ? new Float(Number(a) ** Number(b)) : makeInt(a ** b);
  }
}

function arithmetic(operator: ArithmeticOperator, left: NumberValue, right: NumberValue): Value {
  if (operator === '/') {
    checkDivisor('/', right);
    return new Float(toNumber(left) / toNumber(right));
  }
  if (isInteger(left) && isInteger(right)) {
    return integerArithmetic(operator, left, right);
  }

  const a = toNumber(left);
  const b = toNumber(right);
  switch (operator) {
    case '+':
      return new Float(a + b);
    case '-':
      return new Float(a - b);
    case '*':
      return new Float(a * b);
    case '//':
      checkDivisor('//', right);
      return new Float(Math.floor(a / b));
    case '%':
      return new Float(modulo(a, b));
    case '**':
      return new Float(a ** b);
  }
}

export function add(left: Value, right: Value): Value {
  if (isNumber(left) && isNumber(right)) {
    return arithmetic('+', left, right);
  }
  if (isString(left) && isString(right)) {
    const text = left.toString() + right.toString();
    return left instanceof SafeString && right instanceof SafeString ? new SafeString(text) : text;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return [...left, ...right];
  }
  throw operandError('+', left, right);
}

export function multiply(left: Value, right: Value): Value {
  if (isNumber(left) && isNumber(right)) {
    return arithmetic('*', left, right);
  }
  // Repetition works with the count on either side
  const [sequence, count] = isNumber(left) ? [right, left] : [left, right];
  if (isInteger(count)) {
    const times = Math.max(0, Number(count));
    if (isString(sequence)) {
      return sequence.toString().repeat(times);
    }
    if (Array.isArray(sequence)) {
      return repeat(sequence, times);
    }
  }
  throw operandError('*', left, right);
}

function numeric(operator: ArithmeticOperator, left: Value, right: Value): Value {
  if (!isNumber(left) || !isNumber(right)) {
    throw operandError(operator, left, right);
  }
  return arithmetic(operator, left, right);
}

/**
 * Apply a binary operator to two evaluated operands
 */
export function applyBinary(operator: BinaryOperator, left: Value, right: Value): Value {
  switch (operator) {
    case '+':
      return add(left, right);
    case '*':
      return multiply(left, right);
    case '-':
    case '/':
    case '//':
    case '%':
    case '**':
      return numeric(operator, left, right);
    case '~':
      return stringify(left) + stringify(right);
    case '==':
      return equals(left, right);
    case '!=':
      return !equals(left, right);
    case '<':
      return compare(left, right) < 0;
    case '<=':
      return compare(left, right) <= 0;
    case '>':
      return compare(left, right) > 0;
    case '>=':
      return compare(left, right) >= 0;
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
  }
}

export function negate(value: Value): Value {
  if (typeof value === 'number') return -value;
  if (typeof value === 'bigint') return makeInt(-value);
  if (value instanceof Float) return new Float(-value.value);
  throw new EvalError(`Bad operand type for unary -: ${typeName(value)}`);
}
