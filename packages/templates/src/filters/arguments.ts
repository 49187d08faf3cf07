/**
 * Argument helpers shared by filters, tests and global functions
 */

import { EvalError } from '../errors';
import { lookupProperty } from '../runtime/utils';
import { isNumber, isTruthy, stringify, toNumber, typeName, type Value, type ValueMap } from '../runtime/values';

/**
 * Argument given either by position or by keyword
 */
export function argument(args: Value[], kwargs: ValueMap, index: number, name: string): Value {
  return index < args.length ? args[index] : lookupProperty(kwargs, name);
}

export function integerArgument(
  owner: string,
  args: Value[],
  kwargs: ValueMap,
  index: number,
  name: string,
  fallback: number,
): number {
  const value = argument(args, kwargs, index, name);
  if (value === undefined || value === null) {
    return fallback;
  }
  const number = isNumber(value) ? toNumber(value) : NaN;
  if (!Number.isFinite(number)) {
    throw new EvalError(`${owner}(): '${name}' must be an integer, got ${typeName(value)}`);
  }
  return Math.trunc(number);
}

export function stringArgument(
  owner: string,
  args: Value[],
  kwargs: ValueMap,
  index: number,
  name: string,
  fallback: string,
): string {
  const value = argument(args, kwargs, index, name);
  if (value === undefined || value === null) {
    return fallback;
  }
  return stringify(value);
}

export function booleanArgument(
  args: Value[],
  kwargs: ValueMap,
  index: number,
  name: string,
  fallback: boolean,
): boolean {
  const value = argument(args, kwargs, index, name);
  return value === undefined ? fallback : isTruthy(value);
}

export function requireArgument(
  owner: string,
  args: Value[],
  kwargs: ValueMap,
  index: number,
  name: string,
): Value {
  const value = argument(args, kwargs, index, name);
  if (value === undefined) {
    throw new EvalError(`${owner}() missing required argument '${name}'`);
  }
  return value;
}

export function typeError(owner: string, expected: string, value: Value): EvalError {
  return new EvalError(`${owner}() expected ${expected}, got ${typeName(value)}`);
}
