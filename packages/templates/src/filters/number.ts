/**
 * Number filters
 */

import { EvalError } from '../errors';
import {
  Float,
  intFromNumber,
  isNumber,
  isString,
  makeInt,
  toNumber,
  typeName,
  type Value,
} from '../runtime/values';
import { argument, integerArgument, stringArgument, typeError } from './arguments';
import type { Filter } from './types';

function parseNumber(value: Value): number | null {
  if (isNumber(value)) return toNumber(value);
  if (typeof value === 'boolean') return Number(value);
  if (isString(value)) {
    const text = value.toString().trim().replace(/_/g, '');
    if (text === '') return null;
    const parsed = Number(text);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

export const abs: Filter = (value) => {
  if (typeof value === 'bigint') return value < 0n ? -value : value;
  if (value instanceof Float) return new Float(Math.abs(value.value));
  if (typeof value !== 'number') {
    throw typeError('abs', 'a number', value);
  }
  return Math.abs(value);
};

/**
 * Convert to an integer, truncating toward zero. Unparseable input yields
 * `default` (0 unless given).
 */
export const int: Filter = (value, args, kwargs) => {
  const fallback = argument(args, kwargs, 0, 'default');
  const base = integerArgument('int', args, kwargs, 1, 'base', 10);
  const fallbackValue = fallback === undefined ? 0 : fallback;

  if (typeof value === 'bigint') return value;
  if (isString(value)) {
    const text = value.toString().trim().replace(/_/g, '');
    if (base !== 10) {
      const digits = text.toLowerCase().replace(/^0[box]/, '');
      const parsed = Number.parseInt(digits, base);
      return Number.isNaN(parsed) ? fallbackValue : intFromNumber(parsed);
    }
    if (/^[+-]?\d+$/.test(text)) return makeInt(BigInt(text));
  }
  const parsed = parseNumber(value);
  if (parsed === null || !Number.isFinite(parsed)) {
    return fallbackValue;
  }
  return intFromNumber(Math.trunc(parsed));
};

export const float: Filter = (value, args, kwargs) => {
  const fallback = argument(args, kwargs, 0, 'default');
  const parsed = parseNumber(value);
  if (parsed === null) {
    return fallback === undefined ? new Float(0) : fallback;
  }
  return new Float(parsed);
};

/**
 * Round to `precision` digits. `method` is `common` (half away from zero),
 * `ceil` or `floor`. The result is always a float.
 */
export const round: Filter = (value, args, kwargs) => {
  if (!isNumber(value)) {
    throw new EvalError(`round() expected a number, got ${typeName(value)}`);
  }
  const precision = integerArgument('round', args, kwargs, 0, 'precision', 0);
  const method = stringArgument('round', args, kwargs, 1, 'method', 'common');
  return new Float(roundNumber(toNumber(value), precision, method));
};

function roundNumber(value: number, precision: number, method: string): number {
  const factor = 10 ** precision;
  switch (method) {
    case 'common':
      return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
    case 'ceil':
      return Math.ceil(value * factor) / factor;
    case 'floor':
      return Math.floor(value * factor) / factor;
    default:
      throw new EvalError("round(): method must be 'common', 'ceil' or 'floor'");
  }
}

export const numberFilters = {
  abs,
  int,
  float,
  round,
} satisfies Record<string, Filter>;
