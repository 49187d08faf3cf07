/**
 * Filters that apply other filters, tests or attribute lookups to each item
 */

import { EvalError } from '../errors';
import { lookupProperty } from '../runtime/utils';
import { isTruthy, stringify, type Value } from '../runtime/values';
import { toItems } from './sequence';
import type { Filter, FilterState } from './types';

/**
 * `map(attribute='name', default=x)` or `map('filter', args...)`
 */
export const map: Filter = (value, args, kwargs, state) => {
  const items = toItems('map', value);
  const attribute = lookupProperty(kwargs, 'attribute');

  if (attribute !== undefined) {
    const fallback = lookupProperty(kwargs, 'default');
    return items.map((item) => {
      const result = state.getAttribute(item, stringify(attribute));
      return result === undefined ? fallback : result;
    });
  }

  if (args.length === 0) {
    throw new EvalError('map() requires a filter name or an attribute');
  }
  const filterName = stringify(args[0]);
  const filterArgs = args.slice(1);
  return items.map((item) => state.applyFilter(filterName, item, filterArgs, kwargs));
};

type Predicate = (item: Value) => boolean;

function testPredicate(owner: string, args: Value[], state: FilterState): Predicate {
  if (args.length === 0) {
    return isTruthy;
  }
  const testName = stringify(args[0]);
  const testArgs = args.slice(1);
  if (testName === '') {
    throw new EvalError(`${owner}(): test name must not be empty`);
  }
  return (item) => state.applyTest(testName, item, testArgs);
}

function attributePredicate(owner: string, args: Value[], state: FilterState): Predicate {
  if (args.length === 0) {
    throw new EvalError(`${owner}() requires an attribute`);
  }
  const path = stringify(args[0]);
  const inner = testPredicate(owner, args.slice(1), state);
  return (item) => inner(state.getAttribute(item, path));
}

function filterItems(owner: string, value: Value, predicate: Predicate, keep: boolean): Value[] {
  return toItems(owner, value).filter((item) => predicate(item) === keep);
}

export const select: Filter = (value, args, _kwargs, state) =>
  filterItems('select', value, testPredicate('select', args, state), true);

export const reject: Filter = (value, args, _kwargs, state) =>
  filterItems('reject', value, testPredicate('reject', args, state), false);

export const selectattr: Filter = (value, args, _kwargs, state) =>
  filterItems('selectattr', value, attributePredicate('selectattr', args, state), true);

export const rejectattr: Filter = (value, args, _kwargs, state) =>
  filterItems('rejectattr', value, attributePredicate('rejectattr', args, state), false);

export const higherOrderFilters = {
  map,
  select,
  reject,
  selectattr,
  rejectattr,
} satisfies Record<string, Filter>;
