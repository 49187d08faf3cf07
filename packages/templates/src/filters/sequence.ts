/**
 * Sequence filters
 *
 * All functions are pure and return new arrays (never mutate input).
 */

import { EvalError } from '../errors';
import { add } from '../runtime/operators';
import { SafeString } from '../runtime/safe-string';
import { escapeHtml } from '../runtime/utils';
import {
  compare,
  equals,
  isMapping,
  isNumber,
  isString,
  iterate,
  stringify,
  TemplateObject,
  type Value,
} from '../runtime/values';
import { argument, booleanArgument, integerArgument, stringArgument, typeError } from './arguments';
import type { Filter, FilterState } from './types';

/**
 * Items of an iterable filter input; undefined counts as empty
 */
export function toItems(owner: string, value: Value): Value[] {
  if (value === undefined) {
    return [];
  }
  const items = iterate(value);
  if (items === null) {
    throw typeError(owner, 'an iterable', value);
  }
  return items;
}

/**
 * Build the sort key of an item: an optional attribute path, lower-cased
 * unless the comparison is case sensitive
 */
export function sortKey(
  state: FilterState,
  attribute: Value,
  caseSensitive: boolean,
): (item: Value) => Value {
  return (item) => {
    let key = attribute === undefined || attribute === null ? item : state.getAttribute(item, stringify(attribute));
    if (!caseSensitive && isString(key)) {
      key = key.toString().toLowerCase();
    }
    return key;
  };
}

export const length: Filter = (value) => {
  if (value === undefined) return 0;
  if (isString(value)) return Array.from(value.toString()).length;
  if (Array.isArray(value)) return value.length;
  if (isMapping(value)) return Object.keys(value).length;
  if (value instanceof TemplateObject) {
    const items = value.iterate();
    if (items !== null) return items.length;
  }
  throw typeError('length', 'a string, sequence or mapping', value);
};

export const first: Filter = (value) => {
  const items = toItems('first', value);
  return items[0];
};

export const last: Filter = (value) => {
  const items = toItems('last', value);
  return items[items.length - 1];
};

export const reverse: Filter = (value) => {
  if (isString(value)) {
    return Array.from(value.toString()).reverse().join('');
  }
  return [...toItems('reverse', value)].reverse();
};

export const sort: Filter = (value, args, kwargs, state) => {
  const descending = booleanArgument(args, kwargs, 0, 'reverse', false);
  const caseSensitive = booleanArgument(args, kwargs, 1, 'case_sensitive', false);
  const key = sortKey(state, argument(args, kwargs, 2, 'attribute'), caseSensitive);

  const keyed = toItems('sort', value).map((item) => ({ item, key: key(item) }));
  keyed.sort((a, b) => compare(a.key, b.key) * (descending ? -1 : 1));
  return keyed.map(({ item }) => item);
};

export const unique: Filter = (value, args, kwargs, state) => {
  const caseSensitive = booleanArgument(args, kwargs, 0, 'case_sensitive', false);
  const key = sortKey(state, argument(args, kwargs, 1, 'attribute'), caseSensitive);

  const seen: Value[] = [];
  const result: Value[] = [];
  for (const item of toItems('unique', value)) {
    const itemKey = key(item);
    if (!seen.some((existing) => equals(existing, itemKey))) {
      seen.push(itemKey);
      result.push(item);
    }
  }
  return result;
};

/**
 * Join items with a separator. Under autoescape, unsafe items are escaped
 * and the result is marked safe.
 */
export const join: Filter = (value, args, kwargs, state) => {
  const separator = stringArgument('join', args, kwargs, 0, 'd', '');
  const attribute = argument(args, kwargs, 1, 'attribute');
  let items = toItems('join', value);
  if (attribute !== undefined && attribute !== null) {
    items = items.map((item) => state.getAttribute(item, stringify(attribute)));
  }

  if (!state.autoescape) {
    return items.map(stringify).join(separator);
  }
  const escaped = items.map((item) =>
    item instanceof SafeString ? item.toString() : escapeHtml(stringify(item)),
  );
  return new SafeString(escaped.join(escapeHtml(separator)));
};

export const list: Filter = (value) => [...toItems('list', value)];

/**
 * Split into chunks of `linecount` items, padding the last chunk with `fill_with`
 */
export const batch: Filter = (value, args, kwargs) => {
  const size = integerArgument('batch', args, kwargs, 0, 'linecount', 0);
  const fill = argument(args, kwargs, 1, 'fill_with');
  if (size < 1) {
    throw new EvalError('batch(): linecount must be at least 1');
  }

  const items = toItems('batch', value);
  const result: Value[] = [];
  for (let i = 0; i < items.length; i += size) {
    const chunk = items.slice(i, i + size);
    if (fill !== undefined && fill !== null) {
      while (chunk.length < size) chunk.push(fill);
    }
    result.push(chunk);
  }
  return result;
};

/**
 * Split into `slices` columns of near-equal length
 */
export const slice: Filter = (value, args, kwargs) => {
  const count = integerArgument('slice', args, kwargs, 0, 'slices', 0);
  const fill = argument(args, kwargs, 1, 'fill_with');
  if (count < 1) {
    throw new EvalError('slice(): slices must be at least 1');
  }

  const items = toItems('slice', value);
  const perSlice = Math.floor(items.length / count);
  const withExtra = items.length % count;
  const result: Value[] = [];
  let offset = 0;
  for (let n = 0; n < count; n++) {
    const start = offset + n * perSlice;
    if (n < withExtra) offset += 1;
    const end = offset + (n + 1) * perSlice;
    const column = items.slice(start, end);
    if (fill !== undefined && fill !== null && n >= withExtra) {
      column.push(fill);
    }
    result.push(column);
  }
  return result;
};

export const sum: Filter = (value, args, kwargs, state) => {
  const attribute = argument(args, kwargs, 0, 'attribute');
  const start = argument(args, kwargs, 1, 'start');
  let total: Value = isNumber(start) ? start : 0;

  for (const item of toItems('sum', value)) {
    const term = attribute === undefined || attribute === null ? item : state.getAttribute(item, stringify(attribute));
    if (!isNumber(term)) {
      throw typeError('sum', 'numbers', term);
    }
    total = add(total, term);
  }
  return total;
};

function extreme(owner: string, direction: 1 | -1): Filter {
  return (value, args, kwargs, state) => {
    const caseSensitive = booleanArgument(args, kwargs, 0, 'case_sensitive', false);
    const key = sortKey(state, argument(args, kwargs, 1, 'attribute'), caseSensitive);
    const items = toItems(owner, value);

    let best: Value = undefined;
    let bestKey: Value = undefined;
    items.forEach((item, i) => {
      const itemKey = key(item);
      if (i === 0 || compare(itemKey, bestKey) * direction > 0) {
        best = item;
        bestKey = itemKey;
      }
    });
    return best;
  };
}

export const min = extreme('min', -1);
export const max = extreme('max', 1);

export const sequenceFilters = {
  length,
  count: length,
  first,
  last,
  reverse,
  sort,
  unique,
  join,
  list,
  batch,
  slice,
  sum,
  min,
  max,
} satisfies Record<string, Filter>;
