/**
 * Mapping filters
 */

import { EvalError } from '../errors';
import { compare, isMapping, isString, stringify, TemplateObject, type Value } from '../runtime/values';
import { argument, booleanArgument, requireArgument, stringArgument, typeError } from './arguments';
import { sortKey, toItems } from './sequence';
import type { Filter } from './types';

/**
 * One group produced by `groupby`. Unpacks as `(grouper, list)` and exposes
 * both as attributes.
 */
export class Group extends TemplateObject {
  readonly typeName = 'group';

  constructor(
    readonly grouper: Value,
    readonly list: Value[],
  ) {
    super();
  }

  override getAttribute(name: string): Value {
    switch (name) {
      case 'grouper':
        return this.grouper;
      case 'list':
        return this.list;
      default:
        return undefined;
    }
  }

  override iterate(): Value[] {
    return [this.grouper, this.list];
  }
}

export const items: Filter = (value) => {
  if (value === undefined) return [];
  if (!isMapping(value)) {
    throw typeError('items', 'a mapping', value);
  }
  return Object.entries(value).map(([key, item]) => [key, item]);
};

export const dictsort: Filter = (value, args, kwargs) => {
  if (!isMapping(value)) {
    throw typeError('dictsort', 'a mapping', value);
  }
  const caseSensitive = booleanArgument(args, kwargs, 0, 'case_sensitive', false);
  const by = stringArgument('dictsort', args, kwargs, 1, 'by', 'key');
  const descending = booleanArgument(args, kwargs, 2, 'reverse', false);
  if (by !== 'key' && by !== 'value') {
    throw new EvalError("dictsort(): 'by' must be 'key' or 'value'");
  }

  const position = by === 'key' ? 0 : 1;
  const keyOf = (entry: [string, Value]): Value => {
    const key = entry[position];
    return !caseSensitive && isString(key) ? key.toString().toLowerCase() : key;
  };
  const entries = Object.entries(value);
  entries.sort((a, b) => compare(keyOf(a), keyOf(b)) * (descending ? -1 : 1));
  return entries.map(([key, item]) => [key, item]);
};

export const attr: Filter = (value, args, kwargs, state) => {
  const name = stringify(requireArgument('attr', args, kwargs, 0, 'name'));
  return state.getAttribute(value, name);
};

/**
 * Group items by an attribute path; groups come out sorted by their key
 */
export const groupby: Filter = (value, args, kwargs, state) => {
  const attribute = requireArgument('groupby', args, kwargs, 0, 'attribute');
  const fallback = argument(args, kwargs, 1, 'default');
  const caseSensitive = booleanArgument(args, kwargs, 2, 'case_sensitive', false);
  const path = stringify(attribute);

  const grouperOf = (item: Value): Value => {
    const grouper = state.getAttribute(item, path);
    return grouper === undefined ? fallback : grouper;
  };
  const key = sortKey(state, null, caseSensitive);

  const sorted = toItems('groupby', value)
    .map((item) => ({ item, grouper: grouperOf(item) }))
    .sort((a, b) => compare(key(a.grouper), key(b.grouper)));

  const groups: Group[] = [];
  for (const { item, grouper } of sorted) {
    const current = groups[groups.length - 1];
    if (current && compare(key(current.grouper), key(grouper)) === 0) {
      current.list.push(item);
    } else {
      groups.push(new Group(grouper, [item]));
    }
  }
  return groups;
};

export const mappingFilters = {
  items,
  dictsort,
  attr,
  groupby,
} satisfies Record<string, Filter>;
