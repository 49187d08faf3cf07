/**
 * Filters dealing with undefined values, escaping and serialization
 */

import { EvalError } from '../errors';
import { SafeString } from '../runtime/safe-string';
import { escapeHtml } from '../runtime/utils';
import {
  isMapping,
  isNumber,
  isTruthy,
  Namespace,
  repr,
  stringify,
  TemplateObject,
  toNumber,
  type Value,
} from '../runtime/values';
import { argument, booleanArgument, integerArgument, typeError } from './arguments';
import type { Filter } from './types';

/**
 * `default(value, boolean=false)`: the fallback replaces undefined input, or
 * any falsy input when `boolean` is set
 */
export const defaultFilter: Filter = (value, args, kwargs) => {
  const fallback = argument(args, kwargs, 0, 'default_value');
  const checkFalsy = booleanArgument(args, kwargs, 1, 'boolean', false);
  if (value === undefined || (checkFalsy && !isTruthy(value))) {
    return fallback === undefined ? '' : fallback;
  }
  return value;
};

export const escape: Filter = (value) => {
  if (value instanceof SafeString) return value;
  return new SafeString(escapeHtml(stringify(value)));
};

export const safe: Filter = (value) => {
  if (value instanceof SafeString) return value;
  return new SafeString(stringify(value));
};

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function toJson(value: Value): Json {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (isNumber(value)) {
    const number = toNumber(value);
    return Number.isFinite(number) ? number : null;
  }
  if (value instanceof SafeString) return value.toString();
  if (Array.isArray(value)) return value.map(toJson);
  if (value instanceof Namespace) {
    return Object.fromEntries(value.entries().map(([key, item]): [string, Json] => [key, toJson(item)]));
  }
  if (value instanceof TemplateObject) {
    throw new EvalError(`tojson(): cannot serialize ${value.typeName}`);
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]): [string, Json] => [key, toJson(item)]));
}

// Characters that must not appear raw when JSON is embedded in HTML
const HTML_UNSAFE_JSON: Record<string, string> = {
  '<': '\\u003c',
  '>': '\\u003e',
  '&': '\\u0026',
  "'": '\\u0027',
};

export const tojson: Filter = (value, args, kwargs) => {
  const indent = integerArgument('tojson', args, kwargs, 0, 'indent', 0);
  const json = JSON.stringify(toJson(value), null, indent > 0 ? indent : undefined);
  return new SafeString(json.replace(/[<>&']/g, (char) => HTML_UNSAFE_JSON[char] ?? char));
};

export const pprint: Filter = (value) => repr(value);

const INVALID_ATTRIBUTE_KEY = /[\s/>=]/;

/**
 * Render a mapping as HTML attributes; none and undefined values are skipped
 */
export const xmlattr: Filter = (value, args, kwargs) => {
  if (!isMapping(value)) {
    throw typeError('xmlattr', 'a mapping', value);
  }
  const autospace = booleanArgument(args, kwargs, 0, 'autospace', true);

  const attributes: string[] = [];
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined || item === null) continue;
    if (INVALID_ATTRIBUTE_KEY.test(key)) {
      throw new EvalError(`xmlattr(): invalid attribute name '${key}'`);
    }
    const text = item instanceof SafeString ? item.toString() : escapeHtml(stringify(item));
    attributes.push(`${escapeHtml(key)}="${text}"`);
  }

  const joined = attributes.join(' ');
  return new SafeString(autospace && joined !== '' ? ` ${joined}` : joined);
};

export const safetyFilters = {
  default: defaultFilter,
  d: defaultFilter,
  escape,
  e: escape,
  safe,
  tojson,
  pprint,
  xmlattr,
} satisfies Record<string, Filter>;
