/**
 * String filters
 *
 * Filters that take a string keep a SafeString input safe: `"<b>"|safe|upper`
 * is still marked safe.
 */

import { EvalError } from '../errors';
import { SafeString } from '../runtime/safe-string';
import { lookupProperty } from '../runtime/utils';
import { isInteger, isMapping, isNumber, repr, stringify, toNumber, typeName, type Value } from '../runtime/values';
import {
  argument,
  booleanArgument,
  integerArgument,
  requireArgument,
  stringArgument,
} from './arguments';
import type { Filter } from './types';

/**
 * Re-wrap filter output when the input was already safe
 */
function preserve(input: Value, text: string): string | SafeString {
  return input instanceof SafeString ? new SafeString(text) : text;
}

export const upper: Filter = (value) => preserve(value, stringify(value).toUpperCase());

export const lower: Filter = (value) => preserve(value, stringify(value).toLowerCase());

export const capitalize: Filter = (value) => {
  const text = stringify(value);
  return preserve(value, text.charAt(0).toUpperCase() + text.slice(1).toLowerCase());
};

export const title: Filter = (value) => {
  const text = stringify(value).toLowerCase();
  return preserve(
    value,
    text.replace(/(^|[\s\-([{])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase()),
  );
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const trim: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const chars = argument(args, kwargs, 0, 'chars');
  if (chars === undefined || chars === null) {
    return preserve(value, text.trim());
  }
  const set = escapeRegExp(stringify(chars));
  return preserve(value, text.replace(new RegExp(`^[${set}]+|[${set}]+$`, 'g'), ''));
};

export const replace: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const search = stringify(requireArgument('replace', args, kwargs, 0, 'old'));
  const replacement = stringify(requireArgument('replace', args, kwargs, 1, 'new'));
  const count = integerArgument('replace', args, kwargs, 2, 'count', -1);

  if (count < 0) {
    return preserve(value, text.split(search).join(replacement));
  }
  let result = '';
  let rest = text;
  for (let i = 0; i < count; i++) {
    const at = rest.indexOf(search);
    if (at === -1) break;
    result += rest.slice(0, at) + replacement;
    rest = rest.slice(at + search.length);
    if (search === '') {
      // An empty pattern matches between characters
      result += rest.charAt(0);
      rest = rest.slice(1);
    }
  }
  return preserve(value, result + rest);
};

/**
 * Split on a separator, or on runs of whitespace when none is given
 */
export const split: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const separator = argument(args, kwargs, 0, 'sep');
  const maxSplit = integerArgument('split', args, kwargs, 1, 'maxsplit', -1);

  if (separator === undefined || separator === null) {
    const words = text.trim().split(/\s+/).filter((word) => word !== '');
    if (maxSplit < 0 || words.length <= maxSplit + 1) {
      return words;
    }
    // Keep the remainder intact after the last split
    const head = words.slice(0, maxSplit);
    let rest = text.trimStart();
    for (const word of head) {
      rest = rest.slice(rest.indexOf(word) + word.length).trimStart();
    }
    return [...head, rest];
  }

  const sep = stringify(separator);
  if (sep === '') {
    throw new EvalError('split(): empty separator');
  }
  const parts = text.split(sep);
  if (maxSplit < 0 || parts.length <= maxSplit + 1) {
    return parts;
  }
  return [...parts.slice(0, maxSplit), parts.slice(maxSplit).join(sep)];
};

// Lengths count code points, so an astral character is one character
function charCount(text: string): number {
  return Array.from(text).length;
}

export const truncate: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const length = integerArgument('truncate', args, kwargs, 0, 'length', 255);
  const killWords = booleanArgument(args, kwargs, 1, 'killwords', false);
  const end = stringArgument('truncate', args, kwargs, 2, 'end', '...');
  const leeway = integerArgument('truncate', args, kwargs, 3, 'leeway', 5);

  const chars = Array.from(text);
  const endLength = charCount(end);
  if (length < endLength) {
    throw new EvalError(`truncate(): length must be at least ${endLength}`);
  }
  if (chars.length <= length + leeway) {
    return preserve(value, text);
  }
  const kept = chars.slice(0, length - endLength).join('');
  if (killWords) {
    return preserve(value, kept + end);
  }
  const lastSpace = kept.lastIndexOf(' ');
  return preserve(value, (lastSpace === -1 ? kept : kept.slice(0, lastSpace)) + end);
};

export const wordcount: Filter = (value) => {
  return stringify(value).match(/\w+/gu)?.length ?? 0;
};

export const wordwrap: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const width = integerArgument('wordwrap', args, kwargs, 0, 'width', 79);
  const breakLongWords = booleanArgument(args, kwargs, 1, 'break_long_words', true);
  const wrapString = stringArgument('wordwrap', args, kwargs, 2, 'wrapstring', '\n');

  if (width < 1) {
    throw new EvalError('wordwrap(): width must be positive');
  }

  const paragraphs = text.split(/\r?\n/).map((paragraph) => {
    const lines: string[] = [];
    let line = '';
    for (let word of paragraph.split(/\s+/).filter((w) => w !== '')) {
      while (breakLongWords && charCount(word) > width) {
        if (line !== '') {
          lines.push(line);
          line = '';
        }
        const chars = Array.from(word);
        lines.push(chars.slice(0, width).join(''));
        word = chars.slice(width).join('');
      }
      if (word === '') continue;
      if (line === '') {
        line = word;
      } else if (charCount(line) + 1 + charCount(word) <= width) {
        line += ` ${word}`;
      } else {
        lines.push(line);
        line = word;
      }
    }
    if (line !== '') lines.push(line);
    return lines.join(wrapString);
  });
  return preserve(value, paragraphs.join(wrapString));
};

export const center: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const width = integerArgument('center', args, kwargs, 0, 'width', 80);
  const padding = width - charCount(text);
  if (padding <= 0) {
    return preserve(value, text);
  }
  const left = Math.floor(padding / 2);
  return preserve(value, ' '.repeat(left) + text + ' '.repeat(padding - left));
};

/**
 * Indent every line but the first; blank lines stay empty unless `blank` is set
 */
export const indent: Filter = (value, args, kwargs) => {
  const text = stringify(value);
  const width = argument(args, kwargs, 0, 'width');
  const first = booleanArgument(args, kwargs, 1, 'first', false);
  const blank = booleanArgument(args, kwargs, 2, 'blank', false);

  let prefix: string;
  if (width === undefined || width === null) {
    prefix = '    ';
  } else if (isNumber(width)) {
    prefix = ' '.repeat(Math.max(0, Math.trunc(toNumber(width))));
  } else {
    prefix = stringify(width);
  }

  const lines = text.split('\n');
  const indented = lines.map((line, i) => {
    if (i === 0 && !first) return line;
    if (line.trim() === '' && !blank) return line;
    return prefix + line;
  });
  return preserve(value, indented.join('\n'));
};

export const striptags: Filter = (value) => {
  return stringify(value)
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]*>/g, '')
    .replace(/\s+/g, ' ')
    .trim();
};

function quote(text: string, safe: string): string {
  let encoded = encodeURIComponent(text).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  if (safe.includes('/')) {
    encoded = encoded.replace(/%2F/g, '/');
  }
  return encoded;
}

export const urlencode: Filter = (value) => {
  if (isMapping(value)) {
    return Object.entries(value)
      .map(([key, item]) => `${quote(key, '')}=${quote(stringify(item), '')}`)
      .join('&');
  }
  if (Array.isArray(value)) {
    return value
      .map((pair) => {
        if (!Array.isArray(pair) || pair.length !== 2) {
          throw new EvalError('urlencode() expects a mapping or a list of pairs');
        }
        return `${quote(stringify(pair[0]), '')}=${quote(stringify(pair[1]), '')}`;
      })
      .join('&');
  }
  return quote(stringify(value), '/');
};

// Conversion directive: %[(key)][flags][width][.precision]type
const FORMAT_DIRECTIVE = /%(?:\(([^)]*)\))?([-+ 0#]*)(\d+)?(?:\.(\d+))?([sdifrxXoeEgcG%])/g;

function formatOne(item: Value, flags: string, width: string | undefined, precision: string | undefined, conversion: string): string {
  let text: string;
  switch (conversion) {
    case 's':
      text = stringify(item);
      if (precision !== undefined) text = text.slice(0, Number(precision));
      break;
    case 'r':
      text = repr(item);
      break;
    case 'c':
      text = isInteger(item) ? String.fromCodePoint(Number(item)) : stringify(item);
      break;
    default: {
      if (!isNumber(item) && typeof item !== 'boolean') {
        throw new EvalError(`format(): %${conversion} requires a number, got ${typeName(item)}`);
      }
      const number = isNumber(item) ? toNumber(item) : Number(item);
      text =
        typeof item === 'bigint' && (conversion === 'd' || conversion === 'i')
          ? item.toString()
          : formatNumeric(number, conversion, precision);
      if (flags.includes('+') && number >= 0) text = `+${text}`;
      else if (flags.includes(' ') && number >= 0) text = ` ${text}`;
    }
  }

  const minWidth = width === undefined ? 0 : Number(width);
  if (text.length >= minWidth) return text;
  if (flags.includes('-')) return text.padEnd(minWidth);
  if (flags.includes('0') && conversion !== 's' && conversion !== 'r') {
    const sign = /^[-+ ]/.test(text) ? text.charAt(0) : '';
    return sign + text.slice(sign.length).padStart(minWidth - sign.length, '0');
  }
  return text.padStart(minWidth);
}

function formatNumeric(number: number, conversion: string, precision: string | undefined): string {
  const digits = precision === undefined ? 6 : Number(precision);
  switch (conversion) {
    case 'd':
    case 'i':
      return String(Math.trunc(number));
    case 'f':
      return number.toFixed(digits);
    case 'e':
    case 'E': {
      const text = number.toExponential(digits).replace(/e([+-])(\d)$/, 'e$10$2');
      return conversion === 'E' ? text.toUpperCase() : text;
    }
    case 'g':
    case 'G': {
      const text = String(Number(number.toPrecision(digits === 0 ? 1 : digits)));
      return conversion === 'G' ? text.toUpperCase() : text;
    }
    case 'x':
      return Math.trunc(number).toString(16);
    case 'X':
      return Math.trunc(number).toString(16).toUpperCase();
    case 'o':
      return Math.trunc(number).toString(8);
    default:
      throw new EvalError(`format(): unsupported conversion '%${conversion}'`);
  }
}

/**
 * printf-style formatting: `"%s has %d items"|format(name, count)`, or
 * `"%(name)s"|format(name='Ada')` with keyword arguments
 */
export const format: Filter = (value, args, kwargs) => {
  const template = stringify(value);
  let next = 0;

  const result = template.replace(
    FORMAT_DIRECTIVE,
    (directive: string, key: string | undefined, flags: string, width: string | undefined, precision: string | undefined, conversion: string) => {
      if (conversion === '%') return '%';
      let item: Value;
      if (key !== undefined) {
        item = lookupProperty(kwargs, key);
        if (item === undefined) {
          throw new EvalError(`format(): missing keyword argument '${key}'`);
        }
      } else {
        if (next >= args.length) {
          throw new EvalError(`format(): not enough arguments for '${directive}'`);
        }
        item = args[next++];
      }
      return formatOne(item, flags, width, precision, conversion);
    },
  );

  if (next < args.length) {
    throw new EvalError('format(): not all arguments converted');
  }
  return preserve(value, result);
};

export const string: Filter = (value) => {
  return value instanceof SafeString ? value : stringify(value);
};

export const stringFilters = {
  upper,
  lower,
  capitalize,
  title,
  trim,
  replace,
  split,
  truncate,
  wordcount,
  wordwrap,
  center,
  indent,
  striptags,
  urlencode,
  format,
  string,
} satisfies Record<string, Filter>;
