/**
 * Global functions available in every template
 */

import { EvalError } from '../errors';
import { booleanArgument, integerArgument, stringArgument, typeError } from '../filters/arguments';
import { SafeString } from '../runtime/safe-string';
import { isSafeKey } from '../runtime/utils';
import {
  ContextFunction,
  isInteger,
  isMapping,
  Namespace,
  NativeFunction,
  repr,
  TemplateObject,
  type Value,
  type ValueMap,
} from '../runtime/values';

// Upper bound on the length of a `range` result
export const MAX_RANGE = 100_000;

function range(args: Value[]): Value[] {
  const numbers = args.map((arg, i) => {
    if (!isInteger(arg)) {
      throw new EvalError(`range() argument ${i + 1} must be an integer`);
    }
    return Number(arg);
  });

  let start = 0;
  let stop: number;
  let step = 1;
  switch (numbers.length) {
    case 1:
      [stop] = numbers;
      break;
    case 2:
      [start, stop] = numbers;
      break;
    case 3:
      [start, stop, step] = numbers;
      break;
    default:
      throw new EvalError(`range() expected 1 to 3 arguments, got ${numbers.length}`);
  }
  if (step === 0) {
    throw new EvalError('range() step must not be zero');
  }

  const length = Math.max(0, Math.ceil((stop - start) / step));
  if (length > MAX_RANGE) {
    throw new EvalError(`range() result too long (${length} items, limit ${MAX_RANGE})`);
  }
  return Array.from({ length }, (_, i) => start + i * step);
}

function dict(args: Value[], kwargs: ValueMap): ValueMap {
  const result: ValueMap = {};
  for (const arg of args) {
    if (!isMapping(arg)) {
      throw typeError('dict', 'a mapping', arg);
    }
    Object.assign(result, arg);
  }
  for (const [key, value] of Object.entries(kwargs)) {
    if (isSafeKey(key)) result[key] = value;
  }
  return result;
}

function namespace(args: Value[], kwargs: ValueMap): Namespace {
  return new Namespace(dict(args, kwargs));
}

const LOREM =
  'Lorem ipsum dolor sit amet, consectetur adipiscing elit. Sed do eiusmod tempor incididunt ut labore ' +
  'et dolore magna aliqua. Ut enim ad minim veniam, quis nostrud exercitation ullamco laboris nisi ut ' +
  'aliquip ex ea commodo consequat.';

/**
 * `lipsum(n=5, html=true)`: placeholder paragraphs, wrapped in `<p>` and
 * marked safe unless `html` is false
 */
function lipsum(args: Value[], kwargs: ValueMap): Value {
  const count = integerArgument('lipsum', args, kwargs, 0, 'n', 5);
  const html = booleanArgument(args, kwargs, 1, 'html', true);
  const paragraphs = Array.from({ length: Math.max(0, count) }, () => LOREM);
  if (html) {
    return new SafeString(paragraphs.map((paragraph) => `<p>${paragraph}</p>`).join('\n'));
  }
  return paragraphs.join('\n\n');
}

/**
 * `debug()`: the template variables in scope, one `name: repr` line each
 */
function debug(context: ValueMap): string {
  const lines = Object.keys(context)
    .sort()
    .map((name) => `  ${name}: ${repr(context[name])}\n`);
  return `Context:\n${lines.join('')}`;
}

/**
 * Cycles through values: `{% set row = cycler('odd', 'even') %}{{ row.next() }}`
 */
export class Cycler extends TemplateObject {
  readonly typeName = 'cycler';
  private position = 0;

  constructor(private readonly items: readonly Value[]) {
    super();
    if (items.length === 0) {
      throw new EvalError('cycler() requires at least one value');
    }
  }

  get current(): Value {
    return this.items[this.position];
  }

  next(): Value {
    const value = this.current;
    this.position = (this.position + 1) % this.items.length;
    return value;
  }

  reset(): void {
    this.position = 0;
  }

  override getAttribute(name: string): Value {
    switch (name) {
      case 'current':
        return this.current;
      case 'next':
        return new NativeFunction('next', () => this.next());
      case 'reset':
        return new NativeFunction('reset', () => {
          this.reset();
          return undefined;
        });
      default:
        return undefined;
    }
  }
}

/**
 * Returns '' on its first call and the separator afterwards
 */
export class Joiner extends TemplateObject {
  readonly typeName = 'joiner';
  private used = false;

  constructor(private readonly separator: string) {
    super();
  }

  override isCallable(): boolean {
    return true;
  }

  override invoke(): Value {
    if (!this.used) {
      this.used = true;
      return '';
    }
    return this.separator;
  }
}

/**
 * Built-in globals, bound in the outermost scope of every render
 */
export function createBuiltInGlobals(): ValueMap {
  return {
    range: new NativeFunction('range', (args) => range(args)),
    dict: new NativeFunction('dict', dict),
    namespace: new NativeFunction('namespace', namespace),
    cycler: new NativeFunction('cycler', (args) => new Cycler(args)),
    joiner: new NativeFunction(
      'joiner',
      (args, kwargs) => new Joiner(stringArgument('joiner', args, kwargs, 0, 'sep', ', ')),
    ),
    lipsum: new NativeFunction('lipsum', lipsum),
    debug: new ContextFunction('debug', (context) => debug(context)),
  };
}
