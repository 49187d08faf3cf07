/**
 * Template values
 *
 * Templates operate on plain JS data: `undefined` is the Undefined sentinel,
 * `null` is none, arrays are sequences and plain objects are mappings.
 * Engine-made objects (macros, loop state, namespaces, functions, floats)
 * extend TemplateObject.
 *
 * Integers are whole JS numbers, or bigints outside the safe integer range.
 * Floats made by the engine are Float objects; a host number with a
 * fractional part also counts as a float.
 */

import { EvalError } from '../errors';
import { SafeString } from './safe-string';

export type Value =
  | undefined
  | null
  | boolean
  | number
  | bigint
  | string
  | SafeString
  | TemplateObject
  | Value[]
  | ValueMap;

export interface ValueMap {
  [key: string]: Value;
}

/**
 * Base class for objects created by the engine. Attributes are exposed
 * through getAttribute so templates never see JS internals.
 */
export abstract class TemplateObject {
  /** Type name used in error messages */
  abstract readonly typeName: string;

  getAttribute(_name: string): Value {
    return undefined;
  }

  /** Whether templates may call this object */
  isCallable(): boolean {
    return false;
  }

  invoke(_args: Value[], _kwargs: ValueMap): Value {
    throw new EvalError(`'${this.typeName}' object is not callable`);
  }

  /** Items produced by a `for` loop or tuple unpacking, or null when not iterable */
  iterate(): Value[] | null {
    return null;
  }

  toString(): string {
    return `<${this.typeName}>`;
  }
}

/**
 * Signature of functions implemented in TypeScript and callable from templates
 */
export type NativeCall = (args: Value[], kwargs: ValueMap) => Value;

/**
 * A native function that also receives the variables visible where it is
 * called, keyed by name
 */
export type ContextCall = (context: ValueMap, args: Value[], kwargs: ValueMap) => Value;

/**
 * A callable implemented in TypeScript: globals such as `range`, and bound
 * methods such as `loop.cycle`
 */
export class NativeFunction extends TemplateObject {
  readonly typeName = 'function';

  constructor(
    readonly name: string,
    private readonly fn: NativeCall,
  ) {
    super();
  }

  override isCallable(): boolean {
    return true;
  }

  override invoke(args: Value[], kwargs: ValueMap): Value {
    return this.fn(args, kwargs);
  }

  override getAttribute(name: string): Value {
    return name === 'name' ? this.name : undefined;
  }

  override toString(): string {
    return `<function ${this.name}>`;
  }
}

/**
 * A native function called with the render context, such as `debug()`.
 * Outside a render it sees an empty context.
 */
export class ContextFunction extends NativeFunction {
  constructor(
    name: string,
    private readonly withContext: ContextCall,
  ) {
    super(name, (args, kwargs) => withContext({}, args, kwargs));
  }

  invokeWithContext(context: ValueMap, args: Value[], kwargs: ValueMap): Value {
    return this.withContext(context, args, kwargs);
  }
}

/**
 * Mutable attribute bag; the only object templates may assign into
 * (`{% set ns.count = ns.count + 1 %}`)
 */
export class Namespace extends TemplateObject {
  readonly typeName = 'namespace';
  private readonly attributes = new Map<string, Value>();

  constructor(initial: ValueMap = {}) {
    super();
    for (const [key, value] of Object.entries(initial)) {
      this.attributes.set(key, value);
    }
  }

  override getAttribute(name: string): Value {
    return this.attributes.get(name);
  }

  setAttribute(name: string, value: Value): void {
    this.attributes.set(name, value);
  }

  entries(): [string, Value][] {
    return [...this.attributes.entries()];
  }

  override iterate(): Value[] {
    return [...this.attributes.keys()];
  }
}

/**
 * A float. Whole floats keep their kind, so `4 / 2` renders as `2.0`.
 */
export class Float extends TemplateObject {
  readonly typeName = 'number';

  constructor(readonly value: number) {
    super();
  }

  override toString(): string {
    return formatFloat(this.value);
  }
}

// =============================================================================
// Type checks
// =============================================================================

export function isSequence(value: Value): value is Value[] {
  return Array.isArray(value);
}

export function isMapping(value: Value): value is ValueMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof SafeString) &&
    !(value instanceof TemplateObject)
  );
}

export function isString(value: Value): value is string | SafeString {
  return typeof value === 'string' || value instanceof SafeString;
}

export type NumberValue = number | bigint | Float;

export function isNumber(value: Value): value is NumberValue {
  return typeof value === 'number' || typeof value === 'bigint' || value instanceof Float;
}

export function isInteger(value: Value): value is number | bigint {
  return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
}

export function isFloat(value: Value): value is number | Float {
  return value instanceof Float || (typeof value === 'number' && !Number.isInteger(value));
}

export function toNumber(value: NumberValue): number {
  return value instanceof Float ? value.value : Number(value);
}

/**
 * An integer result: a plain number when it is safe, a bigint otherwise
 */
export function makeInt(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

/**
 * Integer from a whole JS number that may lie outside the safe range
 */
export function intFromNumber(value: number): number | bigint {
  return Number.isSafeInteger(value) ? value : makeInt(BigInt(value));
}

/**
 * Name of a value's type for error messages
 */
export function typeName(value: Value): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'none';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number' || typeof value === 'bigint') return 'number';
  if (isString(value)) return 'string';
  if (Array.isArray(value)) return 'sequence';
  if (value instanceof TemplateObject) return value.typeName;
  return 'mapping';
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Truthiness: undefined, none, false, 0, NaN, "" and empty containers are falsy
 */
export function isTruthy(value: Value): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'bigint') return value !== 0n;
  if (value instanceof Float) return value.value !== 0 && !Number.isNaN(value.value);
  if (typeof value === 'string') return value.length > 0;
  if (value instanceof SafeString) return value.length > 0;
  if (value instanceof TemplateObject) return true;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}

/**
 * Floats always show a fractional part while they print in positional form
 */
export function formatFloat(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e15) {
    return value.toFixed(1);
  }
  return formatNumber(value);
}

/**
 * String form of a value, as `~`, `string` and output use it
 */
export function stringify(value: Value): string {
  if (value === undefined) return '';
  if (value === null) return 'none';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'bigint') return String(value);
  if (typeof value === 'string') return value;
  if (value instanceof SafeString || value instanceof TemplateObject) return value.toString();
  return repr(value);
}

/**
 * Debug representation: strings are quoted, containers are shown recursively
 */
export function repr(value: Value): string {
  if (value === undefined) return 'undefined';
  if (isString(value)) return JSON.stringify(value.toString());
  if (Array.isArray(value)) {
    return `[${value.map(repr).join(', ')}]`;
  }
  if (isMapping(value)) {
    const entries = Object.entries(value).map(([key, item]) => `${JSON.stringify(key)}: ${repr(item)}`);
    return `{${entries.join(', ')}}`;
  }
  return stringify(value);
}

/**
 * Items produced by iterating a value: sequence elements, mapping keys or
 * string characters. Returns null for values that cannot be iterated.
 */
export function iterate(value: Value): Value[] | null {
  if (Array.isArray(value)) return value;
  if (isString(value)) return Array.from(value.toString());
  if (isMapping(value)) return Object.keys(value);
  if (value instanceof TemplateObject) return value.iterate();
  return null;
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Structural equality. SafeString compares equal to its text and numbers
 * compare by value across kinds (`2 == 2.0`).
 */
export function equals(left: Value, right: Value): boolean {
  if (isNumber(left) && isNumber(right)) {
    if (isInteger(left) && isInteger(right)) {
      return BigInt(left) === BigInt(right);
    }
    return toNumber(left) === toNumber(right);
  }
  if (isString(left) && isString(right)) {
    return left.toString() === right.toString();
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, i) => equals(item, right[i]));
  }
  if (isMapping(left) && isMapping(right)) {
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) return false;
    return leftKeys.every(
      (key) => Object.prototype.hasOwnProperty.call(right, key) && equals(left[key], right[key]),
    );
  }
  return left === right;
}

/**
 * Ordering for `<`, `sort`, `min` and `max`. Numbers compare with numbers,
 * strings with strings and sequences element-wise.
 */
export function compare(left: Value, right: Value): number {
  if (isNumber(left) && isNumber(right)) {
    return compareNumbers(left, right);
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return Number(left) - Number(right);
  }
  if (isString(left) && isString(right)) {
    const a = left.toString();
    const b = right.toString();
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    const length = Math.min(left.length, right.length);
    for (let i = 0; i < length; i++) {
      const order = compare(left[i], right[i]);
      if (order !== 0) return order;
    }
    return left.length - right.length;
  }
  throw new EvalError(`Cannot compare ${typeName(left)} with ${typeName(right)}`);
}

export function compareNumbers(left: NumberValue, right: NumberValue): number {
  if (isInteger(left) && isInteger(right)) {
    const a = BigInt(left);
    const b = BigInt(right);
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const a = toNumber(left);
  const b = toNumber(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Membership for `in`: substring, sequence element, or mapping key
 */
export function contains(container: Value, item: Value): boolean {
  if (isString(container)) {
    if (!isString(item)) {
      throw new EvalError(`Cannot check whether a string contains ${typeName(item)}`);
    }
    return container.toString().includes(item.toString());
  }
  if (Array.isArray(container)) {
    return container.some((element) => equals(element, item));
  }
  if (isMapping(container)) {
    return isString(item) && Object.prototype.hasOwnProperty.call(container, item.toString());
  }
  if (container instanceof Namespace) {
    return isString(item) && container.getAttribute(item.toString()) !== undefined;
  }
  throw new EvalError(`Cannot check membership in ${typeName(container)}`);
}
