/**
 * Expression Evaluator
 *
 * Evaluates expression nodes against a scope frame. Statement rendering and
 * macro invocation belong to the renderer, which the evaluator reaches
 * through EvaluationHost.
 */

import { EvalError, TemplateError } from '../errors';
import type { Filter, FilterState, Test } from '../filters/types';
import type { Position, SourceLocation } from '../lexer/token';
import type {
  AttributeExpression,
  CallExpression,
  DictExpression,
  Expression,
  FilterCall,
  FilterExpression,
  Identifier,
  KeywordArgument,
  SliceExpression,
  SubscriptExpression,
  TestExpression,
  UnaryExpression,
} from '../parser/ast-nodes';
import { applyBinary, negate } from '../runtime/operators';
import { isSafeKey, lookupProperty } from '../runtime/utils';
import {
  ContextFunction,
  Float,
  isInteger,
  isMapping,
  isNumber,
  isString,
  isTruthy,
  NativeFunction,
  stringify,
  TemplateObject,
  typeName,
  type Value,
  type ValueMap,
} from '../runtime/values';
import { Macro } from './macro';
import type { ScopeArena } from './scope-arena';

/**
 * What the evaluator needs from the render it belongs to
 */
export interface EvaluationHost {
  readonly arena: ScopeArena;
  /** Strict undefined handling */
  readonly strict: boolean;
  /** Autoescape setting of the template being rendered */
  readonly autoescape: boolean;
  getFilter(name: string): Filter | undefined;
  getTest(name: string): Test | undefined;
  callMacro(macro: Macro, args: Value[], kwargs: ValueMap): Value;
  /** Template variables visible from a frame, without the globals */
  contextAt(frame: number): ValueMap;
}

// Operands of these filters and tests may be undefined even in strict mode
const TOLERANT_FILTERS = new Set(['default', 'd']);
const TOLERANT_TESTS = new Set(['defined', 'undefined']);

const INTEGER_NAME = /^-?\d+$/;

function startOf(loc: SourceLocation | null): Position | null {
  return loc ? loc.start : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `items()`, `keys()`, `values()` and `get()` on mappings, for keys the
 * mapping does not define itself
 */
function mappingMethod(mapping: ValueMap, name: string): Value {
  switch (name) {
    case 'items':
      return new NativeFunction('items', () => Object.entries(mapping).map(([key, value]) => [key, value]));
    case 'keys':
      return new NativeFunction('keys', () => Object.keys(mapping));
    case 'values':
      return new NativeFunction('values', () => Object.values(mapping));
    case 'get':
      return new NativeFunction('get', (args) => {
        const key = args[0];
        const value = isString(key) ? lookupProperty(mapping, key.toString()) : undefined;
        return value === undefined ? (args[1] ?? null) : value;
      });
    default:
      return undefined;
  }
}

/**
 * Indices selected by a slice, with negative bounds counted from the end
 */
function sliceIndices(length: number, start: number | null, stop: number | null, step: number): number[] {
  const clamp = (index: number, low: number, high: number): number => {
    const resolved = index < 0 ? index + length : index;
    return Math.min(Math.max(resolved, low), high);
  };

  const indices: number[] = [];
  if (step > 0) {
    const from = start === null ? 0 : clamp(start, 0, length);
    const to = stop === null ? length : clamp(stop, 0, length);
    for (let i = from; i < to; i += step) indices.push(i);
  } else {
    const from = start === null ? length - 1 : clamp(start, -1, length - 1);
    const to = stop === null ? -1 : clamp(stop, -1, length - 1);
    for (let i = from; i > to; i += step) indices.push(i);
  }
  return indices;
}

/**
 * Evaluator for expression AST
 *
 * Also serves as the FilterState handed to filters and tests, so `map`
 * and `select` can run other filters and tests with the same settings.
 */
export class Evaluator implements FilterState {
  private tolerant = 0;

  constructor(private readonly host: EvaluationHost) {}

  get autoescape(): boolean {
    return this.host.autoescape;
  }

  get strict(): boolean {
    return this.host.strict;
  }

  /**
   * Evaluate an expression in the given scope frame
   */
  evaluate(node: Expression, frame: number): Value {
    switch (node.type) {
      case 'NumberLiteral':
        return node.float ? new Float(Number(node.value)) : node.value;
      case 'StringLiteral':
      case 'BooleanLiteral':
      case 'NoneLiteral':
        return node.value;
      case 'Identifier':
        return this.evaluateIdentifier(node, frame);
      case 'ListExpression':
      case 'TupleExpression':
        return node.elements.map((element) => this.evaluate(element, frame));
      case 'DictExpression':
        return this.evaluateDict(node, frame);
      case 'AttributeExpression':
        return this.evaluateAttribute(node, frame);
      case 'SubscriptExpression':
        return this.evaluateSubscript(node, frame);
      case 'SliceExpression':
        return this.evaluateSlice(node, frame);
      case 'UnaryExpression':
        return this.evaluateUnary(node, frame);
      case 'BinaryExpression': {
        const left = this.evaluate(node.left, frame);
        const right = this.evaluate(node.right, frame);
        return this.guard(() => applyBinary(node.operator, left, right), node.loc, `Operator '${node.operator}'`);
      }
      case 'LogicalExpression': {
        const left = this.evaluate(node.left, frame);
        if (node.operator === 'and') {
          return isTruthy(left) ? this.evaluate(node.right, frame) : left;
        }
        return isTruthy(left) ? left : this.evaluate(node.right, frame);
      }
      case 'ConditionalExpression':
        if (isTruthy(this.evaluate(node.test, frame))) {
          return this.evaluate(node.consequent, frame);
        }
        return node.alternate ? this.evaluate(node.alternate, frame) : undefined;
      case 'CallExpression':
        return this.evaluateCall(node, frame);
      case 'FilterExpression':
        return this.evaluateFilter(node, frame);
      case 'TestExpression':
        return this.evaluateTest(node, frame);
    }
  }

  /**
   * Evaluate without raising for undefined names or attributes
   */
  evaluateTolerant(node: Expression, frame: number): Value {
    this.tolerant++;
    try {
      return this.evaluate(node, frame);
    } finally {
      this.tolerant--;
    }
  }

  evaluateKeywords(kwargs: KeywordArgument[], frame: number): ValueMap {
    const result: ValueMap = {};
    for (const kwarg of kwargs) {
      if (!isSafeKey(kwarg.name)) {
        throw new EvalError(`'${kwarg.name}' cannot be used as a keyword argument`, startOf(kwarg.value.loc));
      }
      result[kwarg.name] = this.evaluate(kwarg.value, frame);
    }
    return result;
  }

  /**
   * Apply a filter stage of `{% filter %}` or a block `set` to a rendered value
   */
  applyFilterCall(call: FilterCall, value: Value, frame: number): Value {
    const args = call.args.map((arg) => this.evaluate(arg, frame));
    const kwargs = this.evaluateKeywords(call.kwargs, frame);
    return this.runFilter(call.name, value, args, kwargs, call.loc);
  }

  /**
   * Call a value from a template: macros go through the host, other engine
   * objects decide for themselves whether they can be invoked
   */
  call(callee: Value, args: Value[], kwargs: ValueMap, loc: SourceLocation | null): Value {
    if (callee instanceof Macro) {
      return this.host.callMacro(callee, args, kwargs);
    }
    if (callee instanceof TemplateObject) {
      return this.guard(() => callee.invoke(args, kwargs), loc, `Call to ${callee.toString()}`);
    }
    throw new EvalError(`'${typeName(callee)}' object is not callable`, startOf(loc));
  }

  // FilterState

  applyFilter(name: string, value: Value, args: Value[] = [], kwargs: ValueMap = {}): Value {
    return this.runFilter(name, value, args, kwargs, null);
  }

  applyTest(name: string, value: Value, args: Value[] = []): boolean {
    return this.runTest(name, value, args, null);
  }

  getAttribute(value: Value, path: string): Value {
    let current = value;
    for (const segment of path.split('.')) {
      current = this.lookupAttribute(current, segment);
    }
    return current;
  }

  // Lookups

  /**
   * Attribute lookup without undefined checks. Numeric names index sequences
   * and strings; mappings only expose their own keys.
   */
  lookupAttribute(object: Value, name: string): Value {
    if (object === undefined || object === null) {
      return undefined;
    }
    if (INTEGER_NAME.test(name) && (Array.isArray(object) || isString(object))) {
      return this.lookupItem(object, Number(name));
    }
    if (isMapping(object)) {
      const value = lookupProperty(object, name);
      return value === undefined ? mappingMethod(object, name) : value;
    }
    if (object instanceof TemplateObject) {
      return object.getAttribute(name);
    }
    return undefined;
  }

  /**
   * Subscript lookup: integer keys index sequences and strings (negative
   * keys count from the end), other keys fall back to attribute lookup
   */
  lookupItem(object: Value, key: Value): Value {
    if (isInteger(key) && (Array.isArray(object) || isString(object))) {
      const items = Array.isArray(object) ? object : Array.from(object.toString());
      const position = Number(key);
      const index = position < 0 ? position + items.length : position;
      if (index < 0 || index >= items.length) {
        return undefined;
      }
      return items[index];
    }
    if (isNumber(key) && isMapping(object)) {
      return lookupProperty(object, stringify(key));
    }
    if (isString(key)) {
      return this.lookupAttribute(object, key.toString());
    }
    return undefined;
  }

  private get reportsUndefined(): boolean {
    return this.host.strict && this.tolerant === 0;
  }

  private evaluateIdentifier(node: Identifier, frame: number): Value {
    const value = this.host.arena.lookup(frame, node.name);
    if (value === undefined && this.reportsUndefined) {
      throw new EvalError(`'${node.name}' is undefined`, startOf(node.loc));
    }
    return value;
  }

  private checkMember(object: Value, value: Value, member: string, loc: SourceLocation | null): Value {
    if (value === undefined && this.reportsUndefined) {
      const detail =
        object === undefined || object === null
          ? `Cannot read ${member} of ${typeName(object)}`
          : `${typeName(object)} has no ${member}`;
      throw new EvalError(detail, startOf(loc));
    }
    return value;
  }

  private evaluateAttribute(node: AttributeExpression, frame: number): Value {
    const object = this.evaluate(node.object, frame);
    const value = this.lookupAttribute(object, node.name);
    return this.checkMember(object, value, `attribute '${node.name}'`, node.loc);
  }

  private evaluateSubscript(node: SubscriptExpression, frame: number): Value {
    const object = this.evaluate(node.object, frame);
    const key = this.evaluate(node.index, frame);
    const value = this.lookupItem(object, key);
    const member = isString(key) ? `item '${key.toString()}'` : `item ${stringify(key)}`;
    return this.checkMember(object, value, member, node.loc);
  }

  private evaluateSlice(node: SliceExpression, frame: number): Value {
    const object = this.evaluate(node.object, frame);
    const bound = (expr: Expression | null, what: string): number | null => {
      if (expr === null) return null;
      const value = this.evaluate(expr, frame);
      if (value === null || value === undefined) return null;
      if (!isInteger(value)) {
        throw new EvalError(`Slice ${what} must be an integer, got ${typeName(value)}`, startOf(expr.loc));
      }
      return Number(value);
    };
    const start = bound(node.start, 'start');
    const stop = bound(node.stop, 'stop');
    const step = bound(node.step, 'step') ?? 1;
    if (step === 0) {
      throw new EvalError('Slice step cannot be zero', startOf(node.loc));
    }

    if (Array.isArray(object)) {
      return sliceIndices(object.length, start, stop, step).map((i) => object[i]);
    }
    if (isString(object)) {
      const chars = Array.from(object.toString());
      return sliceIndices(chars.length, start, stop, step)
        .map((i) => chars[i])
        .join('');
    }
    if (object === undefined && !this.reportsUndefined) {
      return undefined;
    }
    throw new EvalError(`Cannot slice ${typeName(object)}`, startOf(node.loc));
  }

  private evaluateDict(node: DictExpression, frame: number): ValueMap {
    const result: ValueMap = {};
    for (const entry of node.entries) {
      const key = this.evaluate(entry.key, frame);
      if (!isString(key) && !isNumber(key)) {
        throw new EvalError(`Dict keys must be strings or numbers, got ${typeName(key)}`, startOf(entry.key.loc));
      }
      const name = stringify(key);
      if (!isSafeKey(name)) {
        throw new EvalError(`'${name}' cannot be used as a dict key`, startOf(entry.key.loc));
      }
      result[name] = this.evaluate(entry.value, frame);
    }
    return result;
  }

  private evaluateUnary(node: UnaryExpression, frame: number): Value {
    const argument = this.evaluate(node.argument, frame);
    switch (node.operator) {
      case 'not':
        return !isTruthy(argument);
      case '-':
        return this.guard(() => negate(argument), node.loc, 'Operator -');
      case '+':
        if (!isNumber(argument)) {
          throw new EvalError(`Bad operand type for unary +: ${typeName(argument)}`, startOf(node.loc));
        }
        return argument;
    }
  }

  private evaluateCall(node: CallExpression, frame: number): Value {
    const callee = this.evaluate(node.callee, frame);
    const args = node.args.map((arg) => this.evaluate(arg, frame));
    const kwargs = this.evaluateKeywords(node.kwargs, frame);
    if (callee === undefined && node.callee.type === 'Identifier') {
      throw new EvalError(`'${node.callee.name}' is undefined`, startOf(node.loc));
    }
    if (callee instanceof ContextFunction) {
      const context = this.host.contextAt(frame);
      return this.guard(
        () => callee.invokeWithContext(context, args, kwargs),
        node.loc,
        `Call to ${callee.toString()}`,
      );
    }
    return this.call(callee, args, kwargs, node.loc);
  }

  private evaluateFilter(node: FilterExpression, frame: number): Value {
    const value = TOLERANT_FILTERS.has(node.name)
      ? this.evaluateTolerant(node.value, frame)
      : this.evaluate(node.value, frame);
    const args = node.args.map((arg) => this.evaluate(arg, frame));
    const kwargs = this.evaluateKeywords(node.kwargs, frame);
    return this.runFilter(node.name, value, args, kwargs, node.loc);
  }

  private evaluateTest(node: TestExpression, frame: number): boolean {
    const value = TOLERANT_TESTS.has(node.name)
      ? this.evaluateTolerant(node.value, frame)
      : this.evaluate(node.value, frame);
    const args = node.args.map((arg) => this.evaluate(arg, frame));
    const result = this.runTest(node.name, value, args, node.loc);
    return node.negated ? !result : result;
  }

  private runFilter(name: string, value: Value, args: Value[], kwargs: ValueMap, loc: SourceLocation | null): Value {
    const filter = this.host.getFilter(name);
    if (!filter) {
      throw new EvalError(`Unknown filter '${name}'`, startOf(loc));
    }
    return this.guard(() => filter(value, args, kwargs, this), loc, `Filter '${name}'`);
  }

  private runTest(name: string, value: Value, args: Value[], loc: SourceLocation | null): boolean {
    const test = this.host.getTest(name);
    if (!test) {
      throw new EvalError(`Unknown test '${name}'`, startOf(loc));
    }
    return this.guard(() => test(value, args, this), loc, `Test '${name}'`);
  }

  /**
   * Attach the node position to errors raised without one, and turn
   * exceptions from user code into EvalErrors
   */
  private guard<T>(run: () => T, loc: SourceLocation | null, label: string): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof EvalError && error.position === null && loc) {
        throw new EvalError(error.detail, loc.start, error);
      }
      if (error instanceof TemplateError) {
        throw error;
      }
      throw new EvalError(`${label} failed: ${describeError(error)}`, startOf(loc), error);
    }
  }
}
