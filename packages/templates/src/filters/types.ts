import type { Value, ValueMap } from '../runtime/values';

/**
 * What a filter or test can see of the render it runs in
 */
export interface FilterState {
  /** Whether output of the current template is HTML-escaped */
  readonly autoescape: boolean;
  /** Whether undefined values raise errors */
  readonly strict: boolean;
  /** Run another registered filter (used by `map`) */
  applyFilter(name: string, value: Value, args?: Value[], kwargs?: ValueMap): Value;
  /** Run a registered test (used by `select` and friends) */
  applyTest(name: string, value: Value, args?: Value[]): boolean;
  /** Resolve a dotted attribute path such as `user.name` or `items.0` */
  getAttribute(value: Value, path: string): Value;
}

/**
 * A filter receives the piped value, positional and keyword arguments.
 * Registered filters may ignore the trailing parameters.
 */
export type Filter = (value: Value, args: Value[], kwargs: ValueMap, state: FilterState) => Value;

export type FilterRegistry = Record<string, Filter>;

/**
 * A test backs `value is name(args)`
 */
export type Test = (value: Value, args: Value[], state: FilterState) => boolean;

export type TestRegistry = Record<string, Test>;
