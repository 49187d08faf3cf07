/**
 * Built-in Filter Registry
 *
 * Exports all built-in filters for use in templates. These filters are
 * available by default and can be overridden through registerFilter.
 */

import { higherOrderFilters } from './higher-order';
import { mappingFilters } from './mapping';
import { numberFilters } from './number';
import { safetyFilters } from './safety';
import { sequenceFilters } from './sequence';
import { stringFilters } from './string';
import type { FilterRegistry } from './types';

export type { Filter, FilterRegistry, FilterState, Test, TestRegistry } from './types';
export { Group } from './mapping';

/**
 * Built-in filters available by default in all templates.
 *
 * @example
 * ```typescript
 * import { builtInFilters } from './filters';
 *
 * // Merge with user filters
 * const allFilters = { ...builtInFilters, ...userFilters };
 * ```
 */
export const builtInFilters: FilterRegistry = {
  ...stringFilters,
  ...sequenceFilters,
  ...mappingFilters,
  ...numberFilters,
  ...higherOrderFilters,
  ...safetyFilters,
};
