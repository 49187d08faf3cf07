/**
 * @tessera/templates - Main API
 *
 * Jinja-compatible template engine. Templates are parsed once into an AST and
 * rendered by walking it; nothing is compiled to JavaScript.
 */

import { Environment, type EnvironmentOptions } from './environment';
import type { ValueMap } from './runtime/values';

/**
 * Options for the one-shot helpers: environment options plus the name the
 * template is registered under (used in errors and for autoescape detection)
 */
export interface CompileOptions extends EnvironmentOptions {
  name?: string;
}

/**
 * Compiled template that can be rendered multiple times with different contexts.
 */
export interface CompiledTemplate {
  readonly name: string;
  /**
   * Render the compiled template with the given context.
   *
   * @param context - Variables visible to the template
   * @returns The rendered template as a string
   */
  render(context?: ValueMap): string;
}

const DEFAULT_TEMPLATE_NAME = '<template>';

/**
 * Compile a template string into a reusable compiled template.
 *
 * The source is parsed once; each render walks the same AST.
 *
 * @example
 * ```typescript
 * const compiled = compile('Hello {{ name }}!');
 * const result1 = compiled.render({ name: 'Alice' });
 * const result2 = compiled.render({ name: 'Bob' });
 * ```
 */
export function compile(source: string, options: CompileOptions = {}): CompiledTemplate {
  const { name = DEFAULT_TEMPLATE_NAME, ...environmentOptions } = options;
  const environment = new Environment(environmentOptions);
  environment.registerTemplate(name, source);

  return {
    name,
    render(context: ValueMap = {}): string {
      return environment.render(name, context);
    },
  };
}

/**
 * Render a template string with the given context.
 *
 * For templates rendered repeatedly, or that extend, include or import other
 * templates, create an Environment instead.
 *
 * @example
 * ```typescript
 * const result = render('{% for n in items %}{{ n }}{% endfor %}', { items: [1, 2, 3] });
 * // result: '123'
 *
 * // With a custom filter
 * const shout = render('{{ name | shout }}', { name: 'alice' }, {
 *   filters: { shout: (value) => `${value}!` },
 * });
 * // shout: 'alice!'
 * ```
 */
export function render(source: string, context: ValueMap = {}, options: CompileOptions = {}): string {
  return compile(source, options).render(context);
}

export {
  DEFAULT_MAX_RECURSION_DEPTH,
  Environment,
  type AutoescapeOption,
  type EnvironmentOptions,
  type UndefinedBehavior,
} from './environment';
export { EvalError, RenderError, ResolveError, TemplateError } from './errors';
export type { Filter, FilterRegistry, FilterState, Test, TestRegistry } from './filters/types';
export type { ResolvedTemplate } from './interpreter/renderer';
export { LexError } from './lexer/lexer-error';
export type { Position, SourceLocation } from './lexer/token';
export { ParseError } from './parser/parser-error';
export type { Program, Template } from './parser/ast-nodes';
export { SafeString } from './runtime/safe-string';
export {
  ContextFunction,
  Float,
  isFloat,
  isInteger,
  Namespace,
  NativeFunction,
  TemplateObject,
  toNumber,
  type Value,
  type ValueMap,
} from './runtime/values';
