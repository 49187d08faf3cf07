/**
 * Template Environment
 *
 * Holds registered templates, filters, tests and globals, resolves
 * `extends` chains and renders templates by name.
 */

import type { Logger } from '@tessera/logger';
import { RenderError, ResolveError, TemplateError } from './errors';
import { builtInFilters } from './filters/index';
import type { Filter, FilterRegistry, Test, TestRegistry } from './filters/types';
import { createBuiltInGlobals } from './functions/index';
import { Renderer, type BlockLayer, type RenderEnvironment, type ResolvedTemplate } from './interpreter/renderer';
import { Lexer } from './lexer/lexer';
import type { Template } from './parser/ast-nodes';
import { Parser } from './parser/parser';
import { isSafeKey, lookupProperty } from './runtime/utils';
import type { Value, ValueMap } from './runtime/values';
import { builtInTests } from './tests/index';

export type UndefinedBehavior = 'lenient' | 'strict';

export type AutoescapeOption = boolean | ((templateName: string) => boolean);

/**
 * Options for an Environment.
 */
export interface EnvironmentOptions {
  /**
   * How undefined values behave. `lenient` (the default) renders them as empty
   * strings; `strict` raises an EvalError on any undefined variable or
   * attribute outside `is defined` and `default`.
   */
  undefinedBehavior?: UndefinedBehavior;

  /**
   * Whether output is HTML-escaped. Defaults to escaping templates whose name
   * ends in .html, .htm or .xml.
   *
   * @example
   * ```typescript
   * new Environment({ autoescape: (name) => name.endsWith('.j2.html') });
   * ```
   */
  autoescape?: AutoescapeOption;

  /** Remove the first newline after a block tag */
  trimBlocks?: boolean;
  /** Strip whitespace before a block tag at the start of a line */
  lstripBlocks?: boolean;
  /** Keep the single trailing newline of a template source */
  keepTrailingNewline?: boolean;

  /** Limit on nested macro calls, includes and recursive loops (default 200) */
  maxRecursionDepth?: number;

  /** Extra filters, merged over the built-in ones */
  filters?: FilterRegistry;
  /** Extra tests, merged over the built-in ones */
  tests?: TestRegistry;
  /** Variables visible to every template, under the render context */
  globals?: ValueMap;

  /** Receives registration and render events */
  logger?: Logger;
}

// Nested macro calls, includes and recursive loops; kept well inside the JS stack
export const DEFAULT_MAX_RECURSION_DEPTH = 200;

const AUTOESCAPE_EXTENSIONS = ['.html', '.htm', '.xml'];

function defaultAutoescape(templateName: string): boolean {
  const lower = templateName.toLowerCase();
  return AUTOESCAPE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function checkName(kind: string, name: string): void {
  if (name === '' || !isSafeKey(name)) {
    throw new TypeError(`Invalid ${kind} name '${name}'`);
  }
}

/**
 * Registry of templates plus everything they render with.
 *
 * @example
 * ```typescript
 * const env = new Environment();
 * env.registerTemplate('base.txt', 'Title: {% block title %}none{% endblock %}');
 * env.registerTemplate('page.txt', '{% extends "base.txt" %}{% block title %}{{ name }}{% endblock %}');
 * env.render('page.txt', { name: 'Home' }); // 'Title: Home'
 * ```
 */
export class Environment implements RenderEnvironment {
  readonly strict: boolean;
  readonly maxRecursionDepth: number;
  readonly logger: Logger | null;

  private readonly parser: Parser;
  private readonly autoescape: AutoescapeOption | undefined;
  private readonly templates = new Map<string, Template>();
  private readonly resolved = new Map<string, ResolvedTemplate>();
  private readonly filters: FilterRegistry;
  private readonly tests: TestRegistry;
  private readonly globals: ValueMap = {};

  constructor(options: EnvironmentOptions = {}) {
    this.strict = options.undefinedBehavior === 'strict';
    this.maxRecursionDepth = options.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH;
    this.logger = options.logger ?? null;
    this.autoescape = options.autoescape;
    this.parser = new Parser(
      new Lexer({
        trimBlocks: options.trimBlocks,
        lstripBlocks: options.lstripBlocks,
        keepTrailingNewline: options.keepTrailingNewline,
      }),
    );
    this.filters = { ...builtInFilters };
    this.tests = { ...builtInTests };

    for (const [name, filter] of Object.entries(options.filters ?? {})) {
      this.registerFilter(name, filter);
    }
    for (const [name, test] of Object.entries(options.tests ?? {})) {
      this.registerTest(name, test);
    }
    for (const [name, value] of Object.entries(options.globals ?? {})) {
      this.addGlobal(name, value);
    }
  }

  // Templates

  /**
   * Parse and store a template. Registering an existing name replaces it.
   * @throws LexError or ParseError when the source is invalid; the registry
   * is left unchanged
   */
  registerTemplate(name: string, source: string): Template {
    const template = this.parser.parseTemplate(name, source);
    this.templates.set(name, template);
    // Any cached chain may pass through the replaced template
    this.resolved.clear();
    this.logger?.debug('template_registered', {
      template: name,
      parent: template.parent,
      blocks: [...template.blocks.keys()],
    });
    return template;
  }

  removeTemplate(name: string): boolean {
    const removed = this.templates.delete(name);
    if (removed) {
      this.resolved.clear();
    }
    return removed;
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  getTemplate(name: string): Template | undefined {
    return this.templates.get(name);
  }

  templateNames(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * Follow a template's `extends` chain to its root and collect block
   * overrides. The walk is iterative and stops at the first repeated name.
   * @throws ResolveError for unknown templates and inheritance cycles
   */
  resolve(name: string): ResolvedTemplate {
    const cached = this.resolved.get(name);
    if (cached) {
      return cached;
    }
    const template = this.templates.get(name);
    if (!template) {
      throw new ResolveError(`Template not found: '${name}'`, name, [name]);
    }
    const resolved = this.resolveTemplate(template);
    this.resolved.set(name, resolved);
    this.logger?.debug('template_resolved', {
      template: name,
      chain: resolved.chain.map((t) => t.name),
    });
    return resolved;
  }

  private resolveTemplate(start: Template): ResolvedTemplate {
    const chain: Template[] = [start];
    const visited = new Set([start.name]);
    const path = [start.name];

    let current = start;
    while (current.parent !== null) {
      const parentName = current.parent;
      path.push(parentName);
      if (visited.has(parentName)) {
        throw new ResolveError(`Inheritance cycle: ${path.join(' -> ')}`, start.name, path);
      }
      const parent = this.templates.get(parentName);
      if (!parent) {
        throw new ResolveError(
          `Template not found: '${parentName}' (extended by '${current.name}')`,
          start.name,
          path,
        );
      }
      visited.add(parentName);
      chain.push(parent);
      current = parent;
    }

    const blocks = new Map<string, BlockLayer[]>();
    for (const template of chain) {
      for (const [blockName, block] of template.blocks) {
        const layers = blocks.get(blockName) ?? [];
        layers.push({ templateName: template.name, scoped: block.scoped, body: block.body });
        blocks.set(blockName, layers);
      }
    }

    return { name: start.name, chain, blocks };
  }

  // Rendering

  /**
   * Render a registered template.
   * @throws RenderError wrapping the first failure, with the template name
   * and the position of the innermost node being rendered
   */
  render(name: string, context: ValueMap = {}): string {
    return this.run(name, context, () => this.resolve(name));
  }

  /**
   * Render a template source without registering it. It may extend, include
   * and import registered templates.
   */
  renderString(source: string, context: ValueMap = {}, name: string = '<string>'): string {
    const template = this.parser.parseTemplate(name, source);
    return this.run(name, context, () => this.resolveTemplate(template));
  }

  private run(name: string, context: ValueMap, resolve: () => ResolvedTemplate): string {
    const started = Date.now();
    try {
      const output = new Renderer(this).render(resolve(), context);
      this.logger?.debug('render_completed', {
        template: name,
        duration_ms: Date.now() - started,
        output_length: output.length,
      });
      return output;
    } catch (error) {
      const failure =
        error instanceof RenderError
          ? error
          : new RenderError(name, error instanceof TemplateError ? error.position : null, error);
      this.logger?.warn('render_failed', { template: name, error: failure.message });
      throw failure;
    }
  }

  // Filters, tests and globals

  registerFilter(name: string, filter: Filter): void {
    checkName('filter', name);
    this.filters[name] = filter;
  }

  registerTest(name: string, test: Test): void {
    checkName('test', name);
    this.tests[name] = test;
  }

  addGlobal(name: string, value: Value): void {
    checkName('global', name);
    this.globals[name] = value;
  }

  getFilter(name: string): Filter | undefined {
    return lookupProperty(this.filters, name);
  }

  getTest(name: string): Test | undefined {
    return lookupProperty(this.tests, name);
  }

  getGlobals(): ValueMap {
    return { ...createBuiltInGlobals(), ...this.globals };
  }

  shouldAutoescape(templateName: string): boolean {
    if (typeof this.autoescape === 'function') {
      return this.autoescape(templateName);
    }
    return this.autoescape ?? defaultAutoescape(templateName);
  }
}
