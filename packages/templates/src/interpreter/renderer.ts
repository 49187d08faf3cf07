/**
 * Renderer
 *
 * Walks statement nodes and produces output text. One Renderer serves one
 * render call: it owns the scope arena, tracks which template is being
 * rendered (for error positions and autoescaping) and guards recursion
 * through macros, includes and recursive loops.
 */

import type { Logger } from '@tessera/logger';
import { EvalError, RenderError, ResolveError, TemplateError } from '../errors';
import type { Filter, Test } from '../filters/types';
import type { SourceLocation } from '../lexer/token';
import type {
  AssignTarget,
  BlockStatement,
  CallBlockStatement,
  Expression,
  ForStatement,
  FromImportStatement,
  IfStatement,
  ImportStatement,
  IncludeStatement,
  SetBlockStatement,
  Statement,
  Template,
  WithStatement,
} from '../parser/ast-nodes';
import { SafeString } from '../runtime/safe-string';
import { escapeHtml, lookupProperty } from '../runtime/utils';
import {
  isString,
  isTruthy,
  iterate,
  Namespace,
  NativeFunction,
  stringify,
  typeName,
  type Value,
  type ValueMap,
} from '../runtime/values';
import { Evaluator, type EvaluationHost } from './evaluator';
import { LoopRun } from './loop-state';
import { Macro } from './macro';
import { ScopeArena } from './scope-arena';

/**
 * One override of a block, from the template that defines it
 */
export interface BlockLayer {
  readonly templateName: string;
  readonly scoped: boolean;
  readonly body: readonly Statement[];
}

/**
 * A template with its `extends` chain flattened
 */
export interface ResolvedTemplate {
  readonly name: string;
  /** The template and its ancestors, most derived first */
  readonly chain: readonly Template[];
  /** Block overrides by name, most derived first */
  readonly blocks: ReadonlyMap<string, readonly BlockLayer[]>;
}

/**
 * Settings and lookups the renderer takes from its environment
 */
export interface RenderEnvironment {
  readonly strict: boolean;
  readonly maxRecursionDepth: number;
  readonly logger: Logger | null;
  getFilter(name: string): Filter | undefined;
  getTest(name: string): Test | undefined;
  getGlobals(): ValueMap;
  shouldAutoescape(templateName: string): boolean;
  hasTemplate(name: string): boolean;
  resolve(name: string): ResolvedTemplate;
}

// Top-level statements of child templates that run before the parent renders
const PREAMBLE_STATEMENTS = new Set<Statement['type']>([
  'SetStatement',
  'SetBlockStatement',
  'MacroStatement',
  'ImportStatement',
  'FromImportStatement',
]);

export class Renderer implements EvaluationHost {
  readonly arena = new ScopeArena();
  private readonly evaluator: Evaluator;
  private readonly globalsFrame: number;

  private templateName: string;
  private autoescapeEnabled = false;
  private blocks: ReadonlyMap<string, readonly BlockLayer[]> = new Map();
  private rootFrame: number;
  private depth = 0;

  constructor(private readonly environment: RenderEnvironment) {
    this.evaluator = new Evaluator(this);
    this.globalsFrame = this.arena.createFrame(null, environment.getGlobals());
    this.rootFrame = this.globalsFrame;
    this.templateName = '';
  }

  get strict(): boolean {
    return this.environment.strict;
  }

  get autoescape(): boolean {
    return this.autoescapeEnabled;
  }

  getFilter(name: string): Filter | undefined {
    return this.environment.getFilter(name);
  }

  contextAt(frame: number): ValueMap {
    return this.arena.visible(frame, this.globalsFrame);
  }

  getTest(name: string): Test | undefined {
    return this.environment.getTest(name);
  }

  /**
   * Render a resolved template with the given context variables
   */
  render(template: ResolvedTemplate, context: ValueMap): string {
    const frame = this.arena.createFrame(this.globalsFrame, context);
    return this.renderTemplate(template, frame);
  }

  /**
   * Invoke a macro: bind arguments in a new frame whose parent is the frame
   * the macro was defined in, then render its body
   */
  callMacro(macro: Macro, args: Value[], kwargs: ValueMap): Value {
    return this.nested(() => {
      const frame = this.arena.createFrame(macro.scope);
      const extra: ValueMap = {};
      const consumed = new Set<string>();

      for (const [key, value] of Object.entries(kwargs)) {
        if (key === 'caller') {
          this.arena.set(frame, 'caller', value);
          consumed.add(key);
        }
      }

      macro.params.forEach((param, i) => {
        const byKeyword = lookupProperty(kwargs, param.name);
        if (i < args.length) {
          if (byKeyword !== undefined) {
            throw new EvalError(`Macro '${macro.name}' got multiple values for argument '${param.name}'`);
          }
          this.arena.set(frame, param.name, args[i]);
        } else if (byKeyword !== undefined) {
          this.arena.set(frame, param.name, byKeyword);
        } else if (param.default) {
          this.arena.set(frame, param.name, this.evaluator.evaluate(param.default, frame));
        } else {
          this.arena.set(frame, param.name, undefined);
        }
        consumed.add(param.name);
      });

      for (const [key, value] of Object.entries(kwargs)) {
        if (!consumed.has(key)) extra[key] = value;
      }
      this.arena.set(frame, 'varargs', args.slice(macro.params.length));
      this.arena.set(frame, 'kwargs', extra);

      const output = this.inTemplate(macro.templateName, () => this.renderBody(macro.body, frame));
      return new SafeString(output);
    });
  }

  // Templates

  private renderTemplate(template: ResolvedTemplate, frame: number): string {
    const saved = {
      autoescape: this.autoescapeEnabled,
      blocks: this.blocks,
      rootFrame: this.rootFrame,
    };
    this.autoescapeEnabled = this.environment.shouldAutoescape(template.name);
    this.blocks = template.blocks;
    this.rootFrame = frame;

    try {
      const root = template.chain[template.chain.length - 1];
      for (const child of template.chain.slice(0, -1)) {
        this.inTemplate(child.name, () => {
          for (const statement of child.ast.body) {
            if (PREAMBLE_STATEMENTS.has(statement.type)) {
              this.renderStatement(statement, frame);
            }
          }
        });
      }
      return this.inTemplate(root.name, () => this.renderBody(root.ast.body, frame));
    } finally {
      this.autoescapeEnabled = saved.autoescape;
      this.blocks = saved.blocks;
      this.rootFrame = saved.rootFrame;
    }
  }

  private inTemplate<T>(name: string, run: () => T): T {
    const previous = this.templateName;
    this.templateName = name;
    try {
      return run();
    } finally {
      this.templateName = previous;
    }
  }

  private nested<T>(run: () => T): T {
    const limit = this.environment.maxRecursionDepth;
    if (this.depth >= limit) {
      throw new EvalError(`Maximum recursion depth of ${limit} exceeded`);
    }
    this.depth++;
    try {
      return run();
    } finally {
      this.depth--;
    }
  }

  // Statements

  private renderBody(body: readonly Statement[], frame: number): string {
    let output = '';
    for (const statement of body) {
      output += this.renderStatement(statement, frame);
    }
    return output;
  }

  private renderStatement(node: Statement, frame: number): string {
    try {
      switch (node.type) {
        case 'ContentStatement':
          return node.value;
        case 'OutputStatement':
          return this.output(this.evaluator.evaluate(node.expression, frame));
        case 'IfStatement':
          return this.renderIf(node, frame);
        case 'ForStatement':
          return this.renderLoop(node, frame, this.evaluator.evaluate(node.iter, frame), 0);
        case 'BlockStatement':
          return this.renderBlock(node, frame);
        case 'ExtendsStatement':
          // Resolved before rendering starts
          return '';
        case 'IncludeStatement':
          return this.renderInclude(node, frame);
        case 'ImportStatement':
          this.renderImport(node, frame);
          return '';
        case 'FromImportStatement':
          this.renderFromImport(node, frame);
          return '';
        case 'SetStatement':
          this.assign(frame, node.target, this.evaluator.evaluate(node.value, frame), node.loc);
          return '';
        case 'SetBlockStatement':
          this.renderSetBlock(node, frame);
          return '';
        case 'MacroStatement':
          this.arena.set(
            frame,
            node.name,
            new Macro(node.name, node.params, node.body, frame, this.templateName),
          );
          return '';
        case 'CallBlockStatement':
          return this.renderCallBlock(node, frame);
        case 'FilterBlockStatement': {
          let value: Value = this.capture(node.body, frame);
          for (const filter of node.filters) {
            value = this.evaluator.applyFilterCall(filter, value, frame);
          }
          return this.output(value);
        }
        case 'WithStatement':
          return this.renderWith(node, frame);
      }
    } catch (error) {
      throw this.annotate(error, node.loc);
    }
  }

  /**
   * Wrap a failure with the current template name and the innermost known
   * position. Errors already wrapped pass through unchanged.
   */
  private annotate(error: unknown, loc: SourceLocation | null): RenderError {
    if (error instanceof RenderError) {
      return error;
    }
    const position =
      error instanceof TemplateError && error.position !== null ? error.position : (loc?.start ?? null);
    return new RenderError(this.templateName, position, error);
  }

  private output(value: Value): string {
    if (value === undefined || value === null) {
      return '';
    }
    if (value instanceof SafeString) {
      return value.toString();
    }
    const text = stringify(value);
    return this.autoescapeEnabled ? escapeHtml(text) : text;
  }

  /**
   * Render a body into a value: marked safe under autoescape, since its
   * output has already been escaped
   */
  private capture(body: readonly Statement[], frame: number): Value {
    const text = this.renderBody(body, frame);
    return this.autoescapeEnabled ? new SafeString(text) : text;
  }

  private renderIf(node: IfStatement, frame: number): string {
    for (const branch of node.branches) {
      if (isTruthy(this.evaluator.evaluate(branch.test, frame))) {
        return this.renderBody(branch.body, frame);
      }
    }
    return node.alternate ? this.renderBody(node.alternate, frame) : '';
  }

  private renderLoop(node: ForStatement, frame: number, iterable: Value, depth0: number): string {
    let items = iterate(iterable);
    if (items === null) {
      if (iterable !== undefined) {
        throw new EvalError(`'${typeName(iterable)}' object is not iterable`, node.iter.loc?.start ?? null);
      }
      items = [];
    }

    const filter = node.filter;
    if (filter) {
      items = items.filter((item) => {
        const scratch = this.arena.createFrame(frame);
        this.assign(scratch, node.target, item, node.loc);
        return isTruthy(this.evaluator.evaluate(filter, scratch));
      });
    }

    if (items.length === 0) {
      return node.alternate ? this.renderBody(node.alternate, frame) : '';
    }

    const recurse = node.recursive
      ? (children: Value) =>
          new SafeString(this.nested(() => this.renderLoop(node, frame, children, depth0 + 1)))
      : null;
    const run = new LoopRun(items, depth0, recurse);

    let output = '';
    items.forEach((item, i) => {
      const iteration = this.arena.createFrame(frame);
      this.assign(iteration, node.target, item, node.loc);
      this.arena.set(iteration, 'loop', run.at(i));
      output += this.renderBody(node.body, iteration);
    });
    return output;
  }

  private assign(frame: number, target: AssignTarget, value: Value, loc: SourceLocation | null): void {
    switch (target.kind) {
      case 'name':
        this.arena.set(frame, target.name, value);
        return;
      case 'tuple': {
        const items = value === undefined ? null : iterate(value);
        if (items === null) {
          throw new EvalError(`Cannot unpack ${typeName(value)}`, loc?.start ?? null);
        }
        if (items.length !== target.names.length) {
          throw new EvalError(
            `Expected ${target.names.length} values to unpack, got ${items.length}`,
            loc?.start ?? null,
          );
        }
        target.names.forEach((name, i) => this.arena.set(frame, name, items[i]));
        return;
      }
      case 'attribute': {
        const object = this.arena.lookup(frame, target.object);
        if (!(object instanceof Namespace)) {
          throw new EvalError(
            `Cannot assign attribute '${target.name}' on ${typeName(object)}; only namespaces support attribute assignment`,
            loc?.start ?? null,
          );
        }
        object.setAttribute(target.name, value);
      }
    }
  }

  private renderSetBlock(node: SetBlockStatement, frame: number): void {
    let value: Value = this.capture(node.body, frame);
    for (const filter of node.filters) {
      value = this.evaluator.applyFilterCall(filter, value, frame);
    }
    this.assign(frame, node.target, value, node.loc);
  }

  private renderWith(node: WithStatement, frame: number): string {
    const values = node.assignments.map((assignment) => this.evaluator.evaluate(assignment.value, frame));
    const inner = this.arena.createFrame(frame);
    node.assignments.forEach((assignment, i) => this.assign(inner, assignment.target, values[i], node.loc));
    return this.renderBody(node.body, inner);
  }

  private renderCallBlock(node: CallBlockStatement, frame: number): string {
    const caller = new Macro('caller', node.params, node.body, frame, this.templateName);
    const callee = this.evaluator.evaluate(node.call.callee, frame);
    const args = node.call.args.map((arg) => this.evaluator.evaluate(arg, frame));
    const kwargs = this.evaluator.evaluateKeywords(node.call.kwargs, frame);
    kwargs.caller = caller;
    return this.output(this.evaluator.call(callee, args, kwargs, node.call.loc));
  }

  // Inheritance

  private renderBlock(node: BlockStatement, frame: number): string {
    const layers = this.blocks.get(node.name) ?? [
      { templateName: this.templateName, scoped: node.scoped, body: node.body },
    ];
    // `scoped` may sit on the declaration or on any override
    const scoped = node.scoped || layers.some((layer) => layer.scoped);
    const parent = scoped ? frame : this.rootFrame;
    return this.renderBlockLayer(node.name, layers, 0, parent);
  }

  private renderBlockLayer(name: string, layers: readonly BlockLayer[], index: number, parent: number): string {
    const layer = layers[index];
    const frame = this.arena.createFrame(parent);
    this.arena.set(
      frame,
      'super',
      new NativeFunction('super', () => {
        if (index + 1 >= layers.length) {
          throw new EvalError(`Block '${name}' has no parent block to render with super()`);
        }
        return new SafeString(this.renderBlockLayer(name, layers, index + 1, parent));
      }),
    );
    return this.inTemplate(layer.templateName, () => this.renderBody(layer.body, frame));
  }

  // Include and import

  private templateNames(expression: Expression, frame: number): string[] {
    const value = this.evaluator.evaluate(expression, frame);
    const candidates = Array.isArray(value) ? value : [value];
    return candidates.map((candidate) => {
      if (!isString(candidate)) {
        throw new EvalError(`Template name must be a string, got ${typeName(candidate)}`, expression.loc?.start ?? null);
      }
      return candidate.toString();
    });
  }

  private renderInclude(node: IncludeStatement, frame: number): string {
    const names = this.templateNames(node.template, frame);
    const name = names.find((candidate) => this.environment.hasTemplate(candidate));

    if (name === undefined) {
      if (node.ignoreMissing) {
        this.environment.logger?.warn('include_missing_ignored', {
          template: this.templateName,
          include: names,
        });
        return '';
      }
      const detail =
        names.length === 1
          ? `Template not found: '${names[0]}'`
          : `None of the templates could be found: ${names.map((n) => `'${n}'`).join(', ')}`;
      throw new ResolveError(detail, this.templateName, names);
    }

    const resolved = this.environment.resolve(name);
    const parent = node.withContext ? frame : this.globalsFrame;
    return this.nested(() => this.renderTemplate(resolved, this.arena.createFrame(parent)));
  }

  /**
   * Render a template for its definitions only: output is discarded and the
   * top-level bindings (macros and `set` values) become the module's exports
   */
  private loadModule(expression: Expression, frame: number): ValueMap {
    const [name] = this.templateNames(expression, frame);
    if (name === undefined) {
      throw new EvalError('Import requires a template name', expression.loc?.start ?? null);
    }
    const resolved = this.environment.resolve(name);
    const moduleFrame = this.arena.createFrame(this.globalsFrame);
    this.nested(() => this.renderTemplate(resolved, moduleFrame));

    const exports: ValueMap = {};
    for (const [key, value] of this.arena.ownBindings(moduleFrame)) {
      exports[key] = value;
    }
    return exports;
  }

  private renderImport(node: ImportStatement, frame: number): void {
    this.arena.set(frame, node.alias, this.loadModule(node.template, frame));
  }

  private renderFromImport(node: FromImportStatement, frame: number): void {
    const module = this.loadModule(node.template, frame);
    for (const { name, alias } of node.names) {
      const value = lookupProperty(module, name);
      if (value === undefined) {
        throw new EvalError(`The imported template does not export '${name}'`, node.loc?.start ?? null);
      }
      this.arena.set(frame, alias, value);
    }
  }
}
