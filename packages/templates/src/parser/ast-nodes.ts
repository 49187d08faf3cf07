/**
 * AST Node Types for Template Parser
 *
 * Statements mirror the template tags; expressions follow the Jinja expression
 * grammar. Every node is discriminated by its `type` string.
 */

import type { SourceLocation } from '../lexer/token';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  type: string; // Node type discriminator
  loc: SourceLocation | null; // Position information (null for synthetic nodes)
}

// =============================================================================
// Expressions
// =============================================================================

export interface StringLiteral extends Node {
  type: 'StringLiteral';
  value: string;
}

export interface NumberLiteral extends Node {
  type: 'NumberLiteral';
  value: number | bigint; // bigint only outside the safe integer range
  float: boolean;
  original: string; // Raw lexeme, e.g. "1.50"
}

export interface BooleanLiteral extends Node {
  type: 'BooleanLiteral';
  value: boolean;
}

export interface NoneLiteral extends Node {
  type: 'NoneLiteral';
  value: null;
}

/**
 * Variable reference: `user`
 */
export interface Identifier extends Node {
  type: 'Identifier';
  name: string;
}

/**
 * List literal: `[1, 2, 3]`
 */
export interface ListExpression extends Node {
  type: 'ListExpression';
  elements: Expression[];
}

/**
 * Tuple: `(1, 2)` or the bare `a, b` of a loop target. Evaluates to a list.
 */
export interface TupleExpression extends Node {
  type: 'TupleExpression';
  elements: Expression[];
}

export interface DictEntry {
  key: Expression;
  value: Expression;
}

/**
 * Dict literal: `{'a': 1}`
 */
export interface DictExpression extends Node {
  type: 'DictExpression';
  entries: DictEntry[];
}

/**
 * Dot access: `user.name`, `items.0`
 */
export interface AttributeExpression extends Node {
  type: 'AttributeExpression';
  object: Expression;
  name: string;
}

/**
 * Bracket access: `user['name']`, `items[-1]`
 */
export interface SubscriptExpression extends Node {
  type: 'SubscriptExpression';
  object: Expression;
  index: Expression;
}

/**
 * Slice: `items[1:3]`, `text[::-1]`
 */
export interface SliceExpression extends Node {
  type: 'SliceExpression';
  object: Expression;
  start: Expression | null;
  stop: Expression | null;
  step: Expression | null;
}

export interface UnaryExpression extends Node {
  type: 'UnaryExpression';
  operator: 'not' | '-' | '+';
  argument: Expression;
}

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '//'
  | '%'
  | '**'
  | '~'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | 'not in';

export interface BinaryExpression extends Node {
  type: 'BinaryExpression';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface LogicalExpression extends Node {
  type: 'LogicalExpression';
  operator: 'and' | 'or';
  left: Expression;
  right: Expression;
}

/**
 * Inline conditional: `a if cond else b` (alternate may be omitted)
 */
export interface ConditionalExpression extends Node {
  type: 'ConditionalExpression';
  test: Expression;
  consequent: Expression;
  alternate: Expression | null;
}

/**
 * Keyword argument in a call, filter or test: `name=value`
 */
export interface KeywordArgument {
  name: string;
  value: Expression;
}

/**
 * Function or macro call: `range(3)`, `input('q', type='text')`
 */
export interface CallExpression extends Node {
  type: 'CallExpression';
  callee: Expression;
  args: Expression[];
  kwargs: KeywordArgument[];
}

/**
 * One stage of a filter pipeline: `value | name(args)`
 */
export interface FilterExpression extends Node {
  type: 'FilterExpression';
  value: Expression;
  name: string;
  args: Expression[];
  kwargs: KeywordArgument[];
}

/**
 * Test application: `value is [not] name(args)`
 */
export interface TestExpression extends Node {
  type: 'TestExpression';
  value: Expression;
  name: string;
  args: Expression[];
  negated: boolean;
}

export type Expression =
  | StringLiteral
  | NumberLiteral
  | BooleanLiteral
  | NoneLiteral
  | Identifier
  | ListExpression
  | TupleExpression
  | DictExpression
  | AttributeExpression
  | SubscriptExpression
  | SliceExpression
  | UnaryExpression
  | BinaryExpression
  | LogicalExpression
  | ConditionalExpression
  | CallExpression
  | FilterExpression
  | TestExpression;

// =============================================================================
// Statements
// =============================================================================

/**
 * Root node of a parsed template
 */
export interface Program extends Node {
  type: 'Program';
  body: Statement[];
}

/**
 * Raw text between tags
 */
export interface ContentStatement extends Node {
  type: 'ContentStatement';
  value: string;
}

/**
 * `{{ expression }}`
 */
export interface OutputStatement extends Node {
  type: 'OutputStatement';
  expression: Expression;
}

export interface ConditionalBranch {
  test: Expression;
  body: Statement[];
  loc: SourceLocation | null;
}

/**
 * `{% if %}...{% elif %}...{% else %}...{% endif %}`
 */
export interface IfStatement extends Node {
  type: 'IfStatement';
  branches: ConditionalBranch[]; // if + elif, in order
  alternate: Statement[] | null; // else body
}

/**
 * Assignment target of `for` and `set`: a name, a tuple of names, or `ns.attr`
 */
export type AssignTarget =
  | { kind: 'name'; name: string }
  | { kind: 'tuple'; names: string[] }
  | { kind: 'attribute'; object: string; name: string };

/**
 * `{% for target in iter [if filter] [recursive] %}...{% else %}...{% endfor %}`
 */
export interface ForStatement extends Node {
  type: 'ForStatement';
  target: AssignTarget;
  iter: Expression;
  filter: Expression | null;
  recursive: boolean;
  body: Statement[];
  alternate: Statement[] | null;
}

/**
 * `{% block name %}...{% endblock %}`
 */
export interface BlockStatement extends Node {
  type: 'BlockStatement';
  name: string;
  scoped: boolean;
  body: Statement[];
}

/**
 * `{% extends "parent" %}`
 */
export interface ExtendsStatement extends Node {
  type: 'ExtendsStatement';
  parent: string;
}

/**
 * `{% include expr [ignore missing] [with|without context] %}`
 */
export interface IncludeStatement extends Node {
  type: 'IncludeStatement';
  template: Expression;
  ignoreMissing: boolean;
  withContext: boolean;
}

/**
 * `{% import expr as alias %}`
 */
export interface ImportStatement extends Node {
  type: 'ImportStatement';
  template: Expression;
  alias: string;
}

export interface ImportName {
  name: string;
  alias: string;
}

/**
 * `{% from expr import a, b as c %}`
 */
export interface FromImportStatement extends Node {
  type: 'FromImportStatement';
  template: Expression;
  names: ImportName[];
}

/**
 * `{% set target = expr %}`
 */
export interface SetStatement extends Node {
  type: 'SetStatement';
  target: AssignTarget;
  value: Expression;
}

/**
 * Filter call without its input, as used by `{% filter %}` and block `set`
 */
export interface FilterCall {
  name: string;
  args: Expression[];
  kwargs: KeywordArgument[];
  loc: SourceLocation | null;
}

/**
 * `{% set name [| filters] %}...{% endset %}`
 */
export interface SetBlockStatement extends Node {
  type: 'SetBlockStatement';
  target: AssignTarget;
  filters: FilterCall[];
  body: Statement[];
}

export interface MacroParam {
  name: string;
  default: Expression | null;
}

/**
 * `{% macro name(params) %}...{% endmacro %}`
 */
export interface MacroStatement extends Node {
  type: 'MacroStatement';
  name: string;
  params: MacroParam[];
  body: Statement[];
}

/**
 * `{% call(params) macro(args) %}...{% endcall %}`
 */
export interface CallBlockStatement extends Node {
  type: 'CallBlockStatement';
  call: CallExpression;
  params: MacroParam[]; // Parameters of the `caller` body
  body: Statement[];
}

/**
 * `{% filter name | other %}...{% endfilter %}`
 */
export interface FilterBlockStatement extends Node {
  type: 'FilterBlockStatement';
  filters: FilterCall[];
  body: Statement[];
}

export interface WithAssignment {
  target: AssignTarget;
  value: Expression;
}

/**
 * `{% with a = 1, b = 2 %}...{% endwith %}`
 */
export interface WithStatement extends Node {
  type: 'WithStatement';
  assignments: WithAssignment[];
  body: Statement[];
}

export type Statement =
  | ContentStatement
  | OutputStatement
  | IfStatement
  | ForStatement
  | BlockStatement
  | ExtendsStatement
  | IncludeStatement
  | ImportStatement
  | FromImportStatement
  | SetStatement
  | SetBlockStatement
  | MacroStatement
  | CallBlockStatement
  | FilterBlockStatement
  | WithStatement;

/**
 * Parsed, registered template. Immutable after registration.
 */
export interface Template {
  name: string;
  source: string;
  ast: Program;
  blocks: ReadonlyMap<string, BlockStatement>; // Every block in the template, by name
  parent: string | null; // Target of `extends`, if any
}
