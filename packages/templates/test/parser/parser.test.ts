import { describe, expect, it } from 'vitest';
import { Lexer } from '../../src/lexer/lexer';
import type { Expression, Statement } from '../../src/parser/ast-nodes';
import { parse, Parser } from '../../src/parser/parser';
import { ParseError } from '../../src/parser/parser-error';

function body(source: string): Statement[] {
  return parse(source).body;
}

function expression(source: string): Expression {
  const [statement] = body(`{{ ${source} }}`);
  if (statement?.type !== 'OutputStatement') {
    throw new Error(`Expected an output statement for "${source}"`);
  }
  return statement.expression;
}

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`Expected "${source}" to fail`);
}

describe('Parser - expressions', () => {
  it('parses text and output statements', () => {
    expect(body('Hello {{ name }}')).toMatchObject([
      { type: 'ContentStatement', value: 'Hello ' },
      { type: 'OutputStatement', expression: { type: 'Identifier', name: 'name' } },
    ]);
  });

  it('skips comments', () => {
    expect(body('a{# note #}b')).toMatchObject([
      { type: 'ContentStatement', value: 'a' },
      { type: 'ContentStatement', value: 'b' },
    ]);
  });

  it('tags number literals as integers or floats', () => {
    expect(expression('2.0')).toMatchObject({ type: 'NumberLiteral', value: 2, float: true });
    expect(expression('7')).toMatchObject({ type: 'NumberLiteral', value: 7, float: false });
    expect(expression('9007199254740993')).toMatchObject({ value: 9007199254740993n, float: false });
  });

  it('binds multiplication tighter than addition', () => {
    expect(expression('1 + 2 * 3')).toMatchObject({
      type: 'BinaryExpression',
      operator: '+',
      left: { type: 'NumberLiteral', value: 1 },
      right: {
        type: 'BinaryExpression',
        operator: '*',
        left: { type: 'NumberLiteral', value: 2 },
        right: { type: 'NumberLiteral', value: 3 },
      },
    });
  });

  it('parses power as right-associative', () => {
    expect(expression('2 ** 3 ** 2')).toMatchObject({
      operator: '**',
      left: { value: 2 },
      right: { operator: '**', left: { value: 3 }, right: { value: 2 } },
    });
  });

  it('chains filters left to right with arguments', () => {
    expect(expression("name | upper | replace('A', 'B')")).toMatchObject({
      type: 'FilterExpression',
      name: 'replace',
      args: [
        { type: 'StringLiteral', value: 'A' },
        { type: 'StringLiteral', value: 'B' },
      ],
      value: { type: 'FilterExpression', name: 'upper', value: { type: 'Identifier', name: 'name' } },
    });
  });

  it('applies filters to the negated value', () => {
    expect(expression('-x | abs')).toMatchObject({
      type: 'FilterExpression',
      name: 'abs',
      value: { type: 'UnaryExpression', operator: '-', argument: { type: 'Identifier', name: 'x' } },
    });
  });

  it('parses negated tests with parenthesized and bare arguments', () => {
    expect(expression('x is not divisibleby(3)')).toMatchObject({
      type: 'TestExpression',
      name: 'divisibleby',
      negated: true,
      args: [{ type: 'NumberLiteral', value: 3 }],
    });
    expect(expression('x is sameas none')).toMatchObject({
      type: 'TestExpression',
      name: 'sameas',
      negated: false,
      args: [{ type: 'NoneLiteral', value: null }],
    });
  });

  it('parses membership and conditional expressions', () => {
    expect(expression('a not in b')).toMatchObject({ type: 'BinaryExpression', operator: 'not in' });
    expect(expression('a if b else c')).toMatchObject({
      type: 'ConditionalExpression',
      test: { name: 'b' },
      consequent: { name: 'a' },
      alternate: { name: 'c' },
    });
  });

  it('parses attribute, subscript, slice and call postfixes', () => {
    expect(expression('user.name')).toMatchObject({ type: 'AttributeExpression', name: 'name' });
    expect(expression('items[0]')).toMatchObject({ type: 'SubscriptExpression', index: { value: 0 } });
    expect(expression('items[1:]')).toMatchObject({
      type: 'SliceExpression',
      start: { value: 1 },
      stop: null,
      step: null,
    });
    expect(expression('f(1, key=2)')).toMatchObject({
      type: 'CallExpression',
      args: [{ value: 1 }],
      kwargs: [{ name: 'key', value: { value: 2 } }],
    });
  });

  it('parses list, tuple and dict literals', () => {
    expect(expression('[1, 2]')).toMatchObject({ type: 'ListExpression', elements: [{ value: 1 }, { value: 2 }] });
    expect(expression('(1,)')).toMatchObject({ type: 'TupleExpression', elements: [{ value: 1 }] });
    expect(expression("{'a': 1}")).toMatchObject({
      type: 'DictExpression',
      entries: [{ key: { value: 'a' }, value: { value: 1 } }],
    });
  });

  it('concatenates adjacent string literals', () => {
    expect(expression('"a" "b"')).toMatchObject({ type: 'StringLiteral', value: 'ab' });
  });
});

describe('Parser - statements', () => {
  it('parses if with elif and else', () => {
    expect(body('{% if a %}1{% elif b %}2{% else %}3{% endif %}')).toMatchObject([
      {
        type: 'IfStatement',
        branches: [
          { test: { name: 'a' }, body: [{ value: '1' }] },
          { test: { name: 'b' }, body: [{ value: '2' }] },
        ],
        alternate: [{ value: '3' }],
      },
    ]);
  });

  it('parses for loops with unpacking, filter, recursive and else', () => {
    expect(body('{% for k, v in items if v recursive %}{{ k }}{% else %}none{% endfor %}')).toMatchObject([
      {
        type: 'ForStatement',
        target: { kind: 'tuple', names: ['k', 'v'] },
        iter: { type: 'Identifier', name: 'items' },
        filter: { type: 'Identifier', name: 'v' },
        recursive: true,
        alternate: [{ type: 'ContentStatement', value: 'none' }],
      },
    ]);
  });

  it('parses set in its assignment and block forms', () => {
    expect(body('{% set a, b = 1, 2 %}')).toMatchObject([
      {
        type: 'SetStatement',
        target: { kind: 'tuple', names: ['a', 'b'] },
        value: { type: 'TupleExpression', elements: [{ value: 1 }, { value: 2 }] },
      },
    ]);
    expect(body('{% set ns.count = 1 %}')).toMatchObject([
      { type: 'SetStatement', target: { kind: 'attribute', object: 'ns', name: 'count' } },
    ]);
    expect(body('{% set x | upper %}hi{% endset %}')).toMatchObject([
      {
        type: 'SetBlockStatement',
        target: { kind: 'name', name: 'x' },
        filters: [{ name: 'upper' }],
        body: [{ value: 'hi' }],
      },
    ]);
  });

  it('parses include modifiers', () => {
    expect(body('{% include "a.txt" ignore missing without context %}')).toMatchObject([
      { type: 'IncludeStatement', template: { value: 'a.txt' }, ignoreMissing: true, withContext: false },
    ]);
    expect(body('{% include "a.txt" %}')).toMatchObject([{ ignoreMissing: false, withContext: true }]);
  });

  it('parses import and from-import', () => {
    expect(body('{% import "forms.txt" as forms %}')).toMatchObject([
      { type: 'ImportStatement', template: { value: 'forms.txt' }, alias: 'forms' },
    ]);
    expect(body('{% from "forms.txt" import input, label as lbl %}')).toMatchObject([
      {
        type: 'FromImportStatement',
        names: [
          { name: 'input', alias: 'input' },
          { name: 'label', alias: 'lbl' },
        ],
      },
    ]);
  });

  it('parses macros with defaults and call blocks with parameters', () => {
    expect(body('{% macro field(name, kind="text") %}{{ name }}{% endmacro %}')).toMatchObject([
      {
        type: 'MacroStatement',
        name: 'field',
        params: [
          { name: 'name', default: null },
          { name: 'kind', default: { value: 'text' } },
        ],
      },
    ]);
    expect(body('{% call(item) listing(items) %}{{ item }}{% endcall %}')).toMatchObject([
      {
        type: 'CallBlockStatement',
        params: [{ name: 'item', default: null }],
        call: { callee: { name: 'listing' }, args: [{ name: 'items' }] },
      },
    ]);
  });

  it('parses filter and with blocks', () => {
    expect(body('{% filter upper | trim %} x {% endfilter %}')).toMatchObject([
      { type: 'FilterBlockStatement', filters: [{ name: 'upper' }, { name: 'trim' }] },
    ]);
    expect(body('{% with a = 1, b = 2 %}{{ a }}{% endwith %}')).toMatchObject([
      {
        type: 'WithStatement',
        assignments: [
          { target: { name: 'a' }, value: { value: 1 } },
          { target: { name: 'b' }, value: { value: 2 } },
        ],
      },
    ]);
  });

  it('accepts the block name on endblock', () => {
    expect(body('{% block title scoped %}x{% endblock title %}')).toMatchObject([
      { type: 'BlockStatement', name: 'title', scoped: true, body: [{ value: 'x' }] },
    ]);
  });
});

describe('Parser - templates', () => {
  it('collects the parent and every block, nested ones included', () => {
    const parser = new Parser(new Lexer());
    const template = parser.parseTemplate(
      'page.txt',
      '{% extends "base.txt" %}{% block outer %}{% block inner %}{% endblock %}{% endblock %}',
    );

    expect(template.name).toBe('page.txt');
    expect(template.parent).toBe('base.txt');
    expect([...template.blocks.keys()]).toEqual(['inner', 'outer']);
  });

  it('resets state between templates', () => {
    const parser = new Parser(new Lexer());
    parser.parseTemplate('a', '{% extends "base" %}{% block x %}{% endblock %}');
    const second = parser.parseTemplate('b', '{% block x %}{% endblock %}');

    expect(second.parent).toBeNull();
    expect([...second.blocks.keys()]).toEqual(['x']);
  });
});

describe('Parser - errors', () => {
  it('reports a closing tag that does not match the open block', () => {
    expect(parseError('{% if x %}a{% endfor %}').detail).toBe(
      'Block closing tag mismatch: expected endif but found endfor',
    );
  });

  it('reports a closing tag without an opening tag, with its position', () => {
    const error = parseError('{% endif %}');
    expect(error.detail).toBe("Unexpected 'endif' without a matching opening tag");
    expect(error.message).toBe("Error at line 1, column 4: Unexpected 'endif' without a matching opening tag");
  });

  it('reports unclosed blocks with the line they opened on', () => {
    expect(parseError('line\n{% for x in y %}abc').detail).toBe(
      'Unclosed block: for opened at line 2 was never closed',
    );
  });

  it('reports unknown statements', () => {
    expect(parseError('{% frobnicate %}').detail).toBe("Unknown statement 'frobnicate'");
  });

  it('rejects duplicate blocks', () => {
    expect(parseError('{% block a %}{% endblock %}{% block a %}{% endblock %}').detail).toBe(
      "Duplicate block 'a'",
    );
  });

  it('rejects a mismatched endblock name', () => {
    expect(parseError('{% block a %}{% endblock b %}').detail).toBe(
      'Block closing tag mismatch: expected endblock a but found endblock b',
    );
  });

  it('restricts extends to one top-level string literal', () => {
    expect(parseError('{% if x %}{% extends "base" %}{% endif %}').detail).toBe(
      "'extends' must be used at the top level of a template",
    );
    expect(parseError('{% extends "a" %}{% extends "b" %}').detail).toBe(
      'A template can only extend one parent',
    );
    expect(parseError('{% extends layout %}').detail).toBe(
      "Expected parent template name string but found 'layout'",
    );
  });

  it('reports extra tokens before the end of a tag', () => {
    const error = parseError('{% if x y %}{% endif %}');
    expect(error.detail).toBe("Expected end of statement '%}' but found 'y'");
    expect(error.context).toBe('y %} {% endif %}');
  });

  it('validates macro parameters', () => {
    expect(parseError('{% macro m(a=1, b) %}{% endmacro %}').detail).toBe(
      "Parameter 'b' without default follows a parameter with default",
    );
    expect(parseError('{% macro m(a, a) %}{% endmacro %}').detail).toBe("Duplicate parameter 'a'");
  });

  it('reports malformed expressions', () => {
    expect(parseError('{{ }}').detail).toBe("Unexpected end of expression, found '}}'");
    expect(parseError('{{ f(a=1, 2) }}').detail).toBe('Positional argument follows keyword argument');
    expect(parseError('{% set if = 1 %}').detail).toBe(
      "'if' is a reserved word and cannot be used as variable name",
    );
  });
});
