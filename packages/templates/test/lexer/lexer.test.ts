import { describe, expect, it } from 'vitest';
import { LexError } from '../../src/lexer/lexer-error';
import { Lexer, type LexerOptions } from '../../src/lexer/lexer';
import type { Token } from '../../src/lexer/token';
import { TokenType } from '../../src/lexer/token-types';

function tokenize(source: string, options: LexerOptions = {}): Token[] {
  return new Lexer(options).tokenize(source);
}

function types(source: string): string[] {
  return tokenize(source).map((token) => token.type);
}

function lexError(source: string): LexError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof LexError) return error;
    throw error;
  }
  throw new Error(`Expected "${source}" to fail`);
}

describe('Lexer - text and tags', () => {
  it('splits text around a variable tag', () => {
    const tokens = tokenize('Hello {{ name }}!');

    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.TEXT, 'Hello '],
      [TokenType.VARIABLE_START, '{{'],
      [TokenType.NAME, 'name'],
      [TokenType.VARIABLE_END, '}}'],
      [TokenType.TEXT, '!'],
      [TokenType.EOF, ''],
    ]);
  });

  it('tracks line and column of tokens', () => {
    const tokens = tokenize('Hello {{ name }}');
    expect(tokens[2].loc.start).toEqual({ line: 1, column: 9, index: 9 });

    const multiline = tokenize('a\n{{ b }}');
    expect(multiline[2].value).toBe('b');
    expect(multiline[2].loc.start).toEqual({ line: 2, column: 3, index: 5 });
  });

  it('emits block tags with their keyword as a NAME', () => {
    expect(types('{% if x %}y{% endif %}')).toEqual([
      TokenType.BLOCK_START,
      TokenType.NAME,
      TokenType.NAME,
      TokenType.BLOCK_END,
      TokenType.TEXT,
      TokenType.BLOCK_START,
      TokenType.NAME,
      TokenType.BLOCK_END,
      TokenType.EOF,
    ]);
  });

  it('keeps a lone brace as text', () => {
    const tokens = tokenize('a { b } c');
    expect(tokens.map((t) => t.type)).toEqual([TokenType.TEXT, TokenType.EOF]);
    expect(tokens[0].value).toBe('a { b } c');
  });

  it('emits comments as COMMENT tokens with their body', () => {
    const tokens = tokenize('a{# note #}b');
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.TEXT, 'a'],
      [TokenType.COMMENT, ' note '],
      [TokenType.TEXT, 'b'],
      [TokenType.EOF, ''],
    ]);
  });

  it('emits a raw section as a single TEXT token', () => {
    const tokens = tokenize('{% raw %}{{ x }}{% if %}{% endraw %}');
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.TEXT, '{{ x }}{% if %}'],
      [TokenType.EOF, ''],
    ]);
  });
});

describe('Lexer - literals and operators', () => {
  it('scans integers, floats and exponents', () => {
    const tokens = tokenize('{{ 42 4.2 1e3 }}').slice(1, -2);
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.INTEGER, '42'],
      [TokenType.FLOAT, '4.2'],
      [TokenType.FLOAT, '1e3'],
    ]);
  });

  it('scans a number after a dot as an integer index', () => {
    const tokens = tokenize('{{ items.0.name }}').slice(1, -2);
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.NAME, 'items'],
      [TokenType.DOT, '.'],
      [TokenType.INTEGER, '0'],
      [TokenType.DOT, '.'],
      [TokenType.NAME, 'name'],
    ]);
  });

  it('decodes escapes in string literals', () => {
    const tokens = tokenize('{{ "a\\"b" \'c\\nd\' }}').slice(1, -2);
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.STRING, 'a"b'],
      [TokenType.STRING, 'c\nd'],
    ]);
  });

  it('prefers the longest operator', () => {
    expect(types('{{ a ** b // c != d <= e }}').slice(1, -2)).toEqual([
      TokenType.NAME,
      TokenType.POWER,
      TokenType.NAME,
      TokenType.FLOOR_DIV,
      TokenType.NAME,
      TokenType.NE,
      TokenType.NAME,
      TokenType.LTE,
      TokenType.NAME,
    ]);
  });

  it('does not close a variable tag inside a dict literal', () => {
    expect(types("{{ {'a': {'b': 1}} }}")).toEqual([
      TokenType.VARIABLE_START,
      TokenType.LBRACE,
      TokenType.STRING,
      TokenType.COLON,
      TokenType.LBRACE,
      TokenType.STRING,
      TokenType.COLON,
      TokenType.INTEGER,
      TokenType.RBRACE,
      TokenType.RBRACE,
      TokenType.VARIABLE_END,
      TokenType.EOF,
    ]);
  });
});

describe('Lexer - whitespace control', () => {
  it('strips whitespace next to dash markers', () => {
    const tokens = tokenize('a  {{- x -}}  b');
    expect(tokens.filter((t) => t.type === TokenType.TEXT).map((t) => t.value)).toEqual(['a', 'b']);
  });

  it('removes one trailing newline unless asked to keep it', () => {
    expect(tokenize('x\n')[0].value).toBe('x');
    expect(tokenize('x\r\n')[0].value).toBe('x');
    expect(tokenize('x\n', { keepTrailingNewline: true })[0].value).toBe('x\n');
  });

  it('drops the newline after a block tag with trimBlocks', () => {
    const texts = tokenize('{% if true %}\nyes\n{% endif %}\nend', { trimBlocks: true })
      .filter((t) => t.type === TokenType.TEXT)
      .map((t) => t.value);
    expect(texts).toEqual(['yes\n', 'end']);
  });

  it('strips indentation before a block tag with lstripBlocks', () => {
    const texts = tokenize('  {% if true %}\n  yes\n  {% endif %}', { trimBlocks: true, lstripBlocks: true })
      .filter((t) => t.type === TokenType.TEXT)
      .map((t) => t.value);
    expect(texts).toEqual(['  yes\n']);
  });

  it('leaves indentation before a variable tag with lstripBlocks', () => {
    const texts = tokenize('  {{ x }}', { lstripBlocks: true })
      .filter((t) => t.type === TokenType.TEXT)
      .map((t) => t.value);
    expect(texts).toEqual(['  ']);
  });

  it('does not lstrip when the tag follows other text on its line', () => {
    const texts = tokenize('a  {% if x %}{% endif %}', { lstripBlocks: true })
      .filter((t) => t.type === TokenType.TEXT)
      .map((t) => t.value);
    expect(texts).toEqual(['a  ']);
  });
});

describe('Lexer - errors', () => {
  it('reports an unclosed variable tag at its opening delimiter', () => {
    const error = lexError('ab {{ name');
    expect(error.detail).toBe('Unclosed variable tag, expected "}}"');
    expect(error.position).toEqual({ line: 1, column: 3, index: 3 });
    expect(error.message).toBe('Error at line 1, column 4: Unclosed variable tag, expected "}}"');
  });

  it('reports an unclosed block tag', () => {
    expect(lexError('{% if x').detail).toBe('Unclosed block tag, expected "%}"');
  });

  it('reports an unclosed comment', () => {
    expect(lexError('{# never ends').detail).toBe('Unclosed comment, expected "#}"');
  });

  it('reports an unclosed raw block', () => {
    expect(lexError('{% raw %}abc').detail).toBe('Unclosed raw block, expected "{% endraw %}"');
  });

  it('reports an unterminated string at the opening quote', () => {
    const error = lexError('{{ "abc }}');
    expect(error.detail).toBe('Unterminated string literal');
    expect(error.column).toBe(3);
  });

  it('reports unexpected characters', () => {
    const error = lexError('{{ a ! b }}');
    expect(error.detail).toBe("Unexpected character '!'");
    expect(error.position).toEqual({ line: 1, column: 5, index: 5 });
  });
});
