import { describe, expect, it } from 'vitest';
import { EvalError, RenderError } from '../../src/index';
import { expectTemplate } from '../helpers/expect-template';

const strict = { undefinedBehavior: 'strict' } as const;

describe('Lenient undefined', () => {
  it('renders undefined names and members as empty', () => {
    expectTemplate('[{{ missing }}{{ user.nick }}{{ none_value.a }}{{ items[5] }}]')
      .withInput({ user: { name: 'Ada' }, none_value: null, items: [1] })
      .toCompileTo('[]');
  });

  it('treats undefined as false and as an empty iterable', () => {
    expectTemplate('{% if missing %}yes{% else %}no{% endif %}{% for x in missing %}x{% endfor %}').toCompileTo('no');
  });

  it('still raises for operators', () => {
    expectTemplate('{{ missing + 1 }}').toThrow('Unsupported operand types for +: undefined and number');
  });
});

describe('Strict undefined', () => {
  it('raises on undefined names', () => {
    expectTemplate('{{ missing }}').withOptions(strict).toThrow("'missing' is undefined");
    expectTemplate('{% if missing %}{% endif %}').withOptions(strict).toThrow("'missing' is undefined");
    expectTemplate('{% for x in missing %}{% endfor %}').withOptions(strict).toThrow("'missing' is undefined");
  });

  it('raises on missing attributes and items', () => {
    expectTemplate('{{ user.nick }}')
      .withOptions(strict)
      .withInput({ user: { name: 'Ada' } })
      .toThrow("mapping has no attribute 'nick'");
    expectTemplate('{{ items[5] }}').withOptions(strict).withInput({ items: [1] }).toThrow('sequence has no item 5');
    expectTemplate('{{ user["nick"] }}')
      .withOptions(strict)
      .withInput({ user: {} })
      .toThrow("mapping has no item 'nick'");
  });

  it('raises on attributes of none', () => {
    expectTemplate('{{ value.a }}').withOptions(strict).withInput({ value: null }).toThrow(
      "Cannot read attribute 'a' of none",
    );
  });

  it('allows default and defined to inspect undefined values', () => {
    expectTemplate('{{ missing | default("d") }}|{{ user.nick | d("n") }}|{{ user.nick is defined }}')
      .withOptions(strict)
      .withInput({ user: {} })
      .toCompileTo('d|n|false');
  });

  it('renders defined none values', () => {
    expectTemplate('[{{ value }}]').withOptions(strict).withInput({ value: null }).toCompileTo('[]');
  });

  it('reports the position of the failing expression', () => {
    const error = expectTemplate('line one\n  {{ user.name.first }}')
      .withOptions(strict)
      .withInput({ user: { name: { last: 'Lovelace' } } })
      .toThrowError();

    expect(error).toBeInstanceOf(RenderError);
    if (!(error instanceof RenderError)) return;
    expect(error.message).toBe("Failed to render 'test.txt' (line 2, column 6): mapping has no attribute 'first'");
    expect(error.templateName).toBe('test.txt');
    expect(error.line).toBe(2);
    expect(error.column).toBe(5);
    expect(error.cause).toBeInstanceOf(EvalError);
  });
});
