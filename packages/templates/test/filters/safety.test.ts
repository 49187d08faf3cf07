import { describe, it } from 'vitest';
import { expectTemplate } from '../helpers/expect-template';

describe('Default, escaping and serialization filters', () => {
  it('replaces undefined values with the default', () => {
    expectTemplate('{{ missing | default("x") }}').toCompileTo('x');
    expectTemplate('[{{ "" | default("x") }}]').toCompileTo('[]');
    expectTemplate('{{ "" | default("x", true) }}').toCompileTo('x');
    expectTemplate('[{{ none | default("X") }}]|{{ none | default("X", true) }}').toCompileTo('[]|X');
    expectTemplate('{{ 0 | d("zero", boolean=true) }}').toCompileTo('zero');
    expectTemplate('[{{ none | d("x") }}]').toCompileTo('[]');
  });

  it('accepts undefined operands in strict mode', () => {
    expectTemplate('{{ missing | default("x") }}').withOptions({ undefinedBehavior: 'strict' }).toCompileTo('x');
    expectTemplate('{{ user.nick | default("anon") }}')
      .withInput({ user: {} })
      .withOptions({ undefinedBehavior: 'strict' })
      .toCompileTo('anon');
  });

  it('escapes HTML once', () => {
    expectTemplate(`{{ "<a href='x'>" | e }}`).toCompileTo('&lt;a href=&#39;x&#39;&gt;');
    expectTemplate('{{ "<b>" | escape }}').withName('page.html').toCompileTo('&lt;b&gt;');
    expectTemplate('{{ "<b>" | escape | escape }}').toCompileTo('&lt;b&gt;');
  });

  it('marks values safe', () => {
    expectTemplate('{{ "<b>" | safe }}').withName('page.html').toCompileTo('<b>');
    expectTemplate('{{ html | safe }}').withName('page.html').withInput({ html: '<i>x</i>' }).toCompileTo('<i>x</i>');
  });

  it('serializes JSON safe for embedding in HTML', () => {
    expectTemplate('{{ {"a": [1, "<x>"], "b": none} | tojson }}').toCompileTo('{"a":[1,"\\u003cx\\u003e"],"b":null}');
    expectTemplate('{{ [1] | tojson(2) }}').toCompileTo('[\n  1\n]');
    expectTemplate(`{{ "it's" | tojson }}`).withName('page.html').toCompileTo('"it\\u0027s"');
  });

  it('pretty-prints values', () => {
    expectTemplate('{{ {"a": "x", "b": [1, none]} | pprint }}').toCompileTo('{"a": "x", "b": [1, none]}');
  });

  it('renders mappings as HTML attributes', () => {
    expectTemplate('<p{{ {"class": "big", "id": none, "title": "a<b"} | xmlattr }}>')
      .withName('page.html')
      .toCompileTo('<p class="big" title="a&lt;b">');
    expectTemplate('{{ {"id": 1} | xmlattr(false) }}').toCompileTo('id="1"');
  });

  it('rejects invalid attribute names', () => {
    expectTemplate('{{ {"a b": 1} | xmlattr }}').toThrow("xmlattr(): invalid attribute name 'a b'");
  });
});
