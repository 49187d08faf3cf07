import { describe, it } from 'vitest';
import { expectTemplate } from '../helpers/expect-template';

const people = [
  { name: 'A', city: 'Oslo' },
  { name: 'B', city: 'Bergen' },
  { name: 'C', city: 'Oslo' },
];

describe('Mapping filters', () => {
  it('lists key/value pairs', () => {
    expectTemplate('{% for k, v in {"a": 1, "b": 2} | items %}{{ k }}={{ v }};{% endfor %}').toCompileTo(
      'a=1;b=2;',
    );
    expectTemplate('{% for k, v in data.items() %}{{ k }}={{ v }};{% endfor %}')
      .withInput({ data: { x: 1 } })
      .toCompileTo('x=1;');
  });

  it('sorts a mapping by key or by value', () => {
    const data = { b: 1, A: 3, c: 2 };
    expectTemplate('{% for k, v in data | dictsort %}{{ k }}{% endfor %}').withInput({ data }).toCompileTo('Abc');
    expectTemplate('{% for k, v in data | dictsort(by="value") %}{{ k }}{% endfor %}')
      .withInput({ data })
      .toCompileTo('bcA');
    expectTemplate('{% for k, v in data | dictsort(false, "value", true) %}{{ k }}{% endfor %}')
      .withInput({ data })
      .toCompileTo('Acb');
  });

  it('rejects an unknown dictsort order', () => {
    expectTemplate('{{ {"a": 1} | dictsort(by="size") }}').toThrow("dictsort(): 'by' must be 'key' or 'value'");
  });

  it('reads an attribute by name', () => {
    expectTemplate('{{ user | attr("name") }}').withInput({ user: { name: 'Ada' } }).toCompileTo('Ada');
  });

  it('groups items that unpack into grouper and list', () => {
    expectTemplate(
      '{% for city, members in people | groupby("city") %}{{ city }}: {{ members | map(attribute="name") | join(",") }};{% endfor %}',
    )
      .withInput({ people })
      .toCompileTo('Bergen: B;Oslo: A,C;');
  });

  it('exposes grouper and list as attributes', () => {
    expectTemplate('{% for g in people | groupby("city") %}{{ g.grouper }}({{ g.list | length }}){% endfor %}')
      .withInput({ people })
      .toCompileTo('Bergen(1)Oslo(2)');
  });

  it('groups items missing the attribute under the default', () => {
    expectTemplate('{% for g in rows | groupby("kind", default="other") %}{{ g.grouper }}={{ g.list | length }};{% endfor %}')
      .withInput({ rows: [{ kind: 'fruit' }, {}, { kind: 'fruit' }] })
      .toCompileTo('fruit=2;other=1;');
  });
});
