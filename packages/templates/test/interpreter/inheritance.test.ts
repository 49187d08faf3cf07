import { describe, expect, it } from 'vitest';
import { RenderError, ResolveError } from '../../src/index';
import { expectTemplate } from '../helpers/expect-template';

const base = '<title>{% block title %}Default{% endblock %}</title>{% block body %}{% endblock %}';

describe('Template inheritance', () => {
  it('overrides parent blocks', () => {
    expectTemplate('{% extends "base.txt" %}{% block title %}Child{% endblock %}')
      .withTemplate('base.txt', base)
      .toCompileTo('<title>Child</title>');
  });

  it('renders the parent block through super()', () => {
    expectTemplate('{% extends "base.txt" %}{% block title %}{{ super() }} + more{% endblock %}')
      .withTemplate('base.txt', base)
      .toCompileTo('<title>Default + more</title>');
  });

  it('chains super() across several levels', () => {
    expectTemplate('{% extends "mid.txt" %}{% block title %}Child({{ super() }}){% endblock %}')
      .withTemplates({
        'base.txt': base,
        'mid.txt': '{% extends "base.txt" %}{% block title %}Mid[{{ super() }}]{% endblock %}',
      })
      .toCompileTo('<title>Child(Mid[Default])</title>');
  });

  it('ignores child content outside blocks', () => {
    expectTemplate('{% extends "base.txt" %}ignored{% block title %}T{% endblock %}')
      .withTemplate('base.txt', base)
      .toCompileTo('<title>T</title>');
  });

  it('makes top-level child assignments and macros visible to blocks', () => {
    expectTemplate(
      '{% extends "base.txt" %}{% set who = "Ada" %}{% macro em(t) %}*{{ t }}*{% endmacro %}{% block title %}{{ em(who) }}{% endblock %}',
    )
      .withTemplate('base.txt', base)
      .toCompileTo('<title>*Ada*</title>');
  });

  it('passes the render context to every level', () => {
    expectTemplate('{% extends "base.txt" %}{% block body %}{{ name }}{% endblock %}')
      .withTemplate('base.txt', base)
      .withInput({ name: 'Ada' })
      .toCompileTo('<title>Default</title>Ada');
  });

  it('hides loop variables from blocks unless they are scoped', () => {
    expectTemplate('{% for item in [1, 2] %}{% block row %}[{{ item }}]{% endblock %}{% endfor %}').toCompileTo('[][]');
    expectTemplate('{% extends "list.txt" %}{% block row %}<{{ item }}>{% endblock %}')
      .withTemplate('list.txt', '{% for item in [1, 2] %}{% block row scoped %}{{ item }}{% endblock %}{% endfor %}')
      .toCompileTo('<1><2>');
  });

  it('reports super() in a block without a parent', () => {
    expectTemplate('{% block a %}{{ super() }}{% endblock %}').toThrow(
      "Block 'a' has no parent block to render with super()",
    );
  });

  it('escapes by the name of the template being rendered', () => {
    expectTemplate('{% extends "base.txt" %}{% block title %}{{ v }}{% endblock %}')
      .withName('page.html')
      .withTemplate('base.txt', base)
      .withInput({ v: '<i>' })
      .toCompileTo('<title>&lt;i&gt;</title>');
  });

  it('follows long chains', () => {
    const templates: Record<string, string> = { 'level0.txt': '{% block x %}root{% endblock %}' };
    for (let i = 1; i <= 200; i++) {
      templates[`level${i}.txt`] = `{% extends "level${i - 1}.txt" %}`;
    }
    expectTemplate('{% extends "level200.txt" %}').withTemplates(templates).toCompileTo('root');
  });
});

describe('Inheritance errors', () => {
  it('reports the full cycle', () => {
    const error = expectTemplate('{% extends "b.txt" %}')
      .withName('a.txt')
      .withTemplate('b.txt', '{% extends "c.txt" %}')
      .withTemplate('c.txt', '{% extends "a.txt" %}')
      .toThrowError();

    expect(error).toBeInstanceOf(RenderError);
    if (!(error instanceof RenderError)) return;
    expect(error.message).toBe("Failed to render 'a.txt': Inheritance cycle: a.txt -> b.txt -> c.txt -> a.txt");
    expect(error.cause).toBeInstanceOf(ResolveError);
    if (!(error.cause instanceof ResolveError)) return;
    expect(error.cause.chain).toEqual(['a.txt', 'b.txt', 'c.txt', 'a.txt']);
  });

  it('reports a template extending itself', () => {
    expectTemplate('{% extends "self.txt" %}').withName('self.txt').toThrow('Inheritance cycle: self.txt -> self.txt');
  });

  it('names the template that extends a missing parent', () => {
    expectTemplate('{% extends "mid.txt" %}')
      .withTemplate('mid.txt', '{% extends "nope.txt" %}')
      .toThrow("Template not found: 'nope.txt' (extended by 'mid.txt')");
  });
});
