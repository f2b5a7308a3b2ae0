import { describe, it, expect } from 'vitest';
import { decodeText, detectTemplate, isTemplated, render, renderString } from '../../src/services/template.js';
import { RenderError } from '../../src/errors.js';

describe('isTemplated', () => {
  it('detects expressions, statements and comments', () => {
    expect(isTemplated('export EMAIL={{ EMAIL }}')).toBe(true);
    expect(isTemplated('{% if work %}x{% endif %}')).toBe(true);
    expect(isTemplated('{# note #}')).toBe(true);
    expect(isTemplated('{{- name -}}')).toBe(true);
  });

  it('treats plain text as a regular file', () => {
    expect(isTemplated('alias ll="ls -la"\n')).toBe(false);
    expect(isTemplated('function f() { echo ${HOME}; }')).toBe(false);
  });
});

describe('detectTemplate', () => {
  it('never treats binary content as a template', () => {
    const binary = Buffer.from([0xff, 0xfe, 0x7b, 0x7b, 0x20, 0x78, 0x20, 0x7d, 0x7d]);
    expect(decodeText(binary)).toBeUndefined();
    expect(detectTemplate(binary)).toBe(false);
  });

  it('detects templates in UTF-8 content', () => {
    expect(detectTemplate(Buffer.from('name = {{ name }}'))).toBe(true);
  });
});

describe('render', () => {
  it('substitutes variables without escaping', () => {
    const result = render('export EMAIL={{ EMAIL }}\n', { EMAIL: 'a<b>@example.com' });
    expect(result).toEqual({ ok: true, text: 'export EMAIL=a<b>@example.com\n' });
  });

  it('supports nested tables and conditionals', () => {
    const result = render(
      '{% if git.signing %}signingkey = {{ git.key }}{% else %}unsigned{% endif %}',
      { git: { signing: true, key: 'ABC123' } }
    );
    expect(result).toEqual({ ok: true, text: 'signingkey = ABC123' });
  });

  it('drops comments', () => {
    expect(render('a{# hidden #}b', {})).toEqual({ ok: true, text: 'ab' });
  });

  it('fails on undefined variables', () => {
    const result = render('{{ missing }}', {});
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RenderError);
      expect(result.error.code).toBe('RENDER_ERROR');
    }
  });

  it('fails on malformed templates', () => {
    expect(render('{% if x %}never closed', { x: true }).ok).toBe(false);
  });
});

describe('renderString', () => {
  it('returns rendered text', () => {
    expect(renderString('echo {{ name }}', { name: 'dotr' })).toBe('echo dotr');
  });

  it('throws a RenderError on failure', () => {
    expect(() => renderString('{{ nope }}', {})).toThrow(RenderError);
  });
});
