import { describe, expect, it } from 'vitest';
import { InvalidTemplateError } from '../../../src/errors/index.js';
import { SearchPathTemplate } from '../../../src/search-path/template.js';

describe('SearchPathTemplate', () => {
  describe('parse', () => {
    it('splits a template around its slot', () => {
      const template = SearchPathTemplate.parse('./lib/%s.js');

      expect(template.prefix).toBe('./lib/');
      expect(template.suffix).toBe('.js');
    });

    it('accepts a slot at the end', () => {
      const template = SearchPathTemplate.parse('/opt/modules/%s');

      expect(template.prefix).toBe('/opt/modules/');
      expect(template.suffix).toBe('');
    });

    it('rejects a template without a slot', () => {
      expect(() => SearchPathTemplate.parse('./lib/util.js')).toThrow(InvalidTemplateError);
    });

    it('rejects a template with two slots', () => {
      expect(() => SearchPathTemplate.parse('./%s/%s.js')).toThrow(
        "Search path template './%s/%s.js' must contain exactly one '%s' (found 2)"
      );
      expect(() => SearchPathTemplate.parse('./%s/%s.js')).toThrow(
        expect.objectContaining({ name: 'InvalidTemplateError', slotCount: 2 })
      );
    });
  });

  describe('expand', () => {
    it('substitutes the module name', () => {
      expect(SearchPathTemplate.parse('./%s.mjs').expand('util')).toBe('./util.mjs');
    });

    it('copies format syntax in the name verbatim', () => {
      expect(SearchPathTemplate.parse('./%s.js').expand('100%d%s')).toBe('./100%d%s.js');
    });

    it('keeps path fragments in the name', () => {
      expect(SearchPathTemplate.parse('./lib/%s').expand('net/http')).toBe('./lib/net/http');
    });
  });

  it('renders back to its string form', () => {
    expect(new SearchPathTemplate('./', '.js').toString()).toBe('./%s.js');
  });

  it('compares by prefix and suffix', () => {
    const a = SearchPathTemplate.parse('./%s.js');
    const b = new SearchPathTemplate('./', '.js');

    expect(a.equals(b)).toBe(true);
    expect(a.equals(new SearchPathTemplate('./'))).toBe(false);
  });

  it('from() passes template values through unchanged', () => {
    const template = new SearchPathTemplate('./');

    expect(SearchPathTemplate.from(template)).toBe(template);
  });
});
