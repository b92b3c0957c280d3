import { describe, expect, it } from 'vitest';
import { SearchPathRegistry } from '../../../src/search-path/registry.js';
import { PatternSearcher } from '../../../src/searcher/pattern-searcher.js';
import { MemoryPathProbe } from '../../helpers/memory-probe.js';

class ScopedSearcher extends PatternSearcher {
  readonly name = 'scoped';
  override readonly pattern = /^@(?<scope>[\w-]+)\/(?<module>[\w-]+)$/;

  candidatePaths(_name: string, match: RegExpMatchArray | null): string[] {
    const groups = match?.groups;
    if (!groups) {
      return [];
    }
    return [`./scopes/${groups.scope}/${groups.module}.js`, `./scopes/${groups.scope}/${groups.module}/index.js`];
  }
}

class GlobalPatternSearcher extends PatternSearcher {
  readonly name = 'global';
  override readonly pattern = /^lib-(?<module>\w+)$/gy;

  candidatePaths(_name: string, match: RegExpMatchArray | null): string[] {
    const module = match?.groups?.module;
    return module ? [`./lib/${module}.js`] : [];
  }
}

class PrefixSearcher extends PatternSearcher {
  readonly name = 'builtin';
  override readonly prefix = 'builtin:';

  candidatePaths(name: string, match: RegExpMatchArray | null): string[] {
    expect(match).toBeNull();
    return [`/usr/share/modsource/${name.slice('builtin:'.length)}.js`];
  }
}

class UnconfiguredSearcher extends PatternSearcher {
  readonly name = 'unconfigured';

  candidatePaths(): string[] {
    return ['./never.js'];
  }
}

describe('PatternSearcher', () => {
  const searchPath = new SearchPathRegistry();

  describe('with a pattern', () => {
    it('matches by regular expression', () => {
      const searcher = new ScopedSearcher();

      expect(searcher.matches('@acme/util')).toBe(true);
      expect(searcher.matches('util')).toBe(false);
    });

    it('passes named groups to candidatePaths', () => {
      const probe = new MemoryPathProbe(['./scopes/acme/util/index.js']);

      const outcome = new ScopedSearcher().search('@acme/util', { searchPath, probe });

      expect(outcome).toEqual({ status: 'found', path: './scopes/acme/util/index.js' });
      expect(probe.checked).toEqual(['./scopes/acme/util.js', './scopes/acme/util/index.js']);
    });

    it('reports every candidate when none exists', () => {
      const outcome = new ScopedSearcher().search('@acme/util', {
        searchPath,
        probe: new MemoryPathProbe(),
      });

      expect(outcome).toEqual({
        status: 'not_found',
        attempted: ['./scopes/acme/util.js', './scopes/acme/util/index.js'],
      });
    });

    it('fails without candidates for names it does not handle', () => {
      const probe = new MemoryPathProbe();

      const outcome = new ScopedSearcher().search('util', { searchPath, probe });

      expect(outcome).toEqual({ status: 'not_found', attempted: [] });
      expect(probe.checked).toEqual([]);
    });
  });

  describe('with a global or sticky pattern', () => {
    it('matches the same name on every call', () => {
      const searcher = new GlobalPatternSearcher();

      expect(searcher.matches('lib-json')).toBe(true);
      expect(searcher.matches('lib-json')).toBe(true);
      expect(searcher.matches('lib-json')).toBe(true);
    });

    it('passes named groups on repeated searches', () => {
      const searcher = new GlobalPatternSearcher();
      const probe = new MemoryPathProbe(['./lib/json.js']);

      expect(searcher.search('lib-json', { searchPath, probe })).toEqual({ status: 'found', path: './lib/json.js' });
      expect(searcher.search('lib-json', { searchPath, probe })).toEqual({ status: 'found', path: './lib/json.js' });
      expect(probe.checked).toEqual(['./lib/json.js', './lib/json.js']);
    });
  });

  describe('with a prefix', () => {
    it('matches by prefix and passes a null match', () => {
      const outcome = new PrefixSearcher().search('builtin:json', {
        searchPath,
        probe: new MemoryPathProbe(['/usr/share/modsource/json.js']),
      });

      expect(outcome).toEqual({ status: 'found', path: '/usr/share/modsource/json.js' });
    });

    it('ignores other names', () => {
      expect(new PrefixSearcher().matches('json')).toBe(false);
    });
  });

  it('matches nothing without a pattern or prefix', () => {
    const outcome = new UnconfiguredSearcher().search('anything', {
      searchPath,
      probe: new MemoryPathProbe(['./never.js']),
    });

    expect(outcome).toEqual({ status: 'not_found', attempted: [] });
  });
});
