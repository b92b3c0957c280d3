import { describe, expect, it } from 'vitest';
import { SearchPathRegistry } from '../../../src/search-path/registry.js';
import { MappingSearcher } from '../../../src/searcher/searchers/mapping-searcher.js';
import { MemoryPathProbe } from '../../helpers/memory-probe.js';

describe('MappingSearcher', () => {
  const searchPath = new SearchPathRegistry(['./%s']);

  it('has a default name', () => {
    expect(new MappingSearcher().name).toBe('mapping');
  });

  it('accepts a custom name', () => {
    expect(new MappingSearcher('aliases').name).toBe('aliases');
  });

  it('resolves a mapped name to an existing path', () => {
    const searcher = new MappingSearcher();
    searcher.register('config', '/etc/app/config.js');

    const outcome = searcher.search('config', {
      searchPath,
      probe: new MemoryPathProbe(['/etc/app/config.js']),
    });

    expect(outcome).toEqual({ status: 'found', path: '/etc/app/config.js' });
  });

  it('reports a mapped path that does not exist', () => {
    const searcher = new MappingSearcher();
    searcher.register('config', '/etc/app/config.js');

    const outcome = searcher.search('config', { searchPath, probe: new MemoryPathProbe() });

    expect(outcome).toEqual({ status: 'not_found', attempted: ['/etc/app/config.js'] });
  });

  it('fails without candidates for unmapped names', () => {
    const probe = new MemoryPathProbe();
    const outcome = new MappingSearcher().search('config', { searchPath, probe });

    expect(outcome).toEqual({ status: 'not_found', attempted: [] });
    expect(probe.checked).toEqual([]);
  });

  it('overwrites and removes mappings', () => {
    const searcher = new MappingSearcher();
    searcher.register('config', '/etc/a.js');
    searcher.register('config', '/etc/b.js');
    searcher.register('util', './util.js');

    expect(searcher.registeredNames()).toEqual(['config', 'util']);
    expect(searcher.unregister('config')).toBe(true);
    expect(searcher.unregister('config')).toBe(false);
    expect(searcher.registeredNames()).toEqual(['util']);
  });
});
