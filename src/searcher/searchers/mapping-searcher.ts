/**
 * Searcher for explicitly mapped module names.
 *
 * @example
 * ```typescript
 * const mapping = new MappingSearcher();
 * mapping.register('config', '/etc/app/config.js');
 * chain.add(mapping);
 * ```
 */

import {
  firstExisting,
  notFound,
  type SearchOutcome,
  type SearchScope,
  type SearcherStrategy,
} from '../base-searcher.js';

export class MappingSearcher implements SearcherStrategy {
  readonly name: string;

  private mappings: Map<string, string> = new Map();

  /**
   * @param name - Searcher name (default: 'mapping')
   */
  constructor(name = 'mapping') {
    this.name = name;
  }

  /**
   * Map a module name to a path. Replaces an existing mapping.
   */
  register(moduleName: string, path: string): void {
    this.mappings.set(moduleName, path);
  }

  /**
   * @returns True if a mapping was removed
   */
  unregister(moduleName: string): boolean {
    return this.mappings.delete(moduleName);
  }

  registeredNames(): string[] {
    return Array.from(this.mappings.keys());
  }

  search(name: string, scope: SearchScope): SearchOutcome {
    const path = this.mappings.get(name);
    if (path === undefined) {
      return notFound([]);
    }
    return firstExisting([path], scope.probe);
  }
}
