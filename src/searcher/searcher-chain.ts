/**
 * Ordered chain of searcher strategies.
 *
 * Searchers run in registration order. The default chain holds only the
 * `DefaultSearcher`, at index 0; further searchers are appended and run only
 * when every earlier one failed.
 *
 * @example
 * ```typescript
 * const chain = SearcherChain.default();
 * chain.add(new MappingSearcher());
 * chain.list(); // ['default', 'mapping']
 * ```
 */

import { DuplicateSearcherError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { SearcherStrategy } from './base-searcher.js';
import { DefaultSearcher } from './searchers/default-searcher.js';

const log = createLogger({ component: 'searcher-chain' });

export class SearcherChain implements Iterable<SearcherStrategy> {
  private searchers: SearcherStrategy[] = [];
  private searchersByName: Map<string, SearcherStrategy> = new Map();

  /**
   * Create a chain holding only the default searcher.
   */
  static default(): SearcherChain {
    return SearcherChain.withSearchers([new DefaultSearcher()]);
  }

  /**
   * Create a chain from searchers, in the order given.
   */
  static withSearchers(searchers: Iterable<SearcherStrategy>): SearcherChain {
    const chain = new SearcherChain();
    for (const searcher of searchers) {
      chain.add(searcher);
    }
    return chain;
  }

  /**
   * Append a searcher to the end of the chain.
   *
   * @throws DuplicateSearcherError if a searcher with the same name exists
   */
  add(searcher: SearcherStrategy): this {
    if (this.searchersByName.has(searcher.name)) {
      throw new DuplicateSearcherError(searcher.name);
    }
    this.searchers.push(searcher);
    this.searchersByName.set(searcher.name, searcher);
    log.debug('Searcher registered', {
      operation: 'add',
      searcher: searcher.name,
      position: this.searchers.length - 1,
    });
    return this;
  }

  /**
   * Remove a searcher by name. The default searcher may be removed too.
   *
   * @returns True if a searcher was removed
   */
  remove(name: string): boolean {
    const searcher = this.searchersByName.get(name);
    if (!searcher) {
      return false;
    }
    this.searchersByName.delete(name);
    this.searchers = this.searchers.filter((entry) => entry !== searcher);
    return true;
  }

  get(name: string): SearcherStrategy | undefined {
    return this.searchersByName.get(name);
  }

  /**
   * Searcher names in run order.
   */
  list(): string[] {
    return this.searchers.map((searcher) => searcher.name);
  }

  get size(): number {
    return this.searchers.length;
  }

  /**
   * Iterate over a snapshot of the chain.
   */
  [Symbol.iterator](): Iterator<SearcherStrategy> {
    return [...this.searchers][Symbol.iterator]();
  }
}
