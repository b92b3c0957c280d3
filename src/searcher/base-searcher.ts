/**
 * Searcher strategy contract.
 *
 * A searcher turns a module name into either one existing path or the list
 * of candidate paths it checked and rejected. Searchers form a chain, tried
 * in registration order.
 *
 * @example
 * ```typescript
 * class VendorSearcher implements SearcherStrategy {
 *   readonly name = 'vendor';
 *
 *   search(name: string, scope: SearchScope): SearchOutcome {
 *     const candidate = `./vendor/${name}/index.js`;
 *     return scope.probe.exists(candidate)
 *       ? found(candidate)
 *       : notFound([candidate]);
 *   }
 * }
 * ```
 */

import type { SearchPathRegistry } from '../search-path/registry.js';
import type { PathProbe } from './path-probe.js';

export interface SearchFound {
  status: 'found';
  path: string;
}

export interface SearchNotFound {
  status: 'not_found';
  /** Every candidate checked, in the order checked */
  attempted: string[];
}

export type SearchOutcome = SearchFound | SearchNotFound;

/**
 * What a searcher may read while searching.
 */
export interface SearchScope {
  readonly searchPath: SearchPathRegistry;
  readonly probe: PathProbe;
}

export interface SearcherStrategy {
  /**
   * Unique name within a chain. Used for removal, lookup and diagnostics.
   */
  readonly name: string;

  /**
   * Resolve a module name.
   *
   * Should return `not_found` (never throw) when nothing matches so the
   * chain can continue.
   */
  search(name: string, scope: SearchScope): SearchOutcome;
}

export function found(path: string): SearchFound {
  return { status: 'found', path };
}

export function notFound(attempted: string[]): SearchNotFound {
  return { status: 'not_found', attempted };
}

/**
 * Check candidates in order and return the first that exists.
 */
export function firstExisting(candidates: Iterable<string>, probe: PathProbe): SearchOutcome {
  const attempted: string[] = [];
  for (const candidate of candidates) {
    if (probe.exists(candidate)) {
      return found(candidate);
    }
    attempted.push(candidate);
  }
  return notFound(attempted);
}
