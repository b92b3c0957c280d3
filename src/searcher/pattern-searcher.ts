/**
 * Base class for custom searchers keyed on a name pattern or prefix.
 *
 * Subclasses set `pattern` or `prefix` and produce candidate paths; the base
 * class does the matching and the existence checks.
 *
 * @example
 * ```typescript
 * class ScopedSearcher extends PatternSearcher {
 *   readonly name = 'scoped';
 *   readonly pattern = /^@(?<scope>[\w-]+)\/(?<module>[\w-]+)$/;
 *
 *   candidatePaths(_name: string, match: RegExpMatchArray | null): string[] {
 *     const groups = match?.groups;
 *     if (!groups) return [];
 *     return [`./scopes/${groups.scope}/${groups.module}.js`];
 *   }
 * }
 *
 * chain.add(new ScopedSearcher());
 * ```
 */

import {
  firstExisting,
  notFound,
  type SearchOutcome,
  type SearchScope,
  type SearcherStrategy,
} from './base-searcher.js';

export abstract class PatternSearcher implements SearcherStrategy {
  abstract readonly name: string;

  /** Names matching this pattern are handled (checked before `prefix`) */
  readonly pattern?: RegExp;

  /** Names starting with this prefix are handled */
  readonly prefix?: string;

  /**
   * Whether this searcher handles the name at all.
   */
  matches(name: string): boolean {
    if (this.pattern) {
      return this.matchPattern(name) !== null;
    }
    if (this.prefix !== undefined) {
      return name.startsWith(this.prefix);
    }
    return false;
  }

  search(name: string, scope: SearchScope): SearchOutcome {
    if (!this.matches(name)) {
      return notFound([]);
    }
    const match = this.matchPattern(name);
    return firstExisting(this.candidatePaths(name, match, scope), scope.probe);
  }

  private matchPattern(name: string): RegExpMatchArray | null {
    if (!this.pattern) {
      return null;
    }
    // global and sticky patterns carry state between calls
    this.pattern.lastIndex = 0;
    return this.pattern.exec(name);
  }

  /**
   * Candidate paths for a matching name, in the order they should be tried.
   *
   * @param match - Result of matching `pattern`, or null when `prefix` is used
   */
  abstract candidatePaths(
    name: string,
    match: RegExpMatchArray | null,
    scope: SearchScope
  ): string[];
}
