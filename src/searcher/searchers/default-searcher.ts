/**
 * Default searcher.
 *
 * 1. A name starting with "." or "/" is a literal candidate; if it exists
 *    it wins and the search path is never read.
 * 2. Otherwise every search path template is expanded in order and the
 *    first existing expansion wins.
 * 3. On failure every checked path is reported: the literal candidate (when
 *    the name looked literal) followed by each expansion.
 *
 * A literal-looking name that does not exist still falls through to the
 * search path, so "./foo" may be reported twice when "./%s" is a template.
 */

import { createLogger } from '../../logging/index.js';
import {
  found,
  notFound,
  type SearchOutcome,
  type SearchScope,
  type SearcherStrategy,
} from '../base-searcher.js';

const log = createLogger({ component: 'default-searcher' });

const LITERAL_PATTERN = /^(\.|\/)/;

/**
 * Whether a module name should first be tried as a literal path.
 */
export function isLiteralName(name: string): boolean {
  return LITERAL_PATTERN.test(name);
}

export class DefaultSearcher implements SearcherStrategy {
  static readonly NAME = 'default';

  readonly name = DefaultSearcher.NAME;

  search(name: string, scope: SearchScope): SearchOutcome {
    const attempted: string[] = [];

    if (isLiteralName(name)) {
      if (scope.probe.exists(name)) {
        log.trace('Literal path exists', { module_name: name });
        return found(name);
      }
      attempted.push(name);
    }

    for (const template of scope.searchPath.entries()) {
      const candidate = template.expand(name);
      if (scope.probe.exists(candidate)) {
        log.trace('Search path template matched', {
          module_name: name,
          template: template.toString(),
          path: candidate,
        });
        return found(candidate);
      }
      attempted.push(candidate);
    }

    return notFound(attempted);
  }
}
