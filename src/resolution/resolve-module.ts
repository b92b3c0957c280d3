/**
 * Resolution engine.
 *
 * Walks the searcher chain in registration order with the original module
 * name. The first searcher that finds a path wins and no later searcher
 * runs; failed candidates gathered so far are dropped. When every searcher
 * fails, the result lists every rejected candidate in chain order.
 *
 * The engine itself never touches the filesystem; searchers do, through the
 * context's probe.
 */

import type { ResolutionEventEmitter } from '../events/event-emitter.js';
import type { SearchScope } from '../searcher/base-searcher.js';
import type { SearcherChain } from '../searcher/searcher-chain.js';
import type { FailedCandidate, ResolutionResult } from './types.js';

/**
 * What the engine needs from a resolver context.
 */
export interface ResolutionScope extends SearchScope {
  readonly searchers: SearcherChain;
  readonly events?: ResolutionEventEmitter;
}

/**
 * State of one resolution call. Never outlives the call.
 */
class ResolutionAttempt {
  readonly name: string;
  readonly failures: FailedCandidate[] = [];

  constructor(name: string) {
    this.name = name;
  }

  recordFailure(searcher: string, attempted: readonly string[]): void {
    for (const path of attempted) {
      this.failures.push({ searcher, path });
    }
  }
}

/**
 * Resolve a module name to a single existing path.
 */
export function resolveModule(scope: ResolutionScope, name: string): ResolutionResult {
  const attempt = new ResolutionAttempt(name);

  for (const searcher of scope.searchers) {
    const outcome = searcher.search(name, scope);

    if (outcome.status === 'found') {
      scope.events?.emitModuleResolved(name, searcher.name, outcome.path);
      return { kind: 'resolved', name, path: outcome.path, searcher: searcher.name };
    }

    attempt.recordFailure(searcher.name, outcome.attempted);
    scope.events?.emitSearcherFailed(name, searcher.name, outcome.attempted);
  }

  scope.events?.emitModuleExhausted(name, attempt.failures);
  return { kind: 'exhausted', name, failures: attempt.failures };
}
