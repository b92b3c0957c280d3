import type { FailedCandidate } from '../errors/index.js';

export type { FailedCandidate };

/**
 * A module name resolved to an existing path.
 */
export interface Resolved {
  kind: 'resolved';
  name: string;
  path: string;
  /** Searcher that produced the path */
  searcher: string;
}

/**
 * Every searcher failed. `failures` holds each rejected candidate in
 * searcher registration order, then in the order each searcher tried them.
 */
export interface Exhausted {
  kind: 'exhausted';
  name: string;
  failures: FailedCandidate[];
}

export type ResolutionResult = Resolved | Exhausted;

export function isResolved(result: ResolutionResult): result is Resolved {
  return result.kind === 'resolved';
}
