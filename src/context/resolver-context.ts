/**
 * Resolver context.
 *
 * Owns everything one caller's resolutions share: the search path, the
 * searcher chain, the existence probe, the load primitive and the event
 * emitter. Setup code mutates the search path and chain before resolving;
 * nothing here is process-wide.
 *
 * @example
 * ```typescript
 * const context = createResolverContext();
 * context.searchPath.add('./vendor/%s/index.js');
 * context.searchers.add(new MappingSearcher());
 *
 * const result = resolveModule(context, 'util');
 * ```
 */

import { loadConfig, type ModsourceConfig } from '../config/index.js';
import { ResolutionEventEmitter } from '../events/event-emitter.js';
import { attachLoggingSubscriber } from '../events/logging-subscriber.js';
import type { LoadPrimitive } from '../dispatch/load-primitive.js';
import { HostLoader } from '../dispatch/host-loader.js';
import type { ResolutionScope } from '../resolution/resolve-module.js';
import { defaultSearchPath } from '../search-path/defaults.js';
import type { SearchPathRegistry } from '../search-path/registry.js';
import { NodePathProbe, type PathProbe } from '../searcher/path-probe.js';
import { SearcherChain } from '../searcher/searcher-chain.js';

export interface ResolverContext extends ResolutionScope {
  readonly searchPath: SearchPathRegistry;
  readonly searchers: SearcherChain;
  readonly probe: PathProbe;
  readonly loader: LoadPrimitive;
  readonly events: ResolutionEventEmitter;
  /** Directory relative candidates are checked and loaded against */
  readonly cwd: string;
}

export interface ResolverContextOptions {
  /** Configuration (default: read from the environment) */
  config?: ModsourceConfig;
  cwd?: string;
  searchPath?: SearchPathRegistry;
  searchers?: SearcherChain;
  probe?: PathProbe;
  loader?: LoadPrimitive;
  events?: ResolutionEventEmitter;
  /** Forward resolution events to the structured logger (default: false) */
  logEvents?: boolean;
}

/**
 * Build a context, filling anything not given from configuration.
 */
export function createResolverContext(options: ResolverContextOptions = {}): ResolverContext {
  const cwd = options.cwd ?? process.cwd();
  const events = options.events ?? new ResolutionEventEmitter();

  if (options.logEvents) {
    attachLoggingSubscriber(events);
  }

  return {
    searchPath: options.searchPath ?? defaultSearchPath(options.config ?? loadConfig()),
    searchers: options.searchers ?? SearcherChain.default(),
    probe: options.probe ?? new NodePathProbe(cwd),
    loader: options.loader ?? new HostLoader(cwd),
    events,
    cwd,
  };
}
