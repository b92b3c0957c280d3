/**
 * Logging subscriber for resolution events.
 */

import { type ComponentLogger, createLogger } from '../logging/index.js';
import type {
  ModuleExhaustedPayload,
  ModuleLoadedPayload,
  ModuleResolvedPayload,
  ResolutionEventEmitter,
  SearcherFailedPayload,
} from './event-emitter.js';
import { DispatchEventNames, ResolutionEventNames } from './event-names.js';

/**
 * Forwards resolution events to the structured logger.
 *
 * Failures of single searchers and successful loads are debug output;
 * an exhausted resolution is info, leaving the diagnostic report to the
 * entry point.
 *
 * @returns A function that detaches the subscriber
 */
export function attachLoggingSubscriber(
  events: ResolutionEventEmitter,
  logger: ComponentLogger = createLogger({ component: 'resolution' })
): () => void {
  const onSearcherFailed = (payload: SearcherFailedPayload) =>
    logger.debug('Searcher found no match', {
      module_name: payload.moduleName,
      searcher: payload.searcher,
      attempted_count: payload.attempted.length,
    });

  const onResolved = (payload: ModuleResolvedPayload) =>
    logger.debug('Module resolved', {
      module_name: payload.moduleName,
      searcher: payload.searcher,
      path: payload.path,
    });

  const onExhausted = (payload: ModuleExhaustedPayload) =>
    logger.info('No searcher could resolve module', {
      module_name: payload.moduleName,
      attempted_count: payload.failures.length,
    });

  const onLoaded = (payload: ModuleLoadedPayload) =>
    logger.debug('Module loaded', {
      module_name: payload.moduleName,
      path: payload.path,
      arg_count: payload.argCount,
    });

  events.on(ResolutionEventNames.SEARCHER_FAILED, onSearcherFailed);
  events.on(ResolutionEventNames.MODULE_RESOLVED, onResolved);
  events.on(ResolutionEventNames.MODULE_EXHAUSTED, onExhausted);
  events.on(DispatchEventNames.MODULE_LOADED, onLoaded);

  return () => {
    events.off(ResolutionEventNames.SEARCHER_FAILED, onSearcherFailed);
    events.off(ResolutionEventNames.MODULE_RESOLVED, onResolved);
    events.off(ResolutionEventNames.MODULE_EXHAUSTED, onExhausted);
    events.off(DispatchEventNames.MODULE_LOADED, onLoaded);
  };
}
