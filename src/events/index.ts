/**
 * Events emitted while resolving and loading modules.
 */

export {
  type ModsourceEventMap,
  type ModuleExhaustedPayload,
  type ModuleLoadedPayload,
  type ModuleResolvedPayload,
  ResolutionEventEmitter,
  type SearcherFailedPayload,
} from './event-emitter.js';
export {
  type DispatchEventName,
  DispatchEventNames,
  type EventName,
  EventNames,
  type ResolutionEventName,
  ResolutionEventNames,
} from './event-names.js';
export { attachLoggingSubscriber } from './logging-subscriber.js';
