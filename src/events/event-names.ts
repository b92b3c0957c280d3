/**
 * Event names emitted while resolving and loading modules.
 */

export const ResolutionEventNames = {
  /** Emitted when one searcher rejects a module name */
  SEARCHER_FAILED: 'searcher.failed',

  /** Emitted when a searcher resolves a module name */
  MODULE_RESOLVED: 'module.resolved',

  /** Emitted when every searcher failed */
  MODULE_EXHAUSTED: 'module.exhausted',
} as const;

export const DispatchEventNames = {
  /** Emitted after the load primitive returned for a resolved module */
  MODULE_LOADED: 'module.loaded',
} as const;

export const EventNames = {
  ...ResolutionEventNames,
  ...DispatchEventNames,
} as const;

export type ResolutionEventName = (typeof ResolutionEventNames)[keyof typeof ResolutionEventNames];
export type DispatchEventName = (typeof DispatchEventNames)[keyof typeof DispatchEventNames];
export type EventName = (typeof EventNames)[keyof typeof EventNames];
