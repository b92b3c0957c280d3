/**
 * Type-safe event emitter for resolution and dispatch events.
 */

import { EventEmitter } from 'eventemitter3';
import type { FailedCandidate } from '../errors/index.js';
import { DispatchEventNames, ResolutionEventNames } from './event-names.js';

export interface SearcherFailedPayload {
  moduleName: string;
  searcher: string;
  attempted: string[];
  timestamp: Date;
}

export interface ModuleResolvedPayload {
  moduleName: string;
  searcher: string;
  path: string;
  timestamp: Date;
}

export interface ModuleExhaustedPayload {
  moduleName: string;
  failures: readonly FailedCandidate[];
  timestamp: Date;
}

export interface ModuleLoadedPayload {
  moduleName: string;
  path: string;
  argCount: number;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface ModsourceEventMap {
  'searcher.failed': [SearcherFailedPayload];
  'module.resolved': [ModuleResolvedPayload];
  'module.exhausted': [ModuleExhaustedPayload];
  'module.loaded': [ModuleLoadedPayload];
}

export class ResolutionEventEmitter extends EventEmitter<ModsourceEventMap> {
  emitSearcherFailed(moduleName: string, searcher: string, attempted: string[]): void {
    this.emit(ResolutionEventNames.SEARCHER_FAILED, {
      moduleName,
      searcher,
      attempted,
      timestamp: new Date(),
    });
  }

  emitModuleResolved(moduleName: string, searcher: string, path: string): void {
    this.emit(ResolutionEventNames.MODULE_RESOLVED, {
      moduleName,
      searcher,
      path,
      timestamp: new Date(),
    });
  }

  emitModuleExhausted(moduleName: string, failures: readonly FailedCandidate[]): void {
    this.emit(ResolutionEventNames.MODULE_EXHAUSTED, {
      moduleName,
      failures,
      timestamp: new Date(),
    });
  }

  emitModuleLoaded(moduleName: string, path: string, argCount: number): void {
    this.emit(DispatchEventNames.MODULE_LOADED, {
      moduleName,
      path,
      argCount,
      timestamp: new Date(),
    });
  }
}
