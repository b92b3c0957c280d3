/**
 * Load dispatcher.
 *
 * Resolves a module name and hands the resolved path, with the forwarded
 * arguments unmodified, to the context's load primitive. Failures come back
 * as typed outcomes; deciding whether to terminate is left to the caller
 * (see `runEntryPoint`). Errors thrown by the load primitive are not caught.
 */

import type { ResolverContext } from '../context/resolver-context.js';
import { ResolutionExhaustedError, UsageError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { resolveModule } from '../resolution/resolve-module.js';
import { isResolved } from '../resolution/types.js';

const log = createLogger({ component: 'dispatch' });

export interface LoadRequest {
  /** Entry point label used in diagnostics ("source", ".") */
  label: string;
  /** Module name; empty or missing is a usage error */
  name: string | undefined;
  /** Arguments forwarded to the load primitive */
  args: readonly string[];
}

export interface Loaded {
  status: 'loaded';
  name: string;
  path: string;
  searcher: string;
  /** Whatever the load primitive returned (awaited) */
  result: unknown;
}

export interface UsageFailure {
  status: 'usage_error';
  error: UsageError;
}

export interface ExhaustedFailure {
  status: 'exhausted';
  error: ResolutionExhaustedError;
}

export type LoadOutcome = Loaded | UsageFailure | ExhaustedFailure;

export async function dispatch(context: ResolverContext, request: LoadRequest): Promise<LoadOutcome> {
  const { label, name, args } = request;

  if (!name) {
    return { status: 'usage_error', error: new UsageError(label) };
  }

  const resolution = resolveModule(context, name);

  if (!isResolved(resolution)) {
    return {
      status: 'exhausted',
      error: new ResolutionExhaustedError(label, name, resolution.failures),
    };
  }

  log.debug('Loading resolved module', {
    operation: 'load',
    label,
    module_name: name,
    path: resolution.path,
    searcher: resolution.searcher,
  });

  const result = await context.loader.load(resolution.path, args);
  context.events.emitModuleLoaded(name, resolution.path, args.length);

  return {
    status: 'loaded',
    name,
    path: resolution.path,
    searcher: resolution.searcher,
    result,
  };
}
