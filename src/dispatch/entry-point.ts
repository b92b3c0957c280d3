/**
 * Entry points.
 *
 * `source` and `dot` share one algorithm and differ only in the label their
 * diagnostics carry. The first argument is the module name; the rest is
 * forwarded to the loaded module unmodified.
 *
 * When resolution fails the diagnostic lines are written to the error stream
 * and the process is terminated: status 2 for a missing name, 1 when no
 * searcher found the module.
 */

import type { ResolverContext } from '../context/resolver-context.js';
import type { DiagnosticError } from '../errors/index.js';
import { dispatch, type Loaded } from './load-dispatcher.js';

export const SOURCE_LABEL = 'source';
export const DOT_LABEL = '.';

/**
 * Where entry points report and how they terminate.
 */
export interface Terminal {
  writeError(line: string): void;
  exit(status: number): never;
}

export const processTerminal: Terminal = {
  writeError: (line) => {
    process.stderr.write(`${line}\n`);
  },
  exit: (status) => process.exit(status),
};

function reportAndExit(error: DiagnosticError, terminal: Terminal): never {
  for (const line of error.diagnosticLines()) {
    terminal.writeError(line);
  }
  return terminal.exit(error.exitStatus);
}

/**
 * Resolve `argv[0]`, load it with `argv.slice(1)`, or report and terminate.
 */
export async function runEntryPoint(
  context: ResolverContext,
  label: string,
  argv: readonly string[],
  terminal: Terminal = processTerminal
): Promise<Loaded> {
  const [name, ...args] = argv;
  const outcome = await dispatch(context, { label, name, args });

  if (outcome.status !== 'loaded') {
    return reportAndExit(outcome.error, terminal);
  }
  return outcome;
}

/**
 * Strict entry point, labelled "source".
 */
export function source(
  context: ResolverContext,
  argv: readonly string[],
  terminal?: Terminal
): Promise<Loaded> {
  return runEntryPoint(context, SOURCE_LABEL, argv, terminal);
}

/**
 * Entry point labelled ".", otherwise identical to `source`.
 */
export function dot(
  context: ResolverContext,
  argv: readonly string[],
  terminal?: Terminal
): Promise<Loaded> {
  return runEntryPoint(context, DOT_LABEL, argv, terminal);
}
