/**
 * Error types for module resolution and dispatch.
 */

/**
 * A candidate path one searcher tried and rejected.
 */
export interface FailedCandidate {
  /** Name of the searcher that produced the candidate */
  searcher: string;
  path: string;
}

/**
 * Base error class for all modsource errors.
 */
export class ModsourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModsourceError';
  }
}

/**
 * Errors that end an entry point with a diagnostic report and exit status.
 */
export abstract class DiagnosticError extends ModsourceError {
  /** Label of the entry point that raised the error ("source", ".") */
  readonly label: string;

  abstract readonly exitStatus: number;

  constructor(label: string, message: string) {
    super(message);
    this.name = 'DiagnosticError';
    this.label = label;
  }

  /**
   * Lines written to the diagnostic stream, without trailing newlines.
   */
  abstract diagnosticLines(): string[];
}

/**
 * Raised when an entry point is invoked without a module name.
 */
export class UsageError extends DiagnosticError {
  readonly exitStatus = 2;

  constructor(label: string) {
    super(label, `${label}: error: script name is required`);
    this.name = 'UsageError';
  }

  diagnosticLines(): string[] {
    return [this.message];
  }
}

/**
 * Raised when every searcher failed to resolve a module name.
 */
export class ResolutionExhaustedError extends DiagnosticError {
  readonly exitStatus = 1;
  readonly moduleName: string;
  readonly failures: readonly FailedCandidate[];

  constructor(label: string, moduleName: string, failures: readonly FailedCandidate[]) {
    super(label, `${label}: error: no script called '${moduleName}'`);
    this.name = 'ResolutionExhaustedError';
    this.moduleName = moduleName;
    this.failures = failures;
  }

  diagnosticLines(): string[] {
    return [this.message, ...this.failures.map((failure) => `\tno file '${failure.path}'`)];
  }
}

/**
 * Raised when a search path template does not have exactly one slot.
 */
export class InvalidTemplateError extends ModsourceError {
  readonly template: string;
  readonly slotCount: number;

  constructor(template: string, slotCount: number) {
    super(`Search path template '${template}' must contain exactly one '%s' (found ${slotCount})`);
    this.name = 'InvalidTemplateError';
    this.template = template;
    this.slotCount = slotCount;
  }
}

/**
 * Raised when a searcher is added under a name already in the chain.
 */
export class DuplicateSearcherError extends ModsourceError {
  readonly searcherName: string;

  constructor(searcherName: string) {
    super(`Searcher already registered: '${searcherName}'`);
    this.name = 'DuplicateSearcherError';
    this.searcherName = searcherName;
  }
}

/**
 * Diagnostic lines for an error raised by an entry point.
 */
export function formatDiagnostics(error: DiagnosticError): string[] {
  return error.diagnosticLines();
}
