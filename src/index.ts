/**
 * modsource
 *
 * Ordered, extensible module resolution for Node.js: a module name becomes
 * one existing file through literal path checks, search path templates and
 * a chain of searcher strategies, and is then handed to a load primitive.
 *
 * @packageDocumentation
 */

// =============================================================================
// Configuration and logging
// =============================================================================
export {
  DEFAULT_EXTENSIONS,
  defaultUserModuleDir,
  type Environment,
  loadConfig,
  type LogLevel,
  type ModsourceConfig,
} from './config/index.js';
export {
  type ComponentLogger,
  createLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setLogLevel,
} from './logging/index.js';

// =============================================================================
// Errors
// =============================================================================
export {
  DiagnosticError,
  DuplicateSearcherError,
  type FailedCandidate,
  formatDiagnostics,
  InvalidTemplateError,
  ModsourceError,
  ResolutionExhaustedError,
  UsageError,
} from './errors/index.js';

// =============================================================================
// Search path, searchers and resolution
// =============================================================================
export * from './search-path/index.js';
export * from './searcher/index.js';
export {
  type Exhausted,
  isResolved,
  type Resolved,
  type ResolutionResult,
  type ResolutionScope,
  resolveModule,
} from './resolution/index.js';

// =============================================================================
// Context, events and dispatch
// =============================================================================
export * from './context/index.js';
export * from './events/index.js';
export * from './dispatch/index.js';
