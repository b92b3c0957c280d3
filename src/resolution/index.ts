export { type ResolutionScope, resolveModule } from './resolve-module.js';
export {
  type Exhausted,
  type FailedCandidate,
  isResolved,
  type Resolved,
  type ResolutionResult,
} from './types.js';
