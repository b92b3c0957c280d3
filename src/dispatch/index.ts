export {
  DOT_LABEL,
  dot,
  processTerminal,
  runEntryPoint,
  SOURCE_LABEL,
  source,
  type Terminal,
} from './entry-point.js';
export { HostLoader } from './host-loader.js';
export {
  dispatch,
  type ExhaustedFailure,
  type Loaded,
  type LoadOutcome,
  type LoadRequest,
  type UsageFailure,
} from './load-dispatcher.js';
export type { LoadPrimitive } from './load-primitive.js';
