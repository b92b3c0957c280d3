/**
 * Searcher strategies and the chain that orders them.
 *
 * - `SearcherStrategy`: contract every searcher implements
 * - `SearcherChain`: ordered, named list of searchers
 * - `DefaultSearcher`: literal path check, then search path templates
 * - `MappingSearcher`: explicit module name to path mappings
 * - `PatternSearcher`: base class for pattern or prefix keyed searchers
 * - `PathProbe` / `NodePathProbe`: existence checks
 */

export {
  firstExisting,
  found,
  notFound,
  type SearchFound,
  type SearchNotFound,
  type SearchOutcome,
  type SearchScope,
  type SearcherStrategy,
} from './base-searcher.js';
export { NodePathProbe, type PathProbe } from './path-probe.js';
export { PatternSearcher } from './pattern-searcher.js';
export { SearcherChain } from './searcher-chain.js';
export { DefaultSearcher, isLiteralName, MappingSearcher } from './searchers/index.js';
