export { DefaultSearcher, isLiteralName } from './default-searcher.js';
export { MappingSearcher } from './mapping-searcher.js';
