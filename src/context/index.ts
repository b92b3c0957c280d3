export {
  createResolverContext,
  type ResolverContext,
  type ResolverContextOptions,
} from './resolver-context.js';
