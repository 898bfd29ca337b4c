export {
  NEGATIVE_TTL_SECONDS,
  PHOTO_SIZES_TTL_SECONDS,
  cacheKey,
  createCachePolicies,
  type CachePolicies,
  type CachePolicy,
} from './policies';
export { ResponseCache, type CachedEntry, type Fetcher, type Lookup } from './response-cache';
