export {
  CacheLayer,
  type CacheLayerOptions,
  type CachePolicy,
  cachedExecute,
  type InvalidationPredicate,
  isCacheable,
} from './cacheLayer.js';
export { FileStore, type FileStoreOptions } from './fileStore.js';
export { MemoryStore, type MemoryStoreOptions } from './memoryStore.js';
export { type KeyValueClient, RemoteStore, type RemoteStoreOptions } from './remoteStore.js';
export type { CacheEntry, CacheStore } from './store.js';
