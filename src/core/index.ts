/**
 * Core entrypoint: the client facade and its configuration types.
 * Import from here if you only need the client without the building blocks.
 * @module
 */

export {
  ApiClient,
  type ApiClientProps,
  type CacheConfig,
  type ClientCallOptions,
  type ClientConfig,
  type ClientPageOptions,
} from './client.js';
