/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
