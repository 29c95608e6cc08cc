/**
 * Fetch entrypoint: exports the default fetch transport and its supporting types.
 * @module
 */
export { readBody } from './body.js';
export { DEFAULT_TIMEOUT, FetchTransport } from './client.js';
export { mergeHeaderOptions } from './utils.js';
