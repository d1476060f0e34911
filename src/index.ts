export { collectSignatures, loadCollectOptions } from './collect.js';
export type { CollectOptions } from './collect.js';
export * from './parser/index.js';
export * from './ffi/index.js';
export { loadOptionalConfig, resolveConfig } from './dx/config.js';
export type { SignatureRuntimeConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
