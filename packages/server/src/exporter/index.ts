export * from './catalog.js';
export * from './config-source.js';
export * from './coordinator.js';
export * from './fetcher.js';
export * from './gauge-registry.js';
export * from './mutex.js';
export * from './publisher.js';
export * from './resolve.js';
export * from './selector.js';
export type * from './types.js';
