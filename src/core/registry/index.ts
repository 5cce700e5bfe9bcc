/**
 * @arch propweave.core.barrel
 */
export * from './property-registry.js';
export * from './cache.js';
export * from './visitor.js';
