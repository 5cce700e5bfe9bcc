/**
 * @arch propweave.core.barrel
 */
export * from './matcher.js';
export * from './options.js';
