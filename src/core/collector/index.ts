/**
 * @arch propweave.core.barrel
 */
export * from './types.js';
export * from './problems.js';
export * from './collector.js';
