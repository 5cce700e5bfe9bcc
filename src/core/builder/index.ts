/**
 * @arch propweave.core.barrel
 */
export * from './builder.js';
