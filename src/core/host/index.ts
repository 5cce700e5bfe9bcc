/**
 * @arch propweave.core.barrel
 */
export * from './types.js';
export * from './token-reader.js';
export * from './morph-model.js';
