/**
 * @arch propweave.core.barrel
 */
export * from './token.js';
export * from './value-type.js';
