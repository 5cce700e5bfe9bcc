/**
 * @arch propweave.core.barrel
 */
export * from './walker.js';
export * from './assembler.js';
