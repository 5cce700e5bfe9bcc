/**
 * @arch propweave.core.barrel
 */
export * from './types.js';
export * from './access.js';
export * from './factory.js';
export * from './typed-property.js';
