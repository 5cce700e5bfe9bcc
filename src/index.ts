/**
 * @arch propweave.barrel
 *
 * propweave - typed property registries resolved across class and
 * interface hierarchies.
 * Main library exports barrel file.
 */

// Naming conventions
export * from './core/conventions/index.js';

// Value-type tokens and expected types
export * from './core/tokens/index.js';

// Host model contract and the ts-morph implementation
export * from './core/host/index.js';

// Descriptors
export * from './core/descriptors/index.js';

// Collection, hierarchy walk and assembly
export * from './core/collector/index.js';
export * from './core/hierarchy/index.js';

// Registries and the cache
export * from './core/registry/index.js';

// Builder
export * from './core/builder/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
