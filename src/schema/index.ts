/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './entry.js';
export * from './options.js';
export * from './jsonOutput.js';
