/**
 * @hopline/types - Shared type definitions for Hopline
 *
 * This is the leaf package in the dependency tree.
 * Every other @hopline/* package depends on this one.
 */

export * from './common.js';
export * from './pools.js';
export * from './routing.js';
