/**
 * Type exports for bead-array-qc.
 */

export * from './cell.js';
export * from './table.js';
export * from './qc.js';
