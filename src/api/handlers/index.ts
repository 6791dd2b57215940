/**
 * Handler exports for the API layer.
 */

export * from './QcHandlers.js';
