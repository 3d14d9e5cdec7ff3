/**
 * Common type exports
 */

export * from './errors.js';
