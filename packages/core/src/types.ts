/**
 * Lox Front-End Types
 * Tokens, AST nodes, locations, and the error taxonomy
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';
