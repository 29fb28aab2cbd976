/**
 * Core Logic Modules
 *
 * Centralizes exports for the boolean connectives, evaluation and
 * simplification shared by predicates and validation.
 */

export * from './engine.js';
export * from './transform/simplify.js';
