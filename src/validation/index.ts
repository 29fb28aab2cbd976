export * from './validator.js';
export * from './sink.js';
export { ValidationContext } from './context.js';
export type { PredicateSite, VariableIssue } from './context.js';
