/**
 * hpl-core - Library Entry Point
 *
 * Property AST model and validation engine. Parsing and monitor
 * generation live outside this package.
 */

// Types, errors, diagnostics and options
export * from './types/index.js';

// AST Core
export * from './ast/index.js';

// Logic Engine
export * from './logic/index.js';

// Predicates
export { referencedAliases, references, externalReferences, readsOwnMessage } from './predicate/references.js';
export { inferType, checkOperandTypes } from './predicate/typing.js';
export type { TypingEnvironment, TypeIssue } from './predicate/typing.js';
export { resolveFieldPath, formatFieldPath } from './predicate/fields.js';

// Events
export * from './events/analysis.js';

// Functions
export {
    FunctionRegistry,
    builtinFunctions,
    createFunctionRegistry,
    registerBuiltins,
    typecheckCall,
} from './functions/registry.js';
export type { FunctionSignature, Overload } from './functions/registry.js';

// Properties
export { resolvePatternRules, isSafety, isLiveness, visibleSlots } from './property/patterns.js';
export type { PatternRule, PatternRules, PatternSlot, EventSlot } from './property/patterns.js';
export { buildAliasTable, propertyEvents } from './property/analysis.js';
export type { AliasTable, AliasBinding, DuplicateBinding, SlotEvent } from './property/analysis.js';

// Validation
export * from './validation/index.js';

// Logging
export { createLogger } from './utils/logging.js';
export type { Logger } from './utils/logging.js';
