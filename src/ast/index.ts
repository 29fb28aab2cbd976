/**
 * AST Core: node identity, ownership, copying, equality, traversal and printing.
 */

export {
    children,
    ownerOf,
    replaceChild,
    freezeTree,
    isFrozenTree,
    isExpression,
    isEvent,
    isPredicate,
    isScope,
    isPattern,
    isProperty,
} from './node.js';
export * from './factory.js';
export * from './duplicate.js';
export * from './equality.js';
export * from './visitor.js';
export * from './printer.js';
