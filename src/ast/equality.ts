import type { AstNode } from '../types/index.js';
import { children } from './node.js';

/**
 * Structural equality: same kind, same attributes, and pairwise equal
 * children in order. Node identity and property metadata are ignored.
 */
export function structurallyEqual(a: AstNode, b: AstNode): boolean {
    if (a === b) return true;
    if (!sameAttributes(a, b)) return false;
    const left = children(a);
    const right = children(b);
    if (left.length !== right.length) return false;
    return left.every((child, i) => structurallyEqual(child, right[i]));
}

function samePath(a: readonly (string | number)[], b: readonly (string | number)[]): boolean {
    return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

function sameAttributes(a: AstNode, b: AstNode): boolean {
    switch (a.kind) {
        case 'value':
            return b.kind === 'value' && a.value === b.value;
        case 'literal':
            return b.kind === 'literal' && a.value === b.value;
        case 'field':
            return b.kind === 'field' && a.alias === b.alias && samePath(a.path, b.path);
        case 'variable':
            return b.kind === 'variable' && a.name === b.name;
        case 'compare':
            return b.kind === 'compare' && a.operator === b.operator;
        case 'arith':
            return b.kind === 'arith' && a.operator === b.operator;
        case 'call':
            return b.kind === 'call' && a.name === b.name;
        case 'range':
            return b.kind === 'range' && a.excludeMin === b.excludeMin && a.excludeMax === b.excludeMax;
        case 'quantifier':
            return b.kind === 'quantifier' && a.quantifier === b.quantifier && a.variable === b.variable;
        case 'event':
            return b.kind === 'event'
                && a.channel === b.channel
                && a.alias === b.alias
                && (a.predicate === undefined) === (b.predicate === undefined);
        case 'scope':
            return b.kind === 'scope' && a.scope === b.scope;
        case 'pattern':
            return b.kind === 'pattern'
                && a.pattern === b.pattern
                && a.minTime === b.minTime
                && a.maxTime === b.maxTime
                && (a.trigger === undefined) === (b.trigger === undefined);
        case 'not':
        case 'and':
        case 'or':
        case 'set':
        case 'predicate':
        case 'disjunction':
        case 'property':
        case 'specification':
            return a.kind === b.kind;
    }
}
