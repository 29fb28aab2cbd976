/**
 * Logic Engine
 *
 * Boolean-algebra primitives over expressions. Connectives (value, not, and,
 * or) are interpreted; every other expression is an opaque leaf. Inputs are
 * copied, never moved, so callers keep their trees.
 */

import type { Expression, TruthValue } from '../types/index.js';
import { createAnd, createNot, createOr, createValue } from '../ast/factory.js';
import { duplicate } from '../ast/duplicate.js';
import { structurallyEqual } from '../ast/equality.js';
import { simplify } from './transform/simplify.js';

/**
 * Negation, removing a double negation or negating a constant on the way.
 */
export function negate(node: Expression): Expression {
    if (node.kind === 'not') {
        return duplicate(node.operand);
    }
    if (node.kind === 'value') {
        return createValue(node.value === null ? null : !node.value);
    }
    return createNot(duplicate(node));
}

/**
 * Conjunction of the given expressions; True when none are given.
 */
export function conjoin(...operands: Expression[]): Expression {
    if (operands.length === 0) return createValue(true);
    if (operands.length === 1) return duplicate(operands[0]);
    return createAnd(operands.map(op => duplicate(op)));
}

/**
 * Disjunction of the given expressions; False when none are given.
 */
export function disjoin(...operands: Expression[]): Expression {
    if (operands.length === 0) return createValue(false);
    if (operands.length === 1) return duplicate(operands[0]);
    return createOr(operands.map(op => duplicate(op)));
}

/**
 * Material implication: (not a) or b.
 */
export function implies(antecedent: Expression, consequent: Expression): Expression {
    return createOr([negate(antecedent), duplicate(consequent)]);
}

/**
 * Biconditional: (a implies b) and (b implies a).
 */
export function iff(left: Expression, right: Expression): Expression {
    return createAnd([implies(left, right), implies(right, left)]);
}

export type LeafAssignment = (leaf: Expression) => TruthValue;

/**
 * Evaluate the boolean structure of an expression under a truth assignment
 * for its leaves, in three-valued (Kleene) logic: `null` is unknown.
 */
export function evaluate(node: Expression, assign: LeafAssignment): TruthValue {
    switch (node.kind) {
        case 'value':
            return node.value;

        case 'not': {
            const value = evaluate(node.operand, assign);
            return value === null ? null : !value;
        }

        case 'and': {
            let result: TruthValue = true;
            for (const operand of node.operands) {
                const value = evaluate(operand, assign);
                if (value === false) return false;
                if (value === null) result = null;
            }
            return result;
        }

        case 'or': {
            let result: TruthValue = false;
            for (const operand of node.operands) {
                const value = evaluate(operand, assign);
                if (value === true) return true;
                if (value === null) result = null;
            }
            return result;
        }

        default:
            return assign(node);
    }
}

/**
 * Leaves of the boolean structure, left to right.
 */
export function logicLeaves(node: Expression): Expression[] {
    switch (node.kind) {
        case 'value':
            return [];
        case 'not':
            return logicLeaves(node.operand);
        case 'and':
        case 'or':
            return node.operands.flatMap(logicLeaves);
        default:
            return [node];
    }
}

/**
 * Leaves of the boolean structure with structural duplicates removed.
 */
export function distinctLeaves(node: Expression): Expression[] {
    const distinct: Expression[] = [];
    for (const leaf of logicLeaves(node)) {
        if (!distinct.some(seen => structurallyEqual(seen, leaf))) {
            distinct.push(leaf);
        }
    }
    return distinct;
}

/**
 * True when the expression is False under every truth assignment of its
 * distinct leaves. Expressions with more than `maxLeaves` leaves are only
 * checked by simplification.
 */
export function isUnsatisfiable(node: Expression, maxLeaves = 12): boolean {
    const simplified = simplify(node);
    if (simplified.kind === 'value') {
        return simplified.value === false;
    }
    const leaves = distinctLeaves(simplified);
    if (leaves.length > maxLeaves) {
        return false;
    }
    for (let mask = 0; mask < 2 ** leaves.length; mask++) {
        const assign: LeafAssignment = (leaf) => {
            const index = leaves.findIndex(l => structurallyEqual(l, leaf));
            return index < 0 ? null : (mask & (1 << index)) !== 0;
        };
        if (evaluate(simplified, assign) !== false) {
            return false;
        }
    }
    return true;
}
