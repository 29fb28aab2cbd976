import type { Expression } from '../../types/index.js';
import { createAnd, createNot, createOr, createValue } from '../../ast/factory.js';
import { disown } from '../../ast/node.js';
import { duplicate } from '../../ast/duplicate.js';

/**
 * Simplify the boolean structure of an expression.
 *
 * - double negation: not not a -> a
 * - constant negation: not True -> False, not unknown -> unknown
 * - flattening: (a and (b and c)) -> (a and b and c)
 * - identity: (True and a) -> a, (False or a) -> a
 * - short-circuit: (False and a) -> False, (True or a) -> True
 * - single operand: (a) -> a
 *
 * Non-boolean nodes are leaves and are copied unchanged. The result is a
 * fresh tree; the input is not modified. simplify(simplify(e)) is
 * structurally equal to simplify(e).
 */
export function simplify(node: Expression): Expression {
    switch (node.kind) {
        case 'value':
            return createValue(node.value);

        case 'not': {
            const operand = simplify(node.operand);
            if (operand.kind === 'value') {
                return createValue(operand.value === null ? null : !operand.value);
            }
            if (operand.kind === 'not') {
                return disown(operand.operand);
            }
            return createNot(operand);
        }

        case 'and':
        case 'or':
            return simplifyConnective(node.kind, node.operands);

        default:
            return duplicate(node);
    }
}

function simplifyConnective(kind: 'and' | 'or', operands: Expression[]): Expression {
    // False absorbs a conjunction, True absorbs a disjunction
    const absorbing = kind === 'or';
    const kept: Expression[] = [];

    for (const operand of operands) {
        const simplified = simplify(operand);
        const flattened = (simplified.kind === 'and' || simplified.kind === 'or') && simplified.kind === kind
            ? simplified.operands.map(disown)
            : [simplified];
        for (const item of flattened) {
            if (item.kind === 'value' && item.value === absorbing) {
                return createValue(absorbing);
            }
            if (item.kind === 'value' && item.value === !absorbing) {
                continue;
            }
            kept.push(item);
        }
    }

    if (kept.length === 0) {
        return createValue(!absorbing);
    }
    if (kept.length === 1) {
        return kept[0];
    }
    return kind === 'and' ? createAnd(kept) : createOr(kept);
}
