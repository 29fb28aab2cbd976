/**
 * Coarse typing of predicate expressions.
 *
 * Every operator declares the mask its operands must overlap with. Field
 * types come from the environment: with a channel schema they are exact,
 * without one a field may be anything a message can hold.
 */

import type { Expression, FieldAccessNode, VariableNode } from '../types/index.js';
import { children, isExpression } from '../ast/node.js';
import {
    T_ANY,
    T_ARR,
    T_BOOL,
    T_COMP,
    T_ITEM,
    T_NUM,
    T_PRIM,
    T_RAN,
    T_SET,
    T_STR,
    canBe,
    type TypeMask,
} from '../types/valueTypes.js';

export interface TypingEnvironment {
    fieldType(field: FieldAccessNode): TypeMask;
    /** Item type of the quantifier binding the variable, if any. */
    variableType(variable: VariableNode): TypeMask | undefined;
    /** Return type of a registered function. */
    functionType(name: string): TypeMask | undefined;
}

/**
 * Mask of the values an expression may produce.
 */
export function inferType(node: Expression, env: TypingEnvironment): TypeMask {
    switch (node.kind) {
        case 'value':
        case 'not':
        case 'and':
        case 'or':
        case 'compare':
        case 'quantifier':
            return T_BOOL;
        case 'arith':
            return T_NUM;
        case 'literal':
            if (typeof node.value === 'boolean') return T_BOOL;
            if (typeof node.value === 'string') return T_STR;
            return T_NUM;
        case 'field':
            return env.fieldType(node);
        case 'variable':
            return env.variableType(node) ?? T_ITEM;
        case 'call':
            return env.functionType(node.name) ?? T_ANY;
        case 'set':
            return T_SET;
        case 'range':
            return T_RAN;
    }
}

/**
 * Mask of the items a quantifier ranges over.
 */
export function elementType(domain: Expression, env: TypingEnvironment): TypeMask {
    if (domain.kind === 'range') return T_NUM;
    if (domain.kind === 'set') {
        const mask = domain.values.reduce((acc, value) => acc | inferType(value, env), 0);
        return mask === 0 ? T_PRIM : mask;
    }
    return T_ITEM;
}

export interface OperandExpectation {
    operand: Expression;
    expected: TypeMask;
}

/**
 * What each immediate operand of `node` must be able to hold.
 * Function arguments are checked against the registry instead.
 */
export function operandExpectations(node: Expression): OperandExpectation[] {
    switch (node.kind) {
        case 'not':
            return [{ operand: node.operand, expected: T_BOOL }];
        case 'and':
        case 'or':
            return node.operands.map(operand => ({ operand, expected: T_BOOL }));
        case 'compare':
            switch (node.operator) {
                case '=':
                case '!=':
                    return [
                        { operand: node.left, expected: T_PRIM },
                        { operand: node.right, expected: T_PRIM },
                    ];
                case 'in':
                    return [
                        { operand: node.left, expected: T_PRIM },
                        { operand: node.right, expected: T_SET | T_RAN | T_ARR },
                    ];
                default:
                    return [
                        { operand: node.left, expected: T_NUM },
                        { operand: node.right, expected: T_NUM },
                    ];
            }
        case 'arith':
            return [
                { operand: node.left, expected: T_NUM },
                { operand: node.right, expected: T_NUM },
            ];
        case 'set':
            return node.values.map(operand => ({ operand, expected: T_PRIM }));
        case 'range':
            return [
                { operand: node.min, expected: T_NUM },
                { operand: node.max, expected: T_NUM },
            ];
        case 'quantifier':
            return [
                { operand: node.domain, expected: T_COMP },
                { operand: node.condition, expected: T_BOOL },
            ];
        default:
            return [];
    }
}

export interface TypeIssue {
    /** The operand whose type does not fit. */
    node: Expression;
    expected: TypeMask;
    actual: TypeMask;
}

/**
 * Operand type problems of a single node (not recursive).
 * Equality operands must also be compatible with each other.
 */
export function checkOperandTypes(
    node: Expression,
    typeOf: (operand: Expression) => TypeMask
): TypeIssue[] {
    const issues: TypeIssue[] = [];
    for (const { operand, expected } of operandExpectations(node)) {
        const actual = typeOf(operand);
        if (!canBe(actual, expected)) {
            issues.push({ node: operand, expected, actual });
        }
    }
    if (issues.length === 0 && node.kind === 'compare' && (node.operator === '=' || node.operator === '!=')) {
        const left = typeOf(node.left) & T_PRIM;
        const right = typeOf(node.right);
        if (!canBe(right, left)) {
            issues.push({ node: node.right, expected: left, actual: right });
        }
    }
    return issues;
}

/**
 * The mask each operand is narrowed to by the operator using it; the
 * condition itself is used as a boolean. Equality narrows both sides to
 * what they have in common. Operands without an expectation (function
 * arguments) are absent.
 */
export function usageTypes(
    condition: Expression,
    typeOf: (node: Expression) => TypeMask
): Map<Expression, TypeMask> {
    const usages = new Map<Expression, TypeMask>([[condition, typeOf(condition) & T_BOOL]]);
    const visit = (node: Expression): void => {
        for (const { operand, expected } of operandExpectations(node)) {
            usages.set(operand, typeOf(operand) & expected);
        }
        if (node.kind === 'compare' && (node.operator === '=' || node.operator === '!=')) {
            const common = typeOf(node.left) & typeOf(node.right) & T_PRIM;
            usages.set(node.left, common);
            usages.set(node.right, common);
        }
        for (const child of children(node)) {
            if (isExpression(child)) visit(child);
        }
    };
    visit(condition);
    return usages;
}
