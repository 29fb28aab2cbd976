import type { AstNode, EventNode, Expression, PropertyNode } from '../types/index.js';
import { attach, nextNodeId } from './node.js';

/**
 * Deep copy of a node. Every copied node gets a fresh identity and nothing
 * mutable is shared with the original. Builder checks are bypassed: a tree
 * that was edited into an invalid shape still copies, so that validation can
 * report on the copy.
 */
export function duplicate<T extends AstNode>(node: T): T;
export function duplicate(node: AstNode): AstNode {
    switch (node.kind) {
        case 'value':
            return { id: nextNodeId(), kind: 'value', value: node.value };
        case 'literal':
            return { id: nextNodeId(), kind: 'literal', value: node.value };
        case 'field':
            return { id: nextNodeId(), kind: 'field', alias: node.alias, path: [...node.path] };
        case 'variable':
            return { id: nextNodeId(), kind: 'variable', name: node.name };
        case 'not':
            return attach({ id: nextNodeId(), kind: 'not', operand: duplicateExpression(node.operand) });
        case 'and':
            return attach({ id: nextNodeId(), kind: 'and', operands: node.operands.map(duplicateExpression) });
        case 'or':
            return attach({ id: nextNodeId(), kind: 'or', operands: node.operands.map(duplicateExpression) });
        case 'compare':
            return attach({
                id: nextNodeId(),
                kind: 'compare',
                operator: node.operator,
                left: duplicateExpression(node.left),
                right: duplicateExpression(node.right),
            });
        case 'arith':
            return attach({
                id: nextNodeId(),
                kind: 'arith',
                operator: node.operator,
                left: duplicateExpression(node.left),
                right: duplicateExpression(node.right),
            });
        case 'call':
            return attach({ id: nextNodeId(), kind: 'call', name: node.name, args: node.args.map(duplicateExpression) });
        case 'set':
            return attach({ id: nextNodeId(), kind: 'set', values: node.values.map(duplicateExpression) });
        case 'range':
            return attach({
                id: nextNodeId(),
                kind: 'range',
                min: duplicateExpression(node.min),
                max: duplicateExpression(node.max),
                excludeMin: node.excludeMin,
                excludeMax: node.excludeMax,
            });
        case 'quantifier':
            return attach({
                id: nextNodeId(),
                kind: 'quantifier',
                quantifier: node.quantifier,
                variable: node.variable,
                domain: duplicateExpression(node.domain),
                condition: duplicateExpression(node.condition),
            });
        case 'predicate':
            return attach({ id: nextNodeId(), kind: 'predicate', condition: duplicateExpression(node.condition) });
        case 'event':
            return attach({
                id: nextNodeId(),
                kind: 'event',
                channel: node.channel,
                alias: node.alias,
                predicate: node.predicate ? duplicate(node.predicate) : undefined,
            });
        case 'disjunction':
            return attach({ id: nextNodeId(), kind: 'disjunction', events: node.events.map(duplicateEvent) });
        case 'scope':
            return attach({
                id: nextNodeId(),
                kind: 'scope',
                scope: node.scope,
                activator: node.activator ? duplicateEvent(node.activator) : undefined,
                terminator: node.terminator ? duplicateEvent(node.terminator) : undefined,
            });
        case 'pattern':
            return attach({
                id: nextNodeId(),
                kind: 'pattern',
                pattern: node.pattern,
                behaviour: duplicateEvent(node.behaviour),
                trigger: node.trigger ? duplicateEvent(node.trigger) : undefined,
                minTime: node.minTime,
                maxTime: node.maxTime,
            });
        case 'property':
            return attach({
                id: nextNodeId(),
                kind: 'property',
                scope: duplicate(node.scope),
                pattern: duplicate(node.pattern),
                metadata: structuredClone(node.metadata),
            });
        case 'specification':
            return attach({ id: nextNodeId(), kind: 'specification', properties: node.properties.map(duplicateProperty) });
    }
}

function duplicateExpression(node: Expression): Expression {
    return duplicate(node);
}

function duplicateEvent(node: EventNode): EventNode {
    return duplicate(node);
}

function duplicateProperty(node: PropertyNode): PropertyNode {
    return duplicate(node);
}
