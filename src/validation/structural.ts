import type { Expression, QuantifierNode } from '../types/index.js';
import { createDiagnostic } from '../types/index.js';
import { T_ANY, T_BOOL, canBe, typeName } from '../types/valueTypes.js';
import { isExpression } from '../ast/node.js';
import { traverse } from '../ast/visitor.js';
import { disjunctions, duplicateChannels } from '../events/analysis.js';
import { typecheckCall } from '../functions/registry.js';
import { formatFieldPath } from '../predicate/fields.js';
import { isOwnFieldAccess } from '../predicate/references.js';
import { checkOperandTypes, usageTypes } from '../predicate/typing.js';
import { propertyEvents } from '../property/analysis.js';
import type { ValidationContext } from './context.js';
import type { DiagnosticSink } from './sink.js';

/**
 * Structural pass: disjunction shape, duplicate aliases, connective arity,
 * function signatures, operand types and the agreement of repeated
 * references within a predicate.
 */
export function structuralPass(ctx: ValidationContext, sink: DiagnosticSink): void {
    checkDisjunctions(ctx, sink);
    checkDuplicateAliases(ctx, sink);
    checkPredicates(ctx, sink);
    checkReferenceTypes(ctx, sink);
}

function checkDisjunctions(ctx: ValidationContext, sink: DiagnosticSink): void {
    for (const { event } of propertyEvents(ctx.property)) {
        for (const disjunction of disjunctions(event)) {
            if (disjunction.events.length < 2) {
                sink.add(createDiagnostic(
                    'InvalidDisjunctionArity',
                    disjunction.id,
                    `An event disjunction needs at least two events, got ${disjunction.events.length}`
                ));
            }
        }
        // nested disjunctions are flattened into the outermost one
        if (event.kind === 'disjunction') {
            for (const channel of duplicateChannels(event)) {
                sink.add(createDiagnostic(
                    'NonUniqueDisjunctChannel',
                    event.id,
                    `Channel '${channel}' appears multiple times in an event disjunction`,
                    { channel }
                ));
            }
        }
    }
}

function checkDuplicateAliases(ctx: ValidationContext, sink: DiagnosticSink): void {
    for (const duplicate of ctx.aliases.duplicates) {
        sink.add(createDiagnostic(
            'DuplicateAlias',
            duplicate.event.id,
            `Alias '${duplicate.alias}' of the ${duplicate.slot} event is already bound by the ${duplicate.firstSlot} event`,
            { alias: duplicate.alias, channel: duplicate.event.channel }
        ));
    }
}

function checkPredicates(ctx: ValidationContext, sink: DiagnosticSink): void {
    for (const { predicate } of ctx.predicates) {
        const conditionType = ctx.typeOf(predicate.condition);
        if (!canBe(conditionType, T_BOOL)) {
            sink.add(createDiagnostic(
                'TypeMismatch',
                predicate.condition.id,
                `Predicate condition must be boolean, got ${typeName(conditionType)}`,
                { expected: typeName(T_BOOL), actual: typeName(conditionType) }
            ));
        }

        traverse(predicate.condition, (node) => {
            if (!isExpression(node)) return;
            if ((node.kind === 'and' || node.kind === 'or') && node.operands.length === 0) {
                sink.add(createDiagnostic(
                    'InvalidConnectiveArity',
                    node.id,
                    `A ${node.kind === 'and' ? 'conjunction' : 'disjunction'} needs at least one operand`
                ));
            }
            if (node.kind === 'call') {
                sink.addAll(typecheckCall(node, ctx.registry, (arg) => ctx.typeOf(arg)));
            }
            for (const issue of checkOperandTypes(node, (operand) => ctx.typeOf(operand))) {
                sink.add(createDiagnostic(
                    'TypeMismatch',
                    issue.node.id,
                    `Expected ${typeName(issue.expected)}, got ${typeName(issue.actual)}`,
                    { expected: typeName(issue.expected), actual: typeName(issue.actual) }
                ));
            }
        });
    }
}

interface ReferenceGroup {
    name: string;
    nodes: Expression[];
    isVariable: boolean;
}

/**
 * Every use of the same field (or quantifier variable) in one predicate must
 * leave it a type in common: `speed > 0 and speed = "fast"` cannot hold.
 */
function checkReferenceTypes(ctx: ValidationContext, sink: DiagnosticSink): void {
    for (const { event, predicate } of ctx.predicates) {
        const usages = usageTypes(predicate.condition, (node) => ctx.typeOf(node));
        const groups = new Map<string | QuantifierNode, ReferenceGroup>();
        const add = (key: string | QuantifierNode, name: string, node: Expression, isVariable: boolean): void => {
            const group = groups.get(key);
            if (group) {
                group.nodes.push(node);
            } else {
                groups.set(key, { name, nodes: [node], isVariable });
            }
        };

        traverse(predicate.condition, (node) => {
            if (node.kind === 'field') {
                const path = formatFieldPath(node.path);
                const alias = isOwnFieldAccess(node, event) ? null : node.alias;
                const name = alias === null ? path : `@${alias}${path === '' ? '' : `.${path}`}`;
                add(`field:${name}`, name, node, false);
            } else if (node.kind === 'variable') {
                add(ctx.variableBinder(node) ?? `variable:${node.name}`, node.name, node, true);
            }
        });

        for (const group of groups.values()) {
            let combined = T_ANY;
            for (const node of group.nodes) {
                const usage = usages.get(node) ?? ctx.typeOf(node);
                // an operand that fits nowhere is already a TypeMismatch of its own
                if (usage === 0) continue;
                if ((combined & usage) === 0) {
                    sink.add(createDiagnostic(
                        'TypeMismatch',
                        node.id,
                        `'${group.name}' is used as ${typeName(combined)} and as ${typeName(usage)}`,
                        {
                            expected: typeName(combined),
                            actual: typeName(usage),
                            ...(group.isVariable ? { variable: group.name } : { field: group.name }),
                        }
                    ));
                    break;
                }
                combined &= usage;
            }
        }
    }
}
