/**
 * Per-run validation state: the alias table, field resolutions, quantifier
 * bindings and memoized expression types of one property. Nothing here is
 * stored in the tree, so the tree stays read-only during validation.
 */

import type {
    AtomicEventNode,
    ChannelSchemas,
    Expression,
    FieldAccessNode,
    PredicateNode,
    PropertyNode,
    QuantifierNode,
    VariableNode,
} from '../types/index.js';
import { children, isExpression } from '../ast/node.js';
import { traverse } from '../ast/visitor.js';
import type { FunctionRegistry } from '../functions/registry.js';
import { resolveFieldAccess, untypedFieldMask, type FieldResolution } from '../predicate/fields.js';
import { isOwnFieldAccess } from '../predicate/references.js';
import { elementType, inferType, type TypingEnvironment } from '../predicate/typing.js';
import { buildAliasTable, slotAtomicEvents, type AliasBinding, type AliasTable } from '../property/analysis.js';
import { visibleSlots, type EventSlot, type PatternRule } from '../property/patterns.js';
import type { TypeMask } from '../types/valueTypes.js';

export interface PredicateSite {
    slot: EventSlot;
    event: AtomicEventNode;
    predicate: PredicateNode;
}

export interface VariableIssue {
    code: 'UnboundVariable' | 'UnusedVariable' | 'ShadowedVariable';
    node: VariableNode | QuantifierNode;
    variable: string;
    message: string;
}

export class ValidationContext {
    readonly aliases: AliasTable;
    readonly events: Array<{ slot: EventSlot; event: AtomicEventNode }>;
    readonly predicates: PredicateSite[];
    readonly variableIssues: VariableIssue[] = [];

    private fields: Map<FieldAccessNode, FieldResolution> = new Map();
    private variables: Map<VariableNode, QuantifierNode> = new Map();
    private types: Map<Expression, TypeMask> = new Map();
    private env: TypingEnvironment;

    constructor(
        readonly property: PropertyNode,
        readonly rule: PatternRule,
        readonly registry: FunctionRegistry,
        readonly schemas?: ChannelSchemas
    ) {
        this.aliases = buildAliasTable(property);
        this.events = slotAtomicEvents(property);
        this.predicates = this.events.flatMap(({ slot, event }) =>
            event.predicate ? [{ slot, event, predicate: event.predicate }] : []
        );
        this.env = {
            fieldType: (field) => this.fields.get(field)?.mask ?? untypedFieldMask(field.path),
            variableType: (variable) => {
                const binder = this.variables.get(variable);
                return binder ? elementType(binder.domain, this.env) : undefined;
            },
            functionType: (name) => this.registry.lookup(name)?.returns,
        };

        for (const site of this.predicates) {
            this.resolveFields(site);
            this.bindVariables(site.predicate.condition, [], new Set());
        }
    }

    /**
     * Binding of `alias` if an event in `slot` may read it.
     */
    visibleBinding(alias: string, slot: EventSlot): AliasBinding | undefined {
        const binding = this.aliases.bindings.get(alias);
        if (!binding) return undefined;
        return visibleSlots(slot, this.rule).includes(binding.slot) ? binding : undefined;
    }

    /** Quantifier binding `variable`, if any encloses it. */
    variableBinder(variable: VariableNode): QuantifierNode | undefined {
        return this.variables.get(variable);
    }

    fieldResolution(field: FieldAccessNode): FieldResolution | undefined {
        return this.fields.get(field);
    }

    typeOf(node: Expression): TypeMask {
        let mask = this.types.get(node);
        if (mask === undefined) {
            mask = inferType(node, this.env);
            this.types.set(node, mask);
        }
        return mask;
    }

    private resolveFields({ slot, event, predicate }: PredicateSite): void {
        traverse(predicate, (node) => {
            if (node.kind !== 'field') return;
            let channels: string[];
            if (isOwnFieldAccess(node, event)) {
                channels = [event.channel];
            } else {
                channels = node.alias !== null ? this.visibleBinding(node.alias, slot)?.channels ?? [] : [];
            }
            this.fields.set(node, resolveFieldAccess(node, channels, this.schemas));
        });
    }

    private bindVariables(node: Expression, scope: QuantifierNode[], used: Set<QuantifierNode>): void {
        switch (node.kind) {
            case 'variable': {
                let binder: QuantifierNode | undefined;
                for (let i = scope.length - 1; i >= 0 && !binder; i--) {
                    if (scope[i].variable === node.name) binder = scope[i];
                }
                if (binder) {
                    this.variables.set(node, binder);
                    used.add(binder);
                } else {
                    this.variableIssues.push({
                        code: 'UnboundVariable',
                        node,
                        variable: node.name,
                        message: `Variable '${node.name}' is not bound by an enclosing quantifier`,
                    });
                }
                return;
            }
            case 'quantifier': {
                // the domain is evaluated outside the quantifier's own scope
                this.bindVariables(node.domain, scope, used);
                if (scope.some(q => q.variable === node.variable)) {
                    this.variableIssues.push({
                        code: 'ShadowedVariable',
                        node,
                        variable: node.variable,
                        message: `Quantifier variable '${node.variable}' shadows an enclosing quantifier variable`,
                    });
                }
                this.bindVariables(node.condition, [...scope, node], used);
                if (!used.has(node)) {
                    this.variableIssues.push({
                        code: 'UnusedVariable',
                        node,
                        variable: node.variable,
                        message: `Quantifier variable '${node.variable}' is never used in its condition`,
                    });
                }
                return;
            }
            default:
                for (const child of children(node)) {
                    if (isExpression(child)) this.bindVariables(child, scope, used);
                }
        }
    }
}
