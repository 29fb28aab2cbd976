/**
 * Node builders
 *
 * Builders enforce only local invariants (arity, non-empty names, scope and
 * pattern shape) and throw ConstructionError immediately. Cross-tree rules
 * are left to the validator, so partial trees can be assembled freely.
 * Children passed to a builder are moved into the new node.
 */

import type {
    AndNode,
    ArithmeticNode,
    ArithmeticOperator,
    AtomicEventNode,
    ComparisonNode,
    ComparisonOperator,
    EventDisjunctionNode,
    EventNode,
    Expression,
    FieldAccessNode,
    FunctionCallNode,
    LiteralNode,
    LiteralValue,
    NotNode,
    OrNode,
    PathSegment,
    PatternNode,
    PatternType,
    PredicateNode,
    PropertyNode,
    QuantifierNode,
    RangeNode,
    ScopeNode,
    SetNode,
    SpecificationNode,
    TruthValue,
    ValueNode,
    VariableNode,
} from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { parsePropertyMetadata } from '../types/metadata.js';
import { createConstructionError } from '../types/errors.js';
import { attach, nextNodeId } from './node.js';
import { duplicateChannels } from '../events/analysis.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PATH_TOKEN = /([A-Za-z_][A-Za-z0-9_]*)|\[(\d+)\]|(\.)/y;

function checkIdentifier(what: string, name: string): void {
    if (name.length === 0) {
        throw createConstructionError('EmptyName', `${what} must not be empty`);
    }
    if (!IDENTIFIER.test(name)) {
        throw createConstructionError('InvalidName', `${what} '${name}' is not a valid identifier`, { name });
    }
}

function checkDistinct(what: string, nodes: readonly { id: number }[]): void {
    if (new Set(nodes).size !== nodes.length) {
        throw createConstructionError('NodeAlreadyOwned', `The same node appears twice among the ${what}`);
    }
}

// === Logic ===

export function createValue(value: TruthValue): ValueNode {
    return { id: nextNodeId(), kind: 'value', value };
}

export function createNot(operand: Expression): NotNode {
    return attach({ id: nextNodeId(), kind: 'not', operand });
}

export function createAnd(operands: Expression[]): AndNode {
    if (operands.length === 0) {
        throw createConstructionError('InvalidConnectiveArity', 'A conjunction needs at least one operand');
    }
    checkDistinct('operands', operands);
    return attach({ id: nextNodeId(), kind: 'and', operands: [...operands] });
}

export function createOr(operands: Expression[]): OrNode {
    if (operands.length === 0) {
        throw createConstructionError('InvalidConnectiveArity', 'A disjunction needs at least one operand');
    }
    checkDistinct('operands', operands);
    return attach({ id: nextNodeId(), kind: 'or', operands: [...operands] });
}

// === Terms and comparisons ===

export function createComparison(
    operator: ComparisonOperator,
    left: Expression,
    right: Expression
): ComparisonNode {
    checkDistinct('comparison operands', [left, right]);
    return attach({ id: nextNodeId(), kind: 'compare', operator, left, right });
}

export function createArithmetic(
    operator: ArithmeticOperator,
    left: Expression,
    right: Expression
): ArithmeticNode {
    checkDistinct('arithmetic operands', [left, right]);
    return attach({ id: nextNodeId(), kind: 'arith', operator, left, right });
}

export function createLiteral(value: LiteralValue): LiteralNode {
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw createConstructionError('InvalidLiteral', `Numeric literal must be finite, got ${value}`);
    }
    return { id: nextNodeId(), kind: 'literal', value };
}

/**
 * Split a dotted path such as `pose.covariance[3].x` into segments.
 */
export function parseFieldPath(path: string): PathSegment[] {
    const segments: PathSegment[] = [];
    PATH_TOKEN.lastIndex = 0;
    let expectName = true;
    while (PATH_TOKEN.lastIndex < path.length) {
        const start = PATH_TOKEN.lastIndex;
        const match = PATH_TOKEN.exec(path);
        if (!match) {
            throw createConstructionError('InvalidName', `Invalid field path '${path}' at position ${start}`, { path });
        }
        const [, name, index, dot] = match;
        if (name !== undefined) {
            if (!expectName) {
                throw createConstructionError('InvalidName', `Missing '.' before '${name}' in field path '${path}'`, { path });
            }
            segments.push(name);
            expectName = false;
        } else if (index !== undefined) {
            if (expectName) {
                throw createConstructionError('InvalidName', `Index without a field in field path '${path}'`, { path });
            }
            segments.push(Number(index));
        } else if (dot !== undefined) {
            if (expectName) {
                throw createConstructionError('EmptyName', `Empty field name in field path '${path}'`, { path });
            }
            expectName = true;
        }
    }
    if (expectName && segments.length > 0) {
        throw createConstructionError('EmptyName', `Field path '${path}' ends with '.'`, { path });
    }
    return segments;
}

/**
 * Field access on the message bound to `alias`, or on the enclosing event's
 * own message when `alias` is null. An empty path refers to the whole message.
 */
export function createFieldAccess(alias: string | null, path: string | PathSegment[]): FieldAccessNode {
    if (alias !== null) {
        checkIdentifier('Alias', alias);
    }
    const segments = typeof path === 'string' ? parseFieldPath(path) : [...path];
    if (alias === null && segments.length === 0) {
        throw createConstructionError('EmptyName', 'A field access on the own message needs a field path');
    }
    for (const segment of segments) {
        if (typeof segment === 'number') {
            if (!Number.isInteger(segment) || segment < 0) {
                throw createConstructionError('InvalidName', `Array index must be a non-negative integer, got ${segment}`);
            }
        } else {
            checkIdentifier('Field name', segment);
        }
    }
    return { id: nextNodeId(), kind: 'field', alias, path: segments };
}

export function createVariable(name: string): VariableNode {
    checkIdentifier('Variable name', name);
    return { id: nextNodeId(), kind: 'variable', name };
}

/**
 * Function call. The name is not looked up here: unknown functions are
 * reported by validation so calls can be built before registration.
 */
export function createCall(name: string, args: Expression[] = []): FunctionCallNode {
    checkIdentifier('Function name', name);
    checkDistinct('arguments', args);
    return attach({ id: nextNodeId(), kind: 'call', name, args: [...args] });
}

export function createSet(values: Expression[]): SetNode {
    checkDistinct('set values', values);
    return attach({ id: nextNodeId(), kind: 'set', values: [...values] });
}

export function createRange(
    min: Expression,
    max: Expression,
    options: { excludeMin?: boolean; excludeMax?: boolean } = {}
): RangeNode {
    checkDistinct('range bounds', [min, max]);
    return attach({
        id: nextNodeId(),
        kind: 'range',
        min,
        max,
        excludeMin: options.excludeMin ?? false,
        excludeMax: options.excludeMax ?? false,
    });
}

export function createForAll(variable: string, domain: Expression, condition: Expression): QuantifierNode {
    checkIdentifier('Variable name', variable);
    checkDistinct('quantifier children', [domain, condition]);
    return attach({ id: nextNodeId(), kind: 'quantifier', quantifier: 'forall', variable, domain, condition });
}

export function createExists(variable: string, domain: Expression, condition: Expression): QuantifierNode {
    checkIdentifier('Variable name', variable);
    checkDistinct('quantifier children', [domain, condition]);
    return attach({ id: nextNodeId(), kind: 'quantifier', quantifier: 'exists', variable, domain, condition });
}

// === Predicates and events ===

export function createPredicate(condition: Expression): PredicateNode {
    return attach({ id: nextNodeId(), kind: 'predicate', condition });
}

export interface AtomicEventOptions {
    alias?: string | null;
    predicate?: PredicateNode | Expression;
}

export function createEvent(channel: string, options: AtomicEventOptions = {}): AtomicEventNode {
    if (channel.length === 0) {
        throw createConstructionError('EmptyName', 'Event channel must not be empty');
    }
    const alias = options.alias ?? null;
    if (alias !== null) {
        checkIdentifier('Alias', alias);
    }
    let predicate: PredicateNode | undefined;
    if (options.predicate) {
        predicate = options.predicate.kind === 'predicate'
            ? options.predicate
            : createPredicate(options.predicate);
    }
    return attach({ id: nextNodeId(), kind: 'event', channel, alias, predicate });
}

export function createDisjunction(events: EventNode[]): EventDisjunctionNode {
    if (events.length < 2) {
        throw createConstructionError(
            'InvalidDisjunctionArity',
            `An event disjunction needs at least two events, got ${events.length}`,
            { arity: events.length }
        );
    }
    checkDistinct('disjuncts', events);
    const node: EventDisjunctionNode = { id: nextNodeId(), kind: 'disjunction', events: [...events] };
    const duplicates = duplicateChannels(node);
    if (duplicates.length > 0) {
        throw createConstructionError(
            'NonUniqueDisjunctChannel',
            `Channel '${duplicates[0]}' appears multiple times in an event disjunction`,
            { channel: duplicates[0] }
        );
    }
    return attach(node);
}

// === Scopes ===

export function createGlobalScope(): ScopeNode {
    return { id: nextNodeId(), kind: 'scope', scope: 'global' };
}

export function createAfterScope(activator: EventNode): ScopeNode {
    return attach({ id: nextNodeId(), kind: 'scope', scope: 'after', activator });
}

export function createUntilScope(terminator: EventNode): ScopeNode {
    return attach({ id: nextNodeId(), kind: 'scope', scope: 'until', terminator });
}

export function createAfterUntilScope(activator: EventNode, terminator: EventNode): ScopeNode {
    if (activator === terminator) {
        throw createConstructionError('InvalidScope', 'Activator and terminator must be different nodes');
    }
    return attach({ id: nextNodeId(), kind: 'scope', scope: 'after-until', activator, terminator });
}

// === Patterns ===

export interface Timing {
    minTime?: number;
    maxTime?: number;
}

const TRIGGER_PATTERNS = new Set<PatternType>(['response', 'requirement', 'prevention']);

export function patternTakesTrigger(pattern: PatternType): boolean {
    return TRIGGER_PATTERNS.has(pattern);
}

export interface PatternParts extends Timing {
    behaviour: EventNode;
    trigger?: EventNode;
}

export function createPattern(pattern: PatternType, parts: PatternParts): PatternNode {
    const minTime = parts.minTime ?? DEFAULTS.minTime;
    const maxTime = parts.maxTime ?? DEFAULTS.maxTime;
    if (Number.isNaN(minTime) || Number.isNaN(maxTime) || minTime < 0 || maxTime < minTime) {
        throw createConstructionError(
            'InvalidTiming',
            `Invalid time window [${minTime}, ${maxTime}]`,
            { minTime, maxTime }
        );
    }
    if (patternTakesTrigger(pattern) && !parts.trigger) {
        throw createConstructionError('InvalidPattern', `The ${pattern} pattern requires a trigger event`, { pattern });
    }
    if (!patternTakesTrigger(pattern) && parts.trigger) {
        throw createConstructionError('InvalidPattern', `The ${pattern} pattern does not take a trigger event`, { pattern });
    }
    if (parts.trigger === parts.behaviour) {
        throw createConstructionError('NodeAlreadyOwned', 'Trigger and behaviour must be different nodes');
    }
    const node: PatternNode = {
        id: nextNodeId(),
        kind: 'pattern',
        pattern,
        behaviour: parts.behaviour,
        minTime,
        maxTime,
    };
    if (parts.trigger) {
        node.trigger = parts.trigger;
    }
    return attach(node);
}

/** some `behaviour` */
export function createExistence(behaviour: EventNode, timing: Timing = {}): PatternNode {
    return createPattern('existence', { behaviour, ...timing });
}

/** no `behaviour` */
export function createAbsence(behaviour: EventNode, timing: Timing = {}): PatternNode {
    return createPattern('absence', { behaviour, ...timing });
}

/** `trigger` causes `behaviour` */
export function createResponse(trigger: EventNode, behaviour: EventNode, timing: Timing = {}): PatternNode {
    return createPattern('response', { trigger, behaviour, ...timing });
}

/** `behaviour` requires `trigger` */
export function createRequirement(behaviour: EventNode, trigger: EventNode, timing: Timing = {}): PatternNode {
    return createPattern('requirement', { trigger, behaviour, ...timing });
}

/** `trigger` forbids `behaviour` */
export function createPrevention(trigger: EventNode, behaviour: EventNode, timing: Timing = {}): PatternNode {
    return createPattern('prevention', { trigger, behaviour, ...timing });
}

// === Properties ===

export function createProperty(
    scope: ScopeNode,
    pattern: PatternNode,
    metadata: Record<string, unknown> = {}
): PropertyNode {
    return attach({ id: nextNodeId(), kind: 'property', scope, pattern, metadata: parsePropertyMetadata(metadata) });
}

export function createSpecification(properties: PropertyNode[]): SpecificationNode {
    checkDistinct('properties', properties);
    return attach({ id: nextNodeId(), kind: 'specification', properties: [...properties] });
}
