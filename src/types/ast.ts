/**
 * Abstract Syntax Tree (AST) Types for behavioural properties
 *
 * Every node family is a closed discriminated union on `kind`, so adding a
 * connective, an event form or a pattern is an exhaustiveness change checked
 * by the compiler.
 */

import type { PropertyMetadata } from './metadata.js';

export type NodeId = number;

interface NodeBase {
    readonly id: NodeId;
}

/** `null` stands for an unknown truth value. */
export type TruthValue = boolean | null;

// === Expressions ===

export interface ValueNode extends NodeBase {
    kind: 'value';
    value: TruthValue;
}

export interface NotNode extends NodeBase {
    kind: 'not';
    operand: Expression;
}

export interface AndNode extends NodeBase {
    kind: 'and';
    operands: Expression[];
}

export interface OrNode extends NodeBase {
    kind: 'or';
    operands: Expression[];
}

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'in';

export interface ComparisonNode extends NodeBase {
    kind: 'compare';
    operator: ComparisonOperator;
    left: Expression;
    right: Expression;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '**';

export interface ArithmeticNode extends NodeBase {
    kind: 'arith';
    operator: ArithmeticOperator;
    left: Expression;
    right: Expression;
}

export type LiteralValue = number | string | boolean;

export interface LiteralNode extends NodeBase {
    kind: 'literal';
    value: LiteralValue;
}

/** A field name, or an array index. */
export type PathSegment = string | number;

export interface FieldAccessNode extends NodeBase {
    kind: 'field';
    /** Alias of the event whose message is read; `null` reads the enclosing event's own message. */
    alias: string | null;
    path: PathSegment[];
}

export interface VariableNode extends NodeBase {
    kind: 'variable';
    name: string;
}

export interface FunctionCallNode extends NodeBase {
    kind: 'call';
    name: string;
    args: Expression[];
}

export interface SetNode extends NodeBase {
    kind: 'set';
    values: Expression[];
}

export interface RangeNode extends NodeBase {
    kind: 'range';
    min: Expression;
    max: Expression;
    excludeMin: boolean;
    excludeMax: boolean;
}

export type Quantifier = 'forall' | 'exists';

export interface QuantifierNode extends NodeBase {
    kind: 'quantifier';
    quantifier: Quantifier;
    variable: string;
    domain: Expression;
    condition: Expression;
}

export type Expression =
    | ValueNode
    | NotNode
    | AndNode
    | OrNode
    | ComparisonNode
    | ArithmeticNode
    | LiteralNode
    | FieldAccessNode
    | VariableNode
    | FunctionCallNode
    | SetNode
    | RangeNode
    | QuantifierNode;

// === Predicates and events ===

export interface PredicateNode extends NodeBase {
    kind: 'predicate';
    condition: Expression;
}

export interface AtomicEventNode extends NodeBase {
    kind: 'event';
    channel: string;
    alias: string | null;
    /** Absent predicate matches every message on the channel. */
    predicate?: PredicateNode;
}

export interface EventDisjunctionNode extends NodeBase {
    kind: 'disjunction';
    events: EventNode[];
}

export type EventNode = AtomicEventNode | EventDisjunctionNode;

// === Properties ===

export type ScopeType = 'global' | 'after' | 'until' | 'after-until';

export interface ScopeNode extends NodeBase {
    kind: 'scope';
    scope: ScopeType;
    activator?: EventNode;
    terminator?: EventNode;
}

export const PATTERN_TYPES = ['existence', 'absence', 'response', 'requirement', 'prevention'] as const;

export type PatternType = typeof PATTERN_TYPES[number];

export interface PatternNode extends NodeBase {
    kind: 'pattern';
    pattern: PatternType;
    behaviour: EventNode;
    trigger?: EventNode;
    minTime: number;
    maxTime: number;
}

export interface PropertyNode extends NodeBase {
    kind: 'property';
    scope: ScopeNode;
    pattern: PatternNode;
    /** Free-form annotations; ignored by structural equality. */
    metadata: PropertyMetadata;
}

export interface SpecificationNode extends NodeBase {
    kind: 'specification';
    properties: PropertyNode[];
}

export type AstNode =
    | Expression
    | PredicateNode
    | EventNode
    | ScopeNode
    | PatternNode
    | PropertyNode
    | SpecificationNode;

export type AstNodeKind = AstNode['kind'];

export type NodeOfKind<K extends AstNodeKind> = Extract<AstNode, { kind: K }>;
