/**
 * AST Core
 *
 * Identity, child enumeration, ownership and in-place replacement for every
 * node kind. Nodes never point back at their parent: ownership lives in a
 * module-level weak map so that a node attached to a new parent can be
 * detached from the old one.
 */

import type {
    AstNode,
    EventNode,
    Expression,
    NodeId,
    PatternNode,
    PredicateNode,
    PropertyNode,
    ScopeNode,
} from '../types/index.js';
import {
    type ConstructionError,
    createConstructionError,
    createImmutableNodeError,
    createNotAChildError,
} from '../types/errors.js';

let nextId = 1;

export function nextNodeId(): NodeId {
    return nextId++;
}

const EXPRESSION_KINDS = new Set<AstNode['kind']>([
    'value', 'not', 'and', 'or', 'compare', 'arith', 'literal',
    'field', 'variable', 'call', 'set', 'range', 'quantifier',
]);

export function isExpression(node: AstNode): node is Expression {
    return EXPRESSION_KINDS.has(node.kind);
}

export function isEvent(node: AstNode): node is EventNode {
    return node.kind === 'event' || node.kind === 'disjunction';
}

export function isPredicate(node: AstNode): node is PredicateNode {
    return node.kind === 'predicate';
}

export function isScope(node: AstNode): node is ScopeNode {
    return node.kind === 'scope';
}

export function isPattern(node: AstNode): node is PatternNode {
    return node.kind === 'pattern';
}

export function isProperty(node: AstNode): node is PropertyNode {
    return node.kind === 'property';
}

// === Child slots ===

/** What removing a child does to its parent. */
type Removal =
    | { kind: 'required' }
    | { kind: 'optional'; clear: () => void }
    | { kind: 'sequence'; list: AstNode[]; minimum: number };

interface ChildSlot {
    readonly node: AstNode;
    readonly removal: Removal;
    accepts(candidate: AstNode): boolean;
    replace(candidate: AstNode): void;
}

function single<C extends AstNode>(
    node: C,
    guard: (candidate: AstNode) => candidate is C,
    assign: (candidate: C) => void,
    clear?: () => void
): ChildSlot {
    return {
        node,
        removal: clear ? { kind: 'optional', clear } : { kind: 'required' },
        accepts: guard,
        replace: (candidate) => {
            if (guard(candidate)) assign(candidate);
        },
    };
}

function sequence<C extends AstNode>(
    list: C[],
    guard: (candidate: AstNode) => candidate is C,
    minimum: number
): ChildSlot[] {
    return list.map((node) => ({
        node,
        removal: { kind: 'sequence', list, minimum },
        accepts: guard,
        replace: (candidate: AstNode) => {
            const index = list.indexOf(node);
            if (index >= 0 && guard(candidate)) list[index] = candidate;
        },
    }));
}

/**
 * Immediate sub-nodes, in grammar order.
 */
export function children(node: AstNode): readonly AstNode[] {
    return childSlots(node).map(slot => slot.node);
}

// === Ownership ===

const owners = new WeakMap<AstNode, AstNode>();

export function ownerOf(node: AstNode): AstNode | undefined {
    return owners.get(node);
}

function assertMutable(node: AstNode): void {
    if (Object.isFrozen(node)) {
        throw createImmutableNodeError(node.id);
    }
}

function isAncestorOf(candidate: AstNode, node: AstNode): boolean {
    for (let current: AstNode | undefined = node; current; current = owners.get(current)) {
        if (current === candidate) return true;
    }
    return false;
}

function requiredChildError(parent: AstNode, child: AstNode): ConstructionError {
    return createConstructionError(
        'NodeAlreadyOwned',
        `Node ${child.id} (${child.kind}) is a required child of node ${parent.id} (${parent.kind})`,
        { parentId: parent.id },
        child.id
    );
}

/**
 * Throw unless every node in `taken` can leave `parent` together.
 */
function checkRelease(parent: AstNode, taken: AstNode[]): void {
    assertMutable(parent);
    const slots = childSlots(parent);
    const removed = new Map<AstNode[], number>();
    for (const child of taken) {
        const slot = slots.find(s => s.node === child);
        // a stale record needs no detaching
        if (!slot) continue;
        const { removal } = slot;
        if (removal.kind === 'required') {
            throw requiredChildError(parent, child);
        }
        if (removal.kind === 'sequence') {
            const count = (removed.get(removal.list) ?? 0) + 1;
            removed.set(removal.list, count);
            if (removal.list.length - count < removal.minimum) {
                throw requiredChildError(parent, child);
            }
        }
    }
}

function release(parent: AstNode, child: AstNode): void {
    const removal = childSlots(parent).find(s => s.node === child)?.removal;
    if (removal?.kind === 'optional') {
        removal.clear();
    } else if (removal?.kind === 'sequence') {
        removal.list.splice(removal.list.indexOf(child), 1);
    }
    owners.delete(child);
}

/**
 * Record `parent` as the owner of every node in `incoming`, detaching each
 * from its previous parent. All checks run before anything moves, so a
 * failure leaves every tree as it was. Previous owners inside `discarded`
 * keep their structure: that subtree is being dropped by the caller.
 */
function adoptAll(parent: AstNode, incoming: readonly AstNode[], discarded?: AstNode): void {
    const seen = new Set<AstNode>();
    const leaving = new Map<AstNode, AstNode[]>();
    for (const child of incoming) {
        if (isAncestorOf(child, parent)) {
            throw createConstructionError(
                'CyclicComposition',
                `Node ${child.id} cannot become a descendant of itself`,
                { parentId: parent.id },
                child.id
            );
        }
        const previous = owners.get(child);
        if (seen.has(child) || previous === parent) {
            throw createConstructionError(
                'NodeAlreadyOwned',
                `Node ${child.id} appears more than once under node ${parent.id}`,
                { parentId: parent.id },
                child.id
            );
        }
        seen.add(child);
        if (previous && !(discarded && isAncestorOf(discarded, previous))) {
            leaving.set(previous, [...(leaving.get(previous) ?? []), child]);
        }
    }

    for (const [previous, taken] of leaving) {
        checkRelease(previous, taken);
    }
    for (const [previous, taken] of leaving) {
        for (const child of taken) release(previous, child);
    }
    for (const child of incoming) {
        owners.set(child, parent);
    }
}

/**
 * Adopt every child of a freshly built node.
 */
export function attach<T extends AstNode>(parent: T): T {
    adoptAll(parent, children(parent));
    return parent;
}

/**
 * Forget the owner of a node whose parent is being discarded.
 */
export function disown<C extends AstNode>(node: C): C {
    owners.delete(node);
    return node;
}

/**
 * Replace the immediate child `oldId` of `parent` with `replacement`.
 * The replacement is moved out of its previous parent; the old child
 * becomes a detached root. The replacement may come from inside the old
 * child, as when a negation is replaced by its operand.
 */
export function replaceChild(parent: AstNode, oldId: NodeId, replacement: AstNode): void {
    assertMutable(parent);
    const slot = childSlots(parent).find(s => s.node.id === oldId);
    if (!slot) {
        throw createNotAChildError(parent.id, oldId);
    }
    if (slot.node === replacement) return;
    if (!slot.accepts(replacement)) {
        throw createConstructionError(
            'InvalidChildKind',
            `A ${replacement.kind} node cannot replace the ${slot.node.kind} child of a ${parent.kind} node`,
            { parentId: parent.id, expected: slot.node.kind, actual: replacement.kind },
            replacement.id
        );
    }
    adoptAll(parent, [replacement], slot.node);
    slot.replace(replacement);
    owners.delete(slot.node);
}

// === Immutability ===

/**
 * Deep-freeze a tree. Frozen nodes reject replaceChild and cannot give up children.
 */
export function freezeTree(root: AstNode): void {
    const stack: AstNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node || Object.isFrozen(node)) continue;
        stack.push(...children(node));
        switch (node.kind) {
            case 'and':
            case 'or':
                Object.freeze(node.operands);
                break;
            case 'call':
                Object.freeze(node.args);
                break;
            case 'set':
                Object.freeze(node.values);
                break;
            case 'field':
                Object.freeze(node.path);
                break;
            case 'disjunction':
                Object.freeze(node.events);
                break;
            case 'property':
                Object.freeze(node.metadata);
                break;
            case 'specification':
                Object.freeze(node.properties);
                break;
        }
        Object.freeze(node);
    }
}

export function isFrozenTree(node: AstNode): boolean {
    return Object.isFrozen(node);
}
