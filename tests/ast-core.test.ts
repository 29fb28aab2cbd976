import {
    createAfterScope,
    createAnd,
    createComparison,
    createDisjunction,
    createEvent,
    createFieldAccess,
    createLiteral,
    createNot,
    createOr,
    createPredicate,
    createProperty,
    createResponse,
} from '../src/ast/factory.js';
import { children, freezeTree, isFrozenTree, ownerOf, replaceChild } from '../src/ast/node.js';
import { duplicate } from '../src/ast/duplicate.js';
import { structurallyEqual } from '../src/ast/equality.js';
import { countNodes, findAll, iterate, traverse } from '../src/ast/visitor.js';
import { astToString } from '../src/ast/printer.js';
import type { AstNode, PropertyNode } from '../src/types/index.js';
import { leaf, thrownCode } from './fixtures.js';

function sampleProperty(): PropertyNode {
    return createProperty(
        createAfterScope(createEvent('start', { alias: 's' })),
        createResponse(
            createEvent('cmd', {
                alias: 'c',
                predicate: createComparison('>', createFieldAccess(null, 'speed'), createLiteral(0)),
            }),
            createDisjunction([
                createEvent('ack', {
                    predicate: createComparison('=', createFieldAccess(null, 'id'), createFieldAccess('c', 'id')),
                }),
                createEvent('nack'),
            ]),
            { maxTime: 2 }
        ),
        { name: 'cmd-ack' }
    );
}

const SAMPLE_TEXT = 'after start as s: cmd as c { speed > 0 } causes (ack { id = @c.id } or nack) within 2s';

function ids(root: AstNode): number[] {
    return [...iterate(root)].map(n => n.id);
}

describe('AST Core', () => {
    describe('duplicate', () => {
        test('is structurally equal with fresh identities', () => {
            const original = sampleProperty();
            const copy = duplicate(original);
            expect(structurallyEqual(copy, original)).toBe(true);
            expect(astToString(copy)).toBe(SAMPLE_TEXT);
            const originalIds = new Set(ids(original));
            expect(ids(copy).some(id => originalIds.has(id))).toBe(false);
        });

        test('mutating the copy never changes the original', () => {
            const original = sampleProperty();
            const copy = duplicate(original);
            replaceChild(copy.pattern, copy.pattern.behaviour.id, createEvent('other'));
            copy.metadata.name = 'changed';
            const field = findAll(copy, 'field')[0];
            field.path.push('nested');

            expect(astToString(original)).toBe(SAMPLE_TEXT);
            expect(original.metadata).toEqual({ name: 'cmd-ack' });
            expect(astToString(copy)).toBe('after start as s: cmd as c { speed.nested > 0 } causes other within 2s');
        });

        test('copies are owned by their own parents', () => {
            const original = sampleProperty();
            const copy = duplicate(original);
            expect(ownerOf(copy.pattern)).toBe(copy);
            expect(ownerOf(copy)).toBeUndefined();
        });

        test('nested metadata is copied, not shared', () => {
            const original = createProperty(
                createAfterScope(createEvent('start')),
                createResponse(createEvent('a'), createEvent('b')),
                { tags: ['safety'], source: { line: 3, file: null } }
            );
            const copy = duplicate(original);
            expect(copy.metadata).toEqual({ tags: ['safety'], source: { line: 3, file: null } });
            expect(copy.metadata.tags).not.toBe(original.metadata.tags);
        });

        test('metadata that is not JSON is rejected when the property is built', () => {
            const scope = createAfterScope(createEvent('start'));
            const pattern = createResponse(createEvent('a'), createEvent('b'));
            expect(thrownCode(() => createProperty(scope, pattern, { hook: () => 1 }))).toBe('InvalidMetadata');
            expect(ownerOf(scope)).toBeUndefined();
            expect(ownerOf(pattern)).toBeUndefined();
        });
    });

    describe('structural equality', () => {
        test('ignores identity and metadata', () => {
            const a = sampleProperty();
            const b = sampleProperty();
            b.metadata.name = 'something else';
            expect(structurallyEqual(a, b)).toBe(true);
        });

        test('is order-sensitive', () => {
            const a = createAnd([leaf('p0'), leaf('p1')]);
            const b = createAnd([leaf('p1'), leaf('p0')]);
            expect(structurallyEqual(a, b)).toBe(false);
        });

        test('compares attributes', () => {
            expect(structurallyEqual(createEvent('a', { alias: 'x' }), createEvent('a', { alias: 'y' }))).toBe(false);
            expect(structurallyEqual(createEvent('a'), createEvent('b'))).toBe(false);
            expect(structurallyEqual(
                createComparison('<', createLiteral(1), createLiteral(2)),
                createComparison('<=', createLiteral(1), createLiteral(2))
            )).toBe(false);
            expect(structurallyEqual(createAnd([leaf('p0')]), createOr([leaf('p0')]))).toBe(false);
        });
    });

    describe('children', () => {
        test('lists immediate sub-nodes in grammar order', () => {
            const property = sampleProperty();
            const pattern = property.pattern;
            expect(children(property)).toEqual([property.scope, pattern]);
            expect(children(pattern)).toEqual([pattern.trigger, pattern.behaviour]);
            expect(children(createEvent('bare'))).toEqual([]);
        });
    });

    describe('replaceChild', () => {
        test('swaps the child and detaches the old one', () => {
            const not = createNot(leaf('p0'));
            const old = not.operand;
            const replacement = leaf('p1');
            replaceChild(not, old.id, replacement);
            expect(not.operand).toBe(replacement);
            expect(ownerOf(replacement)).toBe(not);
            expect(ownerOf(old)).toBeUndefined();
        });

        test('fails with NotAChild for a node that is not an immediate child', () => {
            const and = createAnd([createNot(leaf('p0'))]);
            const grandchild = findAll(and, 'compare')[0];
            expect(thrownCode(() => replaceChild(and, grandchild.id, leaf('p1')))).toBe('NotAChild');
            expect(thrownCode(() => replaceChild(and, -1, leaf('p1')))).toBe('NotAChild');
        });

        test('rejects a node of the wrong family', () => {
            const compare = createComparison('>', createFieldAccess(null, 'x'), createLiteral(1));
            expect(thrownCode(() => replaceChild(compare, compare.left.id, createEvent('x')))).toBe('InvalidChildKind');
        });

        test('rejects a cycle', () => {
            const inner = createNot(leaf('p0'));
            const outer = createNot(inner);
            expect(thrownCode(() => replaceChild(inner, inner.operand.id, outer))).toBe('CyclicComposition');
        });
    });

    describe('ownership', () => {
        test('a child attached to a new parent leaves its old parent', () => {
            const p = leaf('p0');
            const first = createAnd([p, leaf('p1')]);
            const second = createOr([p]);
            expect(first.operands).toHaveLength(1);
            expect(second.operands[0]).toBe(p);
            expect(ownerOf(p)).toBe(second);
        });

        test('an optional predicate moves between events', () => {
            const predicate = createPredicate(leaf('p0'));
            const from = createEvent('a', { predicate });
            const to = createEvent('b', { predicate });
            expect(from.predicate).toBeUndefined();
            expect(to.predicate).toBe(predicate);
        });

        test('a required child cannot be taken away', () => {
            const literal = createLiteral(1);
            const compare = createComparison('>', createFieldAccess(null, 'x'), literal);
            expect(thrownCode(() => createNot(literal))).toBe('NodeAlreadyOwned');
            expect(ownerOf(literal)).toBe(compare);
        });

        test('a node can replace the subtree it belongs to', () => {
            const compare = leaf('p0');
            const negation = createNot(compare);
            const predicate = createPredicate(negation);
            replaceChild(predicate, negation.id, compare);
            expect(predicate.condition).toBe(compare);
            expect(ownerOf(compare)).toBe(predicate);
            expect(ownerOf(negation)).toBeUndefined();
        });

        test('a failed builder leaves every old parent unchanged', () => {
            const a = leaf('p0');
            const p1 = leaf('p1');
            const old = createOr([a, p1]);
            const b = leaf('p2');
            const negation = createNot(b);

            expect(thrownCode(() => createAnd([a, b]))).toBe('NodeAlreadyOwned');
            expect(old.operands).toHaveLength(2);
            expect(old.operands[0]).toBe(a);
            expect(ownerOf(a)).toBe(old);
            expect(negation.operand).toBe(b);
            expect(ownerOf(b)).toBe(negation);
        });

        test('one builder cannot empty a list below its minimum', () => {
            const a = leaf('p0');
            const b = leaf('p1');
            const old = createOr([a, b]);
            expect(thrownCode(() => createAnd([a, b]))).toBe('NodeAlreadyOwned');
            expect(old.operands).toHaveLength(2);
            expect(ownerOf(b)).toBe(old);
        });

        test('no node stores a reference to its parent', () => {
            const property = sampleProperty();
            traverse(property, (node) => {
                for (const value of Object.values(node)) {
                    expect(value).not.toBe(property);
                }
            });
        });
    });

    describe('freezing', () => {
        test('a frozen tree rejects mutation', () => {
            const property = sampleProperty();
            freezeTree(property);
            expect(isFrozenTree(property.pattern.behaviour)).toBe(true);
            expect(thrownCode(() => replaceChild(property.pattern, property.pattern.behaviour.id, createEvent('x'))))
                .toBe('ImmutableNode');
            const field = findAll(property, 'field')[0];
            expect(thrownCode(() => createNot(createComparison('=', field, createLiteral(1))))).toBe('ImmutableNode');
        });

        test('a duplicate of a frozen tree is mutable', () => {
            const property = sampleProperty();
            freezeTree(property);
            const copy = duplicate(property);
            expect(isFrozenTree(copy)).toBe(false);
            replaceChild(copy.pattern, copy.pattern.behaviour.id, createEvent('x'));
            expect(astToString(copy)).toBe('after start as s: cmd as c { speed > 0 } causes x within 2s');
        });
    });

    describe('traversal', () => {
        test('findAll visits in pre-order', () => {
            expect(findAll(sampleProperty(), 'event').map(e => e.channel)).toEqual(['start', 'cmd', 'ack', 'nack']);
        });

        test('iterate agrees with traverse', () => {
            const property = sampleProperty();
            const visited: number[] = [];
            traverse(property, (node) => { visited.push(node.id); });
            expect(ids(property)).toEqual(visited);
            expect(countNodes(property)).toBe(16);
        });
    });
});
