import {
    createAnd,
    createArithmetic,
    createCall,
    createComparison,
    createEvent,
    createFieldAccess,
    createLiteral,
    createNot,
    createRange,
    createSet,
    createVariable,
} from '../src/ast/factory.js';
import {
    externalReferences,
    readsOwnMessage,
    referencedAliases,
    references,
} from '../src/predicate/references.js';
import { checkOperandTypes, elementType, inferType, type TypingEnvironment } from '../src/predicate/typing.js';
import {
    formatFieldPath,
    resolveFieldAccess,
    resolveFieldPath,
    untypedFieldMask,
} from '../src/predicate/fields.js';
import { createFunctionRegistry } from '../src/functions/registry.js';
import type { ChannelSchemas, Expression, MessageType } from '../src/types/index.js';
import {
    T_ANY,
    T_ARR,
    T_BOOL,
    T_FIELD,
    T_ITEM,
    T_MSG,
    T_NUM,
    T_RAN,
    T_SET,
    T_STR,
} from '../src/types/valueTypes.js';

const registry = createFunctionRegistry();

const env: TypingEnvironment = {
    fieldType: (field) => untypedFieldMask(field.path),
    variableType: () => undefined,
    functionType: (name) => registry.lookup(name)?.returns,
};

const typeOf = (node: Expression) => inferType(node, env);

describe('Alias references', () => {
    const predicate = () => createAnd([
        createComparison('>', createFieldAccess('x', 'a'), createLiteral(1)),
        createComparison('=', createFieldAccess(null, 'b'), createFieldAccess('y', 'c')),
    ]);

    test('referencedAliases collects every alias read', () => {
        expect([...referencedAliases(predicate())].sort()).toEqual(['x', 'y']);
    });

    test('references tests one alias', () => {
        const p = predicate();
        expect(references(p, 'x')).toBe(true);
        expect(references(p, 'z')).toBe(false);
    });

    test('reads of the event alias are own reads', () => {
        const event = createEvent('topic', { alias: 'y', predicate: predicate() });
        expect([...externalReferences(event)]).toEqual(['x']);
        expect(readsOwnMessage(event)).toBe(true);
    });

    test('an event that reads only other messages does not read its own', () => {
        const event = createEvent('topic', {
            alias: 'm',
            predicate: createComparison('>', createFieldAccess('x', 'a'), createLiteral(1)),
        });
        expect(readsOwnMessage(event)).toBe(false);

        const aliased = createEvent('topic', {
            alias: 'm',
            predicate: createComparison('>', createFieldAccess('m', 'a'), createLiteral(1)),
        });
        expect(readsOwnMessage(aliased)).toBe(true);
    });
});

describe('Expression typing', () => {
    test('infers the type of each expression kind', () => {
        expect(typeOf(createLiteral(1))).toBe(T_NUM);
        expect(typeOf(createLiteral('a'))).toBe(T_STR);
        expect(typeOf(createLiteral(true))).toBe(T_BOOL);
        expect(typeOf(createComparison('<', createLiteral(1), createLiteral(2)))).toBe(T_BOOL);
        expect(typeOf(createArithmetic('+', createLiteral(1), createLiteral(2)))).toBe(T_NUM);
        expect(typeOf(createFieldAccess(null, 'a'))).toBe(T_FIELD);
        expect(typeOf(createFieldAccess('m', ''))).toBe(T_MSG);
        expect(typeOf(createFieldAccess(null, 'a[0]'))).toBe(T_ITEM);
        expect(typeOf(createCall('abs', [createLiteral(1)]))).toBe(T_NUM);
        expect(typeOf(createCall('mystery'))).toBe(T_ANY);
        expect(typeOf(createSet([]))).toBe(T_SET);
        expect(typeOf(createRange(createLiteral(0), createLiteral(1)))).toBe(T_RAN);
        expect(typeOf(createVariable('i'))).toBe(T_ITEM);
    });

    test('ordering comparisons need numbers', () => {
        const left = createLiteral('a');
        const issues = checkOperandTypes(createComparison('<', left, createLiteral(1)), typeOf);
        expect(issues).toEqual([{ node: left, expected: T_NUM, actual: T_STR }]);
    });

    test('equality needs compatible operands', () => {
        const right = createLiteral(1);
        const issues = checkOperandTypes(createComparison('=', createLiteral('a'), right), typeOf);
        expect(issues).toEqual([{ node: right, expected: T_STR, actual: T_NUM }]);
        expect(checkOperandTypes(createComparison('=', createFieldAccess(null, 'a'), createLiteral(1)), typeOf))
            .toEqual([]);
    });

    test('membership needs a collection on the right', () => {
        expect(checkOperandTypes(
            createComparison('in', createLiteral(1), createSet([createLiteral(1), createLiteral(2)])),
            typeOf
        )).toEqual([]);
        const right = createLiteral(2);
        expect(checkOperandTypes(createComparison('in', createLiteral(1), right), typeOf))
            .toEqual([{ node: right, expected: T_SET | T_RAN | T_ARR, actual: T_NUM }]);
    });

    test('arithmetic and negation check their operands', () => {
        const text = createLiteral('a');
        expect(checkOperandTypes(createArithmetic('+', text, createLiteral(1)), typeOf))
            .toEqual([{ node: text, expected: T_NUM, actual: T_STR }]);
        const number = createLiteral(1);
        expect(checkOperandTypes(createNot(number), typeOf))
            .toEqual([{ node: number, expected: T_BOOL, actual: T_NUM }]);
    });

    test('quantifier items take the type of the domain', () => {
        expect(elementType(createRange(createLiteral(0), createLiteral(3)), env)).toBe(T_NUM);
        expect(elementType(createSet([createLiteral('a'), createLiteral(1)]), env)).toBe(T_STR | T_NUM);
        expect(elementType(createFieldAccess(null, 'list'), env)).toBe(T_ITEM);
    });
});

describe('Field resolution', () => {
    const odometry: MessageType = {
        fields: {
            pose: {
                fields: {
                    x: 'number',
                    covariance: { array: 'number', length: 4 },
                },
            },
            name: 'string',
            tags: { array: 'string' },
        },
    };

    test('formats paths', () => {
        expect(formatFieldPath(['pose', 'covariance', 3, 'x'])).toBe('pose.covariance[3].x');
    });

    test('walks nested messages and arrays', () => {
        expect(resolveFieldPath(odometry, ['pose', 'x'])).toEqual({ ok: true, type: 'number' });
        expect(resolveFieldPath(odometry, ['pose', 'covariance', 3])).toEqual({ ok: true, type: 'number' });
        expect(resolveFieldPath(odometry, ['tags', 100])).toEqual({ ok: true, type: 'string' });
    });

    test('reports unknown fields', () => {
        expect(resolveFieldPath(odometry, ['missing'])).toEqual({
            ok: false,
            code: 'UnknownField',
            message: "Message has no field 'missing'",
        });
        expect(resolveFieldPath(odometry, ['pose', 'z'])).toEqual({
            ok: false,
            code: 'UnknownField',
            message: "'pose' has no field 'z'",
        });
        expect(resolveFieldPath(odometry, ['toString'])).toMatchObject({ ok: false, code: 'UnknownField' });
    });

    test('reports invalid accesses', () => {
        expect(resolveFieldPath(odometry, ['pose', 'covariance', 4])).toEqual({
            ok: false,
            code: 'InvalidFieldAccess',
            message: "Index 4 is out of bounds for 'pose.covariance' of length 4",
        });
        expect(resolveFieldPath(odometry, ['name', 0])).toEqual({
            ok: false,
            code: 'InvalidFieldAccess',
            message: "'name' is not an array and cannot be indexed",
        });
        expect(resolveFieldPath(odometry, ['name', 'first'])).toEqual({
            ok: false,
            code: 'InvalidFieldAccess',
            message: "'name' is not a message and has no field 'first'",
        });
    });

    test('resolves a field access against the channel schema', () => {
        const schemas: ChannelSchemas = { odom: odometry };
        expect(resolveFieldAccess(createFieldAccess(null, 'pose.x'), ['odom'], schemas))
            .toEqual({ mask: T_NUM, problems: [] });
        expect(resolveFieldAccess(createFieldAccess(null, 'pose.x'), ['odom']))
            .toEqual({ mask: T_FIELD, problems: [] });
    });

    test('an alias shared across channels needs one field type', () => {
        const schemas: ChannelSchemas = {
            a: { fields: { v: 'number' } },
            b: { fields: { v: 'string' } },
            c: { fields: { v: 'number' } },
        };
        const field = createFieldAccess('m', 'v');
        expect(resolveFieldAccess(field, ['a', 'b'], schemas)).toEqual({
            mask: T_ANY,
            problems: [{
                code: 'InconsistentAlias',
                message: "Field 'v' has incompatible types across channels: number on 'a', string on 'b'",
                field: 'v',
            }],
        });
        expect(resolveFieldAccess(field, ['a', 'c'], schemas)).toEqual({ mask: T_NUM, problems: [] });
        expect(resolveFieldAccess(field, ['a', 'undeclared'], schemas)).toEqual({ mask: T_NUM, problems: [] });
    });
});
