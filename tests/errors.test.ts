/**
 * Tests for structured error system
 */

import {
    type HplError,
    HplException,
    ConstructionError,
    createConstructionError,
    createNotAChildError,
    createImmutableNodeError,
    createRegistryFrozenError,
    createInvalidOptionsError,
    serializeHplError,
} from '../src/types/errors.js';

describe('HplException', () => {
    test('creates exception with error object', () => {
        const error: HplError = {
            code: 'InvalidName',
            message: "Alias '1x' is not a valid identifier",
            suggestion: 'Use letters, digits and underscores',
            details: { name: '1x' },
        };

        const exception = new HplException(error);

        expect(exception.name).toBe('HplException');
        expect(exception.message).toBe("Alias '1x' is not a valid identifier");
        expect(exception.code).toBe('InvalidName');
        expect(exception.error).toEqual(error);
    });

    test('toJSON returns error object', () => {
        const error: HplError = {
            code: 'NotAChild',
            message: 'Node 3 is not a child of node 1',
        };

        const exception = new HplException(error);
        expect(exception.toJSON()).toEqual(error);
    });
});

describe('ConstructionError', () => {
    test('is an HplException', () => {
        const error = createConstructionError('EmptyName', 'Event channel must not be empty');
        expect(error).toBeInstanceOf(ConstructionError);
        expect(error).toBeInstanceOf(HplException);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ConstructionError');
    });

    test('carries the default suggestion for its code', () => {
        const error = createConstructionError('InvalidDisjunctionArity', 'too few events', { arity: 1 }, 7);
        expect(error.error).toEqual({
            code: 'InvalidDisjunctionArity',
            message: 'too few events',
            suggestion: 'Use the single event directly instead of a disjunction',
            nodeId: 7,
            details: { arity: 1 },
        });
    });
});

describe('Error factories', () => {
    test('createNotAChildError names both nodes', () => {
        const error = createNotAChildError(1, 42);
        expect(error.code).toBe('NotAChild');
        expect(error.message).toBe('Node 42 is not a child of node 1');
        expect(error.error.nodeId).toBe(1);
        expect(error.error.details).toEqual({ childId: 42 });
    });

    test('createImmutableNodeError suggests duplicating', () => {
        const error = createImmutableNodeError(5);
        expect(error.code).toBe('ImmutableNode');
        expect(error.error.suggestion).toBe('Duplicate the accepted property and modify the copy');
    });

    test('createRegistryFrozenError names the function', () => {
        const error = createRegistryFrozenError('clamp');
        expect(error.message).toBe("Cannot register function 'clamp': the registry is frozen");
        expect(error.error.details).toEqual({ function: 'clamp' });
    });

    test('createInvalidOptionsError lists the issues', () => {
        const error = createInvalidOptionsError('validator options', ['a: bad', 'b: worse']);
        expect(error.code).toBe('InvalidOptions');
        expect(error.message).toBe('Invalid validator options: a: bad; b: worse');
    });
});

describe('serializeHplError', () => {
    test('serializes minimal error', () => {
        const error: HplError = { code: 'InvalidTiming', message: 'Invalid time window [1, 0]' };
        expect(serializeHplError(error)).toEqual({
            code: 'InvalidTiming',
            message: 'Invalid time window [1, 0]',
        });
    });

    test('serializes full error', () => {
        const error: HplError = {
            code: 'NodeAlreadyOwned',
            message: 'Node 4 is a required child of node 2',
            suggestion: 'Duplicate the node',
            nodeId: 0,
            details: { parentId: 2 },
        };
        expect(serializeHplError(error)).toEqual(error);
    });
});
