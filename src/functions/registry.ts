import type { Diagnostic, Expression, FunctionCallNode } from '../types/index.js';
import { HplException, createRegistryFrozenError } from '../types/errors.js';
import { createDiagnostic } from '../types/diagnostics.js';
import {
    T_BOOL,
    T_COMP,
    T_MSG,
    T_NUM,
    T_PRIM,
    T_STR,
    canBe,
    typeName,
    type TypeMask,
} from '../types/valueTypes.js';

export interface Overload {
    params: TypeMask[];
    /** The last parameter may repeat. */
    variadic: boolean;
}

export interface FunctionSignature {
    name: string;
    returns: TypeMask;
    overloads: Overload[];
}

const FUNCTION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Named functions that predicates may call.
 *
 * A registry is frozen the first time a validator uses it, so every
 * validation in a process sees the same set of functions.
 */
export class FunctionRegistry {
    private functions: Map<string, FunctionSignature> = new Map();
    private frozen = false;

    register(signature: FunctionSignature): void {
        if (this.frozen) {
            throw createRegistryFrozenError(signature.name);
        }
        if (!FUNCTION_NAME.test(signature.name)) {
            throw new HplException({
                code: 'InvalidName',
                message: `Function name '${signature.name}' is not a valid identifier`,
                details: { function: signature.name },
            });
        }
        if (this.functions.has(signature.name)) {
            throw new HplException({
                code: 'DuplicateFunction',
                message: `Function '${signature.name}' is already registered`,
                details: { function: signature.name },
            });
        }
        if (signature.overloads.length === 0) {
            throw new HplException({
                code: 'InvalidOptions',
                message: `Function '${signature.name}' needs at least one parameter list`,
                details: { function: signature.name },
            });
        }
        this.functions.set(signature.name, {
            name: signature.name,
            returns: signature.returns,
            overloads: signature.overloads.map(o => ({ params: [...o.params], variadic: o.variadic })),
        });
    }

    freeze(): void {
        this.frozen = true;
    }

    isFrozen(): boolean {
        return this.frozen;
    }

    lookup(name: string): FunctionSignature | undefined {
        return this.functions.get(name);
    }

    has(name: string): boolean {
        return this.functions.has(name);
    }

    names(): string[] {
        return Array.from(this.functions.keys()).sort();
    }
}

function fixed(...params: TypeMask[]): Overload {
    return { params, variadic: false };
}

function repeating(...params: TypeMask[]): Overload {
    return { params, variadic: true };
}

const UNARY_NUMERIC = ['abs', 'sqrt', 'ceil', 'floor', 'sin', 'cos', 'tan', 'asin', 'acos', 'atan', 'deg', 'rad'];

/**
 * Register the builtin function set on `registry`.
 */
export function registerBuiltins(registry: FunctionRegistry): FunctionRegistry {
    for (const name of UNARY_NUMERIC) {
        registry.register({ name, returns: T_NUM, overloads: [fixed(T_NUM)] });
    }
    registry.register({ name: 'bool', returns: T_BOOL, overloads: [fixed(T_PRIM)] });
    registry.register({ name: 'int', returns: T_NUM, overloads: [fixed(T_PRIM)] });
    registry.register({ name: 'float', returns: T_NUM, overloads: [fixed(T_PRIM)] });
    registry.register({ name: 'str', returns: T_STR, overloads: [fixed(T_PRIM)] });
    for (const name of ['len', 'sum', 'prod']) {
        registry.register({ name, returns: T_NUM, overloads: [fixed(T_COMP)] });
    }
    registry.register({ name: 'log', returns: T_NUM, overloads: [fixed(T_NUM, T_NUM)] });
    registry.register({ name: 'atan2', returns: T_NUM, overloads: [fixed(T_NUM, T_NUM)] });
    for (const name of ['x', 'y', 'z']) {
        registry.register({ name, returns: T_NUM, overloads: [fixed(T_MSG)] });
    }
    for (const name of ['max', 'min', 'gcd']) {
        registry.register({ name, returns: T_NUM, overloads: [fixed(T_COMP), repeating(T_NUM, T_NUM)] });
    }
    for (const name of ['roll', 'pitch', 'yaw']) {
        registry.register({ name, returns: T_NUM, overloads: [fixed(T_MSG), fixed(T_NUM, T_NUM, T_NUM, T_NUM)] });
    }
    return registry;
}

export function createFunctionRegistry(withBuiltins = true): FunctionRegistry {
    const registry = new FunctionRegistry();
    return withBuiltins ? registerBuiltins(registry) : registry;
}

/** Process-wide registry used when a validator is not given one. */
export const builtinFunctions = createFunctionRegistry();

function acceptsArity(overload: Overload, arity: number): boolean {
    return overload.variadic ? arity >= overload.params.length : arity === overload.params.length;
}

function paramAt(overload: Overload, position: number): TypeMask {
    return overload.params[Math.min(position, overload.params.length - 1)];
}

export function formatOverload(overload: Overload): string {
    const params = overload.params.map(typeName).join(', ');
    return `(${params}${overload.variadic ? '*' : ''})`;
}

/**
 * Check a call against the registry. Each argument type comes from `typeOf`.
 */
export function typecheckCall(
    call: FunctionCallNode,
    registry: FunctionRegistry,
    typeOf: (arg: Expression) => TypeMask
): Diagnostic[] {
    const signature = registry.lookup(call.name);
    if (!signature) {
        return [createDiagnostic(
            'UnknownFunction',
            call.id,
            `Unknown function '${call.name}'`,
            { function: call.name }
        )];
    }

    const arity = call.args.length;
    const candidates = signature.overloads.filter(o => acceptsArity(o, arity));
    if (candidates.length === 0) {
        const expected = signature.overloads.map(formatOverload).join(' or ');
        return [createDiagnostic(
            'FunctionArityMismatch',
            call.id,
            `Function '${call.name}' expects ${expected}, but got ${arity} argument${arity === 1 ? '' : 's'}`,
            { function: call.name, expected, actual: String(arity) }
        )];
    }

    const argTypes = call.args.map(typeOf);
    const fits = (overload: Overload) =>
        argTypes.every((actual, position) => canBe(actual, paramAt(overload, position)));
    if (candidates.some(fits)) {
        return [];
    }

    // report against the first overload of the right arity
    const overload = candidates[0];
    const diagnostics: Diagnostic[] = [];
    argTypes.forEach((actual, position) => {
        const expected = paramAt(overload, position);
        if (!canBe(actual, expected)) {
            diagnostics.push(createDiagnostic(
                'FunctionArgTypeMismatch',
                call.args[position].id,
                `Argument ${position + 1} of '${call.name}' must be ${typeName(expected)}, got ${typeName(actual)}`,
                {
                    function: call.name,
                    position,
                    expected: typeName(expected),
                    actual: typeName(actual),
                }
            ));
        }
    });
    return diagnostics;
}
