/**
 * Shared test fixtures: deterministic pseudo-random expressions and
 * truth assignments over their leaves.
 */
import {
    createAnd,
    createComparison,
    createFieldAccess,
    createLiteral,
    createNot,
    createOr,
    createValue,
} from '../src/ast/factory.js';
import { astToString } from '../src/ast/printer.js';
import type { LeafAssignment } from '../src/logic/engine.js';
import { HplException, type Expression } from '../src/types/index.js';

// === Random trees ===

/** Small seeded generator (mulberry32) so failures are reproducible. */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export const LEAF_NAMES = ['p0', 'p1', 'p2', 'p3'];

/** Comparison leaf `(name > 0)` on the own message. */
export function leaf(name: string): Expression {
    return createComparison('>', createFieldAccess(null, name), createLiteral(0));
}

export function randomExpression(random: () => number, depth: number): Expression {
    const r = random();
    if (depth <= 0 || r < 0.25) {
        if (random() < 0.2) {
            const v = random();
            return createValue(v < 0.4 ? true : v < 0.8 ? false : null);
        }
        return leaf(LEAF_NAMES[Math.floor(random() * LEAF_NAMES.length)]);
    }
    if (r < 0.45) {
        return createNot(randomExpression(random, depth - 1));
    }
    const count = 1 + Math.floor(random() * 3);
    const operands = Array.from({ length: count }, () => randomExpression(random, depth - 1));
    return r < 0.725 ? createAnd(operands) : createOr(operands);
}

export function randomExpressions(seed: number, count: number, depth = 4): Expression[] {
    const random = seededRandom(seed);
    return Array.from({ length: count }, () => randomExpression(random, depth));
}

// === Assignments ===

/** Every truth assignment of LEAF_NAMES, keyed by the printed leaf. */
export function allAssignments(): Map<string, boolean>[] {
    const result: Map<string, boolean>[] = [];
    for (let mask = 0; mask < 2 ** LEAF_NAMES.length; mask++) {
        const values = new Map<string, boolean>();
        LEAF_NAMES.forEach((name, i) => {
            values.set(`(${name} > 0)`, (mask & (1 << i)) !== 0);
        });
        result.push(values);
    }
    return result;
}

export function assignmentOf(values: Map<string, boolean>): LeafAssignment {
    return (node) => values.get(astToString(node)) ?? null;
}

// === Errors ===

/** Code of the HplException thrown by `fn`, or undefined when nothing is thrown. */
export function thrownCode(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof HplException ? error.code : `unexpected: ${String(error)}`;
    }
    return undefined;
}
