import type { AstNode, Expression, PatternNode, ScopeNode } from '../types/index.js';
import { formatFieldPath } from '../predicate/fields.js';

/**
 * Pretty-print an AST in the property language's concrete syntax
 */
export function astToString(node: AstNode): string {
    switch (node.kind) {
        case 'value':
            return node.value === null ? 'unknown' : node.value ? 'True' : 'False';
        case 'not':
            return `(not ${astToString(node.operand)})`;
        case 'and':
            return node.operands.length === 1
                ? astToString(node.operands[0])
                : `(${node.operands.map(astToString).join(' and ')})`;
        case 'or':
            return node.operands.length === 1
                ? astToString(node.operands[0])
                : `(${node.operands.map(astToString).join(' or ')})`;
        case 'compare':
        case 'arith':
            return `(${astToString(node.left)} ${node.operator} ${astToString(node.right)})`;
        case 'literal':
            if (typeof node.value === 'string') return JSON.stringify(node.value);
            if (typeof node.value === 'boolean') return node.value ? 'True' : 'False';
            return String(node.value);
        case 'field': {
            const path = formatFieldPath(node.path);
            if (node.alias === null) return path;
            return path.length > 0 ? `@${node.alias}.${path}` : `@${node.alias}`;
        }
        case 'variable':
            return `@${node.name}`;
        case 'call':
            return `${node.name}(${node.args.map(astToString).join(', ')})`;
        case 'set':
            return `{${node.values.map(astToString).join(', ')}}`;
        case 'range': {
            const open = node.excludeMin ? '![' : '[';
            const close = node.excludeMax ? ']!' : ']';
            return `${open}${astToString(node.min)} to ${astToString(node.max)}${close}`;
        }
        case 'quantifier':
            return `(${node.quantifier} ${node.variable} in ${astToString(node.domain)}: ${astToString(node.condition)})`;
        case 'predicate':
            return `{ ${conditionToString(node.condition)} }`;
        case 'event': {
            const alias = node.alias !== null ? ` as ${node.alias}` : '';
            const predicate = node.predicate ? ` ${astToString(node.predicate)}` : '';
            return `${node.channel}${alias}${predicate}`;
        }
        case 'disjunction':
            return `(${node.events.map(astToString).join(' or ')})`;
        case 'scope':
            return scopeToString(node);
        case 'pattern':
            return patternToString(node);
        case 'property':
            return `${scopeToString(node.scope)}: ${patternToString(node.pattern)}`;
        case 'specification':
            return node.properties.map(astToString).join('\n');
    }
}

// Outer parentheses of a predicate body are implied by the braces
function conditionToString(condition: Expression): string {
    const text = astToString(condition);
    const wrapped = condition.kind === 'compare' || condition.kind === 'arith'
        || ((condition.kind === 'and' || condition.kind === 'or') && condition.operands.length > 1);
    return wrapped ? text.slice(1, -1) : text;
}

function scopeToString(scope: ScopeNode): string {
    const activator = scope.activator ? astToString(scope.activator) : '?';
    const terminator = scope.terminator ? astToString(scope.terminator) : '?';
    switch (scope.scope) {
        case 'global':
            return 'globally';
        case 'after':
            return `after ${activator}`;
        case 'until':
            return `until ${terminator}`;
        case 'after-until':
            return `after ${activator} until ${terminator}`;
    }
}

function patternToString(pattern: PatternNode): string {
    const behaviour = astToString(pattern.behaviour);
    const trigger = pattern.trigger ? astToString(pattern.trigger) : '?';
    const within = pattern.maxTime < Infinity ? ` within ${pattern.maxTime}s` : '';
    switch (pattern.pattern) {
        case 'existence':
            return `some ${behaviour}${within}`;
        case 'absence':
            return `no ${behaviour}${within}`;
        case 'response':
            return `${trigger} causes ${behaviour}${within}`;
        case 'requirement':
            return `${behaviour} requires ${trigger}${within}`;
        case 'prevention':
            return `${trigger} forbids ${behaviour}${within}`;
    }
}
