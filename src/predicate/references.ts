import type { AstNode, AtomicEventNode, EventNode, FieldAccessNode } from '../types/index.js';
import { traverse } from '../ast/visitor.js';
import { simpleEvents } from '../events/analysis.js';

/**
 * Alias names read by any field access under `node`.
 */
export function referencedAliases(node: AstNode): Set<string> {
    const aliases = new Set<string>();
    traverse(node, (n) => {
        if (n.kind === 'field' && n.alias !== null) {
            aliases.add(n.alias);
        }
    });
    return aliases;
}

export function references(node: AstNode, alias: string): boolean {
    return referencedAliases(node).has(alias);
}

/**
 * True when the access reads the message of `event` itself.
 */
export function isOwnFieldAccess(field: FieldAccessNode, event: AtomicEventNode): boolean {
    return field.alias === null || field.alias === event.alias;
}

/**
 * Aliases an event reads from other events. References to an atomic
 * event's own alias are reads of its own message and do not count.
 */
export function externalReferences(event: EventNode): Set<string> {
    const refs = new Set<string>();
    for (const e of simpleEvents(event)) {
        if (!e.predicate) continue;
        for (const alias of referencedAliases(e.predicate)) {
            if (alias !== e.alias) refs.add(alias);
        }
    }
    return refs;
}

/**
 * True when the event's predicate reads at least one field of its own message.
 */
export function readsOwnMessage(event: AtomicEventNode): boolean {
    let found = false;
    if (event.predicate) {
        traverse(event.predicate, (n) => {
            if (n.kind === 'field' && isOwnFieldAccess(n, event)) found = true;
        });
    }
    return found;
}
