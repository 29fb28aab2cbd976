/**
 * Event Subsystem queries
 *
 * Disjunctions are flattened for every query here: a nested disjunction is
 * just more disjuncts of the outer one.
 */

import type { AtomicEventNode, EventDisjunctionNode, EventNode } from '../types/index.js';

/**
 * Atomic events of an event, left to right.
 */
export function simpleEvents(event: EventNode): AtomicEventNode[] {
    if (event.kind === 'event') {
        return [event];
    }
    return event.events.flatMap(simpleEvents);
}

/**
 * Channel of every disjunct, nested disjunctions flattened, in order.
 */
export function channels(disjunction: EventDisjunctionNode): string[] {
    return simpleEvents(disjunction).map(e => e.channel);
}

/**
 * Channels that more than one disjunct listens on, each reported once,
 * in order of their second occurrence.
 */
export function duplicateChannels(event: EventNode): string[] {
    const seen = new Set<string>();
    const duplicates: string[] = [];
    for (const e of simpleEvents(event)) {
        if (seen.has(e.channel)) {
            if (!duplicates.includes(e.channel)) {
                duplicates.push(e.channel);
            }
        } else {
            seen.add(e.channel);
        }
    }
    return duplicates;
}

/**
 * Aliases bound by an event. Disjuncts may share an alias, so each name
 * is listed once.
 */
export function eventAliases(event: EventNode): string[] {
    const aliases: string[] = [];
    for (const e of simpleEvents(event)) {
        if (e.alias !== null && !aliases.includes(e.alias)) {
            aliases.push(e.alias);
        }
    }
    return aliases;
}

/**
 * All disjunctions in an event, outermost first.
 */
export function disjunctions(event: EventNode): EventDisjunctionNode[] {
    if (event.kind === 'event') {
        return [];
    }
    return [event, ...event.events.flatMap(disjunctions)];
}
