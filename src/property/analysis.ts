import type { AtomicEventNode, EventNode, PropertyNode } from '../types/index.js';
import { simpleEvents } from '../events/analysis.js';
import type { EventSlot } from './patterns.js';

export interface SlotEvent {
    slot: EventSlot;
    event: EventNode;
}

/**
 * Top-level events of a property, in the order activator, trigger,
 * behaviour, terminator.
 */
export function propertyEvents(property: PropertyNode): SlotEvent[] {
    const events: SlotEvent[] = [];
    const { scope, pattern } = property;
    if (scope.activator) events.push({ slot: 'activator', event: scope.activator });
    if (pattern.trigger) events.push({ slot: 'trigger', event: pattern.trigger });
    events.push({ slot: 'behaviour', event: pattern.behaviour });
    if (scope.terminator) events.push({ slot: 'terminator', event: scope.terminator });
    return events;
}

export interface AliasBinding {
    alias: string;
    slot: EventSlot;
    /** Atomic events binding the alias; several when disjuncts share it. */
    events: AtomicEventNode[];
    channels: string[];
}

export interface DuplicateBinding {
    alias: string;
    /** Slot of the first binding. */
    firstSlot: EventSlot;
    slot: EventSlot;
    /** First atomic event of `slot` that binds the alias again. */
    event: AtomicEventNode;
}

export interface AliasTable {
    bindings: Map<string, AliasBinding>;
    duplicates: DuplicateBinding[];
}

/**
 * Alias name to binding events. An alias belongs to the first slot that
 * binds it; binding it again in another slot is a duplicate. Disjuncts of
 * one slot may share an alias.
 */
export function buildAliasTable(property: PropertyNode): AliasTable {
    const bindings = new Map<string, AliasBinding>();
    const duplicates: DuplicateBinding[] = [];

    for (const { slot, event } of propertyEvents(property)) {
        for (const atomic of simpleEvents(event)) {
            if (atomic.alias === null) continue;
            const existing = bindings.get(atomic.alias);
            if (!existing) {
                bindings.set(atomic.alias, {
                    alias: atomic.alias,
                    slot,
                    events: [atomic],
                    channels: [atomic.channel],
                });
            } else if (existing.slot === slot) {
                existing.events.push(atomic);
                existing.channels.push(atomic.channel);
            } else if (!duplicates.some(d => d.alias === atomic.alias && d.slot === slot)) {
                duplicates.push({ alias: atomic.alias, firstSlot: existing.slot, slot, event: atomic });
            }
        }
    }

    return { bindings, duplicates };
}

/**
 * Atomic events of a property paired with the slot they belong to.
 */
export function slotAtomicEvents(property: PropertyNode): Array<{ slot: EventSlot; event: AtomicEventNode }> {
    return propertyEvents(property).flatMap(({ slot, event }) =>
        simpleEvents(event).map(atomic => ({ slot, event: atomic }))
    );
}
