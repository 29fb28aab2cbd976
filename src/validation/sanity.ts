import type { EventNode, ResolvedValidatorOptions } from '../types/index.js';
import { createDiagnostic } from '../types/index.js';
import { eventAliases } from '../events/analysis.js';
import { isUnsatisfiable } from '../logic/engine.js';
import { externalReferences, readsOwnMessage } from '../predicate/references.js';
import type { ValidationContext } from './context.js';
import type { DiagnosticSink } from './sink.js';

/**
 * Pattern-sanity pass: slot shapes the pattern does not allow, predicates
 * that never read their own message, and the warnings for properties that
 * are legal but probably not what was meant.
 */
export function sanityPass(ctx: ValidationContext, options: ResolvedValidatorOptions, sink: DiagnosticSink): void {
    const { pattern } = ctx.property;

    if (pattern.trigger) {
        checkDisjunctionAllowed(pattern.trigger, 'trigger', ctx.rule.allowTriggerDisjunction, pattern.pattern, sink);
    }
    checkDisjunctionAllowed(pattern.behaviour, 'behaviour', ctx.rule.allowBehaviourDisjunction, pattern.pattern, sink);

    if (options.checks.suspiciousResponse && ctx.rule.warnUnboundResponse && pattern.trigger) {
        const bound = eventAliases(pattern.trigger);
        const read = externalReferences(pattern.behaviour);
        // a trigger that binds no alias leaves the behaviour nothing to reference
        if (bound.length > 0 && !bound.some(alias => read.has(alias))) {
            sink.add(createDiagnostic(
                'SuspiciousUnboundResponse',
                pattern.behaviour.id,
                `The ${pattern.pattern} behaviour does not reference any alias of its trigger (${bound.join(', ')})`,
                { alias: bound[0] }
            ));
        }
    }

    for (const { event, predicate } of ctx.predicates) {
        if (options.checks.contradictoryPredicate && isUnsatisfiable(predicate.condition)) {
            sink.add(createDiagnostic(
                'ContradictoryPredicate',
                predicate.id,
                `The predicate of the event on '${event.channel}' can never be satisfied`,
                { channel: event.channel }
            ));
        }
        if (options.checks.noOwnFieldReference
            && predicate.condition.kind !== 'value'
            && !readsOwnMessage(event)) {
            sink.add(createDiagnostic(
                'NoOwnFieldReference',
                event.id,
                `The predicate of the event on '${event.channel}' never reads a field of its own message`,
                {
                    channel: event.channel,
                    ...(event.alias !== null && { alias: event.alias }),
                }
            ));
        }
    }
}

function checkDisjunctionAllowed(
    event: EventNode,
    slot: 'trigger' | 'behaviour',
    allowed: boolean,
    pattern: string,
    sink: DiagnosticSink
): void {
    if (event.kind === 'disjunction' && !allowed) {
        sink.add(createDiagnostic(
            'DisjunctionNotAllowed',
            event.id,
            `The ${pattern} pattern does not accept an event disjunction as its ${slot}`
        ));
    }
}
