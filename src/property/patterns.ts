/**
 * Pattern catalog
 *
 * One rule per member of the closed pattern union. Whether a pattern takes
 * a trigger and in which order its slots bind aliases are fixed; the
 * disjunction allowances and the unbound-response warning can be
 * overridden per pattern through validator options.
 */

import type { PatternType, PatternRuleOverride } from '../types/index.js';

export type PatternSlot = 'trigger' | 'behaviour';

export type EventSlot = 'activator' | PatternSlot | 'terminator';

export interface PatternRule {
    readonly takesTrigger: boolean;
    /** Pattern slots in binding order; a slot sees the aliases of the slots before it. */
    readonly bindingOrder: readonly PatternSlot[];
    readonly safety: boolean;
    allowTriggerDisjunction: boolean;
    allowBehaviourDisjunction: boolean;
    /** Warn when the behaviour reads none of the trigger's aliases. */
    warnUnboundResponse: boolean;
}

export type PatternRules = Record<PatternType, PatternRule>;

const BASE_RULES: PatternRules = {
    existence: {
        takesTrigger: false,
        bindingOrder: ['behaviour'],
        safety: false,
        allowTriggerDisjunction: true,
        allowBehaviourDisjunction: true,
        warnUnboundResponse: false,
    },
    absence: {
        takesTrigger: false,
        bindingOrder: ['behaviour'],
        safety: true,
        allowTriggerDisjunction: true,
        allowBehaviourDisjunction: true,
        warnUnboundResponse: false,
    },
    response: {
        takesTrigger: true,
        bindingOrder: ['trigger', 'behaviour'],
        safety: false,
        allowTriggerDisjunction: true,
        allowBehaviourDisjunction: true,
        warnUnboundResponse: false,
    },
    requirement: {
        takesTrigger: true,
        bindingOrder: ['trigger', 'behaviour'],
        safety: true,
        allowTriggerDisjunction: true,
        allowBehaviourDisjunction: true,
        warnUnboundResponse: true,
    },
    prevention: {
        takesTrigger: true,
        bindingOrder: ['trigger', 'behaviour'],
        safety: true,
        allowTriggerDisjunction: true,
        allowBehaviourDisjunction: true,
        warnUnboundResponse: false,
    },
};

/**
 * Pattern rules with caller overrides applied. The base table is never modified.
 */
export function resolvePatternRules(
    overrides: Partial<Record<PatternType, PatternRuleOverride>> = {}
): PatternRules {
    const resolve = (pattern: PatternType): PatternRule => {
        const base = BASE_RULES[pattern];
        const override = overrides[pattern] ?? {};
        return {
            takesTrigger: base.takesTrigger,
            bindingOrder: [...base.bindingOrder],
            safety: base.safety,
            allowTriggerDisjunction: override.allowTriggerDisjunction ?? base.allowTriggerDisjunction,
            allowBehaviourDisjunction: override.allowBehaviourDisjunction ?? base.allowBehaviourDisjunction,
            warnUnboundResponse: override.warnUnboundResponse ?? base.warnUnboundResponse,
        };
    };
    return {
        existence: resolve('existence'),
        absence: resolve('absence'),
        response: resolve('response'),
        requirement: resolve('requirement'),
        prevention: resolve('prevention'),
    };
}

export function isSafety(pattern: PatternType): boolean {
    return BASE_RULES[pattern].safety;
}

export function isLiveness(pattern: PatternType): boolean {
    return !BASE_RULES[pattern].safety;
}

/**
 * Slots whose aliases an event in `slot` may read. The activator reads
 * nothing, the terminator only the activator; pattern slots read the
 * activator and the pattern slots bound before them.
 */
export function visibleSlots(slot: EventSlot, rule: PatternRule): EventSlot[] {
    switch (slot) {
        case 'activator':
            return [];
        case 'terminator':
            return ['activator'];
        default: {
            const index = rule.bindingOrder.indexOf(slot);
            return ['activator', ...rule.bindingOrder.slice(0, Math.max(index, 0))];
        }
    }
}
