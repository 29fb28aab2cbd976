import { z } from 'zod';
import { PATTERN_TYPES } from './ast.js';
import { channelSchemasSchema } from './schema.js';
import { createInvalidOptionsError } from './errors.js';

export type Verbosity = 'minimal' | 'standard' | 'detailed';

export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']);

/**
 * Per-pattern overrides. Whether a pattern takes a trigger is fixed by the
 * pattern itself and cannot be overridden.
 */
export const patternRuleOverrideSchema = z.object({
    allowTriggerDisjunction: z.boolean().optional(),
    allowBehaviourDisjunction: z.boolean().optional(),
    warnUnboundResponse: z.boolean().optional(),
}).strict();

export const validatorOptionsSchema = z.object({
    /** Deep-freeze a property once it is accepted. */
    freezeAccepted: z.boolean().default(true),
    /** Message type per channel; enables field resolution and typing. */
    channels: channelSchemasSchema.optional(),
    /** Sanity checks of the pattern-sanity pass; each can be switched off. */
    checks: z.object({
        suspiciousResponse: z.boolean().default(true),
        contradictoryPredicate: z.boolean().default(true),
        noOwnFieldReference: z.boolean().default(true),
    }).strict().default({}),
    patterns: z.record(z.enum(PATTERN_TYPES), patternRuleOverrideSchema).optional(),
    verbosity: verbositySchema.default('standard'),
}).strict();

export type ValidatorOptions = z.input<typeof validatorOptionsSchema>;
export type ResolvedValidatorOptions = z.output<typeof validatorOptionsSchema>;
export type PatternRuleOverride = z.output<typeof patternRuleOverrideSchema>;

/**
 * Resolve validator options, filling defaults.
 */
export function parseValidatorOptions(input: unknown = {}): ResolvedValidatorOptions {
    const result = validatorOptionsSchema.safeParse(input);
    if (!result.success) {
        throw createInvalidOptionsError(
            'validator options',
            result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }
    return result.data;
}

export const DEFAULTS = {
    minTime: 0,
    maxTime: Infinity,
} as const;
