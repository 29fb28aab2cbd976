/**
 * Validation Engine
 *
 * Runs the structural, binding and pattern-sanity passes over one property
 * at a time. Every pass runs to completion; diagnostics are accumulated in
 * tree order so validating the same tree twice gives the same report.
 */

import type {
    PropertyNode,
    ResolvedValidatorOptions,
    SpecificationNode,
    SpecificationReport,
    ValidationReport,
    ValidatorOptions,
} from '../types/index.js';
import { parseValidatorOptions } from '../types/options.js';
import { freezeTree } from '../ast/node.js';
import { builtinFunctions, type FunctionRegistry } from '../functions/registry.js';
import { resolvePatternRules, type PatternRules } from '../property/patterns.js';
import { createLogger, type Logger } from '../utils/logging.js';
import { ValidationContext } from './context.js';
import { DiagnosticSink } from './sink.js';
import { structuralPass } from './structural.js';
import { bindingPass } from './binding.js';
import { sanityPass } from './sanity.js';

export class PropertyValidator {
    private readonly options: ResolvedValidatorOptions;
    private readonly rules: PatternRules;
    private readonly logger: Logger;

    constructor(
        options: ValidatorOptions = {},
        private readonly registry: FunctionRegistry = builtinFunctions,
        logger?: Logger
    ) {
        this.options = parseValidatorOptions(options);
        this.rules = resolvePatternRules(this.options.patterns);
        this.logger = logger ?? createLogger(this.options.verbosity);
    }

    /**
     * Validate one property. An accepted property is frozen unless
     * `freezeAccepted` is off; a rejected one may be edited and resubmitted.
     */
    validate(property: PropertyNode): ValidationReport {
        if (!this.registry.isFrozen()) {
            this.registry.freeze();
            this.logger.debug(`Function registry frozen with ${this.registry.names().length} functions`);
        }

        const rule = this.rules[property.pattern.pattern];
        const ctx = new ValidationContext(property, rule, this.registry, this.options.channels);
        const sink = new DiagnosticSink();

        structuralPass(ctx, sink);
        this.logger.debug(`Property ${property.id}: structural pass, ${sink.errorCount} errors`);
        bindingPass(ctx, sink);
        this.logger.debug(`Property ${property.id}: binding pass, ${sink.errorCount} errors`);
        sanityPass(ctx, this.options, sink);
        this.logger.debug(
            `Property ${property.id}: sanity pass, ${sink.errorCount} errors, ${sink.warningCount} warnings`
        );

        const report = sink.report();
        if (report.accepted && this.options.freezeAccepted) {
            freezeTree(property);
        }
        return report;
    }

    /**
     * Validate each property of a specification independently.
     */
    validateSpecification(specification: SpecificationNode): SpecificationReport {
        const properties = specification.properties.map(property => ({
            propertyId: property.id,
            report: this.validate(property),
        }));
        return {
            accepted: properties.every(p => p.report.accepted),
            properties,
        };
    }
}

/**
 * Validate a property against the process-wide function registry.
 */
export function validate(property: PropertyNode, options: ValidatorOptions = {}): ValidationReport {
    return new PropertyValidator(options).validate(property);
}

export function validateSpecification(
    specification: SpecificationNode,
    options: ValidatorOptions = {}
): SpecificationReport {
    return new PropertyValidator(options).validateSpecification(specification);
}
