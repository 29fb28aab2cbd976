import { createDiagnostic } from '../types/index.js';
import { traverse } from '../ast/visitor.js';
import { isOwnFieldAccess } from '../predicate/references.js';
import type { ValidationContext } from './context.js';
import type { DiagnosticSink } from './sink.js';

/**
 * Binding pass: every alias a predicate reads must be bound by an event
 * visible from its position; with channel schemas, every channel must be
 * declared and every field path must resolve. Quantifier variables are
 * checked here too.
 */
export function bindingPass(ctx: ValidationContext, sink: DiagnosticSink): void {
    if (ctx.schemas) {
        for (const { event } of ctx.events) {
            if (!Object.hasOwn(ctx.schemas, event.channel)) {
                sink.add(createDiagnostic(
                    'UndefinedChannel',
                    event.id,
                    `Channel '${event.channel}' has no declared message type`,
                    { channel: event.channel }
                ));
            }
        }
    }

    for (const { slot, event, predicate } of ctx.predicates) {
        traverse(predicate, (node) => {
            if (node.kind !== 'field') return;
            if (node.alias !== null && !isOwnFieldAccess(node, event) && !ctx.visibleBinding(node.alias, slot)) {
                const binding = ctx.aliases.bindings.get(node.alias);
                const message = binding
                    ? `Alias '${node.alias}' is bound by the ${binding.slot} event and is not visible from the ${slot} event`
                    : `Alias '${node.alias}' is not bound by any event of this property`;
                sink.add(createDiagnostic('UnboundAlias', node.id, message, { alias: node.alias }));
            }
            for (const problem of ctx.fieldResolution(node)?.problems ?? []) {
                sink.add(createDiagnostic(problem.code, node.id, problem.message, {
                    field: problem.field,
                    ...(problem.channel !== undefined && { channel: problem.channel }),
                    ...(node.alias !== null && { alias: node.alias }),
                }));
            }
        });
    }

    for (const issue of ctx.variableIssues) {
        sink.add(createDiagnostic(issue.code, issue.node.id, issue.message, { variable: issue.variable }));
    }
}
