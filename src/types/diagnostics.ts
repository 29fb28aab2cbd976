/**
 * Validation diagnostics and reports
 */

import type { NodeId } from './ast.js';

export type DiagnosticCode =
    // structural
    | 'InvalidConnectiveArity'
    | 'InvalidDisjunctionArity'
    | 'NonUniqueDisjunctChannel'
    | 'DuplicateAlias'
    | 'UnknownFunction'
    | 'FunctionArityMismatch'
    | 'FunctionArgTypeMismatch'
    | 'TypeMismatch'
    // binding
    | 'UnboundAlias'
    | 'UnboundVariable'
    | 'UnusedVariable'
    | 'ShadowedVariable'
    | 'UndefinedChannel'
    | 'UnknownField'
    | 'InvalidFieldAccess'
    | 'InconsistentAlias'
    // pattern sanity
    | 'DisjunctionNotAllowed'
    | 'SuspiciousUnboundResponse'
    | 'ContradictoryPredicate'
    | 'NoOwnFieldReference';

export type Severity = 'error' | 'warning';

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticCode, Severity> = {
    InvalidConnectiveArity: 'error',
    InvalidDisjunctionArity: 'error',
    NonUniqueDisjunctChannel: 'error',
    DuplicateAlias: 'error',
    UnknownFunction: 'error',
    FunctionArityMismatch: 'error',
    FunctionArgTypeMismatch: 'error',
    TypeMismatch: 'error',
    UnboundAlias: 'error',
    UnboundVariable: 'error',
    UnusedVariable: 'error',
    ShadowedVariable: 'error',
    UndefinedChannel: 'error',
    UnknownField: 'error',
    InvalidFieldAccess: 'error',
    InconsistentAlias: 'error',
    DisjunctionNotAllowed: 'error',
    SuspiciousUnboundResponse: 'warning',
    ContradictoryPredicate: 'warning',
    NoOwnFieldReference: 'error',
};

/**
 * Names involved in a diagnostic, for caller-side rendering.
 */
export interface DiagnosticDetails {
    alias?: string;
    channel?: string;
    function?: string;
    variable?: string;
    field?: string;
    position?: number;
    expected?: string;
    actual?: string;
}

export interface Diagnostic {
    code: DiagnosticCode;
    severity: Severity;
    message: string;
    /** Node the problem was found at. */
    nodeId: NodeId;
    details: DiagnosticDetails;
}

export interface ValidationReport {
    /** True when there are no errors, whatever the warning count. */
    accepted: boolean;
    errors: Diagnostic[];
    warnings: Diagnostic[];
}

export interface PropertyReport {
    propertyId: NodeId;
    report: ValidationReport;
}

export interface SpecificationReport {
    accepted: boolean;
    properties: PropertyReport[];
}

export function createDiagnostic(
    code: DiagnosticCode,
    nodeId: NodeId,
    message: string,
    details: DiagnosticDetails = {}
): Diagnostic {
    return {
        code,
        severity: DIAGNOSTIC_SEVERITY[code],
        message,
        nodeId,
        details,
    };
}
