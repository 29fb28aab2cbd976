import type { Diagnostic, ValidationReport } from '../types/index.js';

/**
 * Accumulates diagnostics in the order they are found.
 */
export class DiagnosticSink {
    private errors: Diagnostic[] = [];
    private warnings: Diagnostic[] = [];

    add(diagnostic: Diagnostic): void {
        if (diagnostic.severity === 'error') {
            this.errors.push(diagnostic);
        } else {
            this.warnings.push(diagnostic);
        }
    }

    addAll(diagnostics: Iterable<Diagnostic>): void {
        for (const diagnostic of diagnostics) {
            this.add(diagnostic);
        }
    }

    get errorCount(): number {
        return this.errors.length;
    }

    get warningCount(): number {
        return this.warnings.length;
    }

    report(): ValidationReport {
        return {
            accepted: this.errors.length === 0,
            errors: [...this.errors],
            warnings: [...this.warnings],
        };
    }
}
