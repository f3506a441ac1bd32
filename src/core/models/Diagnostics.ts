import { Logger } from "../utils/Logger";

export type DiagnosticCode =
    | 'invalid-tag'
    | 'transfer-skipped'
    | 'transfer-clamped'
    | 'rewind-clamped'
    | 'merge-ambiguous'
    | 'snapshot-field-ignored';

/**
 * A recoverable condition an operation handled by skipping or clamping.
 */
export interface Diagnostic {
    code: DiagnosticCode;
    message: string;

    /** Where it happened: segment index or name, stage, track, tag... */
    context: Record<string, string | number>;
}

export interface DiagnosticSink {
    report(diagnostic: Diagnostic): void;
}

/**
 * Collects diagnostics over one or more operations.
 */
export class DiagnosticLog implements DiagnosticSink {
    private items: Diagnostic[] = [];

    public report(diagnostic: Diagnostic) {
        this.items.push(diagnostic);
    }

    public entries(): readonly Diagnostic[] {
        return this.items;
    }

    public byCode(code: DiagnosticCode): Diagnostic[] {
        return this.items.filter(d => d.code === code);
    }

    public hasIssues(): boolean {
        return this.items.length > 0;
    }

    public clear() {
        this.items = [];
    }
}

// Conditions that happen in normal use go to debug instead of warn.
const QUIET_CODES: ReadonlySet<DiagnosticCode> = new Set<DiagnosticCode>(['rewind-clamped', 'transfer-clamped']);

/**
 * Logs the diagnostic and hands it to the sink.
 * @param quiet Log at debug regardless of the code.
 */
export function reportDiagnostic(sink: DiagnosticSink | undefined, diagnostic: Diagnostic, quiet = false) {
    if (quiet || QUIET_CODES.has(diagnostic.code)) {
        Logger.debug(diagnostic.message, diagnostic.context);
    } else {
        Logger.warn(diagnostic.message, diagnostic.context);
    }
    sink?.report(diagnostic);
}
