import {
    Diagnostic,
    DiagnosticSeverity,
    Location,
    Position,
    Range
} from 'vscode-languageserver/node';
import { fileURLToPath } from 'url';

import { COMMAND_LINE_URI, DIAGNOSTIC_SOURCE } from './constants';

export interface ReportedDiagnostic {
    uri: string;
    diagnostic: Diagnostic;
}

// Thrown by ErrorReporter.fatal() after the diagnostic has been recorded
export class FatalError extends Error {
    readonly uri: string;
    readonly diagnostic: Diagnostic;

    constructor(reported: ReportedDiagnostic) {
        super(reported.diagnostic.message);
        this.name = 'FatalError';
        this.uri = reported.uri;
        this.diagnostic = reported.diagnostic;
    }
}

export function commandLineLocation(): Location {
    return Location.create(
        COMMAND_LINE_URI,
        Range.create(Position.create(0, 0), Position.create(0, 0))
    );
}

export function isCommandLine(location: Location): boolean {
    return location.uri === COMMAND_LINE_URI;
}

/**
 * Accumulates diagnostics for one compiler invocation.
 *
 * Expected invalid input is recorded and processing continues, so a single
 * run reports as many problems as possible. Only fatal() unwinds.
 */
export class ErrorReporter {
    private readonly reported: ReportedDiagnostic[] = [];

    error(location: Location, message: string): void {
        this.push(location, DiagnosticSeverity.Error, message);
    }

    warn(location: Location, message: string): void {
        this.push(location, DiagnosticSeverity.Warning, message);
    }

    info(location: Location, message: string): void {
        this.push(location, DiagnosticSeverity.Information, message);
    }

    fatal(location: Location, message: string): never {
        throw new FatalError(this.push(location, DiagnosticSeverity.Error, message));
    }

    get errorCount(): number {
        return this.reported.filter(r => r.diagnostic.severity === DiagnosticSeverity.Error).length;
    }

    hasErrors(): boolean {
        return this.errorCount > 0;
    }

    all(): ReportedDiagnostic[] {
        return [...this.reported];
    }

    // Diagnostics grouped per URI, in report order
    byUri(): Map<string, Diagnostic[]> {
        const grouped = new Map<string, Diagnostic[]>();
        for (const { uri, diagnostic } of this.reported) {
            const list = grouped.get(uri);
            if (list) {
                list.push(diagnostic);
            } else {
                grouped.set(uri, [diagnostic]);
            }
        }
        return grouped;
    }

    format(): string[] {
        return this.reported.map(r => formatDiagnostic(r));
    }

    private push(location: Location, severity: DiagnosticSeverity, message: string): ReportedDiagnostic {
        const reported: ReportedDiagnostic = {
            uri: location.uri,
            diagnostic: {
                severity,
                range: location.range,
                message,
                source: DIAGNOSTIC_SOURCE
            }
        };
        this.reported.push(reported);
        return reported;
    }
}

function severityName(severity: DiagnosticSeverity | undefined): string {
    switch (severity) {
        case DiagnosticSeverity.Warning:
            return 'warning';
        case DiagnosticSeverity.Information:
        case DiagnosticSeverity.Hint:
            return 'note';
        default:
            return 'error';
    }
}

// "file:line:col: error: message", or "command-line: error: message"
export function formatDiagnostic({ uri, diagnostic }: ReportedDiagnostic): string {
    const severity = severityName(diagnostic.severity);
    if (uri === COMMAND_LINE_URI) {
        return `${COMMAND_LINE_URI}: ${severity}: ${diagnostic.message}`;
    }
    const file = uri.startsWith('file://') ? fileURLToPath(uri) : uri;
    const { line, character } = diagnostic.range.start;
    return `${file}:${line + 1}:${character + 1}: ${severity}: ${diagnostic.message}`;
}
