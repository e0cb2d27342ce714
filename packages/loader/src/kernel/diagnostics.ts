export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly filePath?: string;
  readonly line?: number;
  readonly entityId?: string;
}

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export interface DiagnosticCollector extends DiagnosticSink {
  readonly diagnostics: readonly Diagnostic[];
}

/** Carried by every loader that may report warnings or progress. */
export interface LoadContext {
  readonly diagnostics?: DiagnosticSink;
}

export function reportDiagnostic(context: LoadContext, diagnostic: Diagnostic): void {
  context.diagnostics?.report(diagnostic);
}

/**
 * In-memory sink. When `forward` is given every diagnostic is also passed on
 * as soon as it is reported.
 */
export function createDiagnosticCollector(forward?: DiagnosticSink): DiagnosticCollector {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    report(diagnostic: Diagnostic): void {
      diagnostics.push(diagnostic);
      forward?.report(diagnostic);
    },
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location =
    diagnostic.filePath === undefined
      ? ''
      : ` (${diagnostic.filePath}${diagnostic.line === undefined ? '' : `:${diagnostic.line}`})`;
  const suggestion = diagnostic.suggestion === undefined ? '' : ` Suggestion: ${diagnostic.suggestion}`;
  return `[${diagnostic.severity}] ${diagnostic.code} at ${diagnostic.path}${location}: ${diagnostic.message}${suggestion}`;
}

const SEVERITY_ORDER: Readonly<Record<DiagnosticSeverity, number>> = {
  info: 0,
  warning: 1,
  error: 2,
};

/** Console sink with severity filtering. */
export class ConsoleDiagnosticSink implements DiagnosticSink {
  private readonly minSeverity: number;

  constructor(
    private readonly prefix: string,
    severity: DiagnosticSeverity = 'warning',
  ) {
    this.minSeverity = SEVERITY_ORDER[severity];
  }

  report(diagnostic: Diagnostic): void {
    if (SEVERITY_ORDER[diagnostic.severity] < this.minSeverity) {
      return;
    }
    const line = `[${this.prefix}] ${formatDiagnostic(diagnostic)}`;
    switch (diagnostic.severity) {
      case 'error':
        console.error(line);
        return;
      case 'warning':
        console.warn(line);
        return;
      case 'info':
        console.log(line);
        return;
    }
  }
}
