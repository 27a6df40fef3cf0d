/**
 * Diagnostics (errors/warnings) produced by parsing, building and batch runs.
 *
 * The goal is to keep all "user-facing" feedback structured:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `path`: the file the diagnostic belongs to (batch operations).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  path?: string;
}

/**
 * Helper for building an error diagnostic.
 */
export function errorDiagnostic(
  code: string,
  message: string,
  path?: string
): Diagnostic {
  return { severity: 'error', code, message, path };
}

/**
 * Helper for building a warning diagnostic.
 */
export function warningDiagnostic(
  code: string,
  message: string,
  path?: string
): Diagnostic {
  return { severity: 'warning', code, message, path };
}

/**
 * Attach a file path to diagnostics produced by a path-agnostic step.
 */
export function withPath(diagnostics: Diagnostic[], path: string): Diagnostic[] {
  return diagnostics.map((diagnostic) => ({ ...diagnostic, path }));
}
