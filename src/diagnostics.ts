/**
 * Diagnostic types and formatting for the Brook resolver.
 */

export type Severity = 'error' | 'warning';

export interface Diagnostic {
  severity: Severity;
  message: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

/**
 * Format a single diagnostic as a human-readable string.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const tag = d.severity === 'error' ? 'ERROR' : 'WARN';
  return `${tag} [${d.line}:${d.column}] ${d.message}`;
}

/**
 * Format an array of diagnostics, sorted by line then column.
 */
export function formatDiagnostics(ds: Diagnostic[]): string {
  if (ds.length === 0) return '';
  const sorted = [...ds].sort((a, b) => a.line - b.line || a.column - b.column);
  return sorted.map(formatDiagnostic).join('\n');
}

export function hasErrors(ds: Diagnostic[]): boolean {
  return ds.some(d => d.severity === 'error');
}
