import type { Diagnostic } from './types.js';

function normalizeDiagnosticPath(file: string): string {
  return file.replace(/\\/g, '/');
}

function severityRank(severity: Diagnostic['severity']): number {
  if (severity === 'error') return 0;
  if (severity === 'warning') return 1;
  return 2;
}

/**
 * Deterministic ordering: file, line, column, severity, ID, then message.
 *
 * Diagnostics without a line/column sort after located ones in the same file.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevCmp = severityRank(a.severity) - severityRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Render a diagnostic as `file:line:column: severity: [ID] message`.
 *
 * The location collapses to `file` when line/column are unknown.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}
