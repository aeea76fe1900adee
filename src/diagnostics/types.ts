/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An assembler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `LLIR300`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'LLIR000',

  /**
   * Malformed LLIR surface syntax.
   *
   * Not produced by this package; reserved for the parsers that build programs for it.
   */
  ParseError: 'LLIR100',

  /** Operand kind or count incompatible with the instruction (arity, immediate write target, etc.). */
  MalformedOperand: 'LLIR200',

  /** An identifier is declared by more than one anchor, label or variable. */
  DuplicateAnchor: 'LLIR300',

  /** A reference names an identifier that is never declared. */
  UndefinedSymbol: 'LLIR301',

  /** Image text is not a sequence of decimal integers. */
  ImageParseError: 'LLIR400',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
