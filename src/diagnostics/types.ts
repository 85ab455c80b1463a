/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `RPN100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Name of the compiled source (`<expr>` unless the caller names it). */
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
  Unknown: 'RPN000',

  /** Failed to write an output artifact. */
  IoWriteFailed: 'RPN001',

  /** Internal error inside a compiler stage (unexpected exception). */
  InternalError: 'RPN002',

  /** The expression contains no tokens. */
  EmptyExpression: 'RPN100',

  /** The lexer met an identifier that is not a reserved keyword. */
  UnknownToken: 'RPN101',

  /** The first token of the program is not a number. */
  ExpectedLeadingNumber: 'RPN102',

  /** The program ends on a number that nothing consumes. */
  TrailingNumber: 'RPN103',

  /** Generic emission/lowering error. */
  EmitError: 'RPN300',

  /** External toolchain (assembler/linker or the produced binary) failed. */
  ToolchainError: 'RPN400',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
