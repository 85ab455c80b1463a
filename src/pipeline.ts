import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Insert an `int 3` breakpoint after the entry sequence of the generated program. */
  debug?: boolean;
  /** Emit the assembly-language program (`.s`). Defaults to `true`. */
  emitAsm?: boolean;
  /** Emit the instruction listing (`.lst`). Defaults to `false`. */
  emitListing?: boolean;
  /** Name used for the expression in diagnostics and artifact headers. Defaults to `<expr>`. */
  sourceName?: string;
  /** Line ending for text artifacts. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * `artifacts` is empty whenever `diagnostics` contains an error.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays pure and in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  expression: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => CompileResult;
