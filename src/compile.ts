import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { buildIr } from './ir/build.js';
import type { IrProgram } from './ir/instructions.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

function withDefaults(options: CompilerOptions): { emitAsm: boolean; emitListing: boolean } {
  return { emitAsm: options.emitAsm ?? true, emitListing: options.emitListing ?? false };
}

function internalError(diagnostics: Diagnostic[], file: string, stage: string, err: unknown): void {
  diagnostics.push({
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error during ${stage}: ${String(err)}`,
    file,
  });
}

/**
 * Compile an RPN expression to x86-64 assembly.
 *
 * Runs lex/validate, IR build and lowering in one synchronous pass. Bad input is reported through
 * `diagnostics`, never thrown; when any error is present no artifacts are produced.
 */
export const compile: CompileFn = (
  expression: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult => {
  const file = options.sourceName ?? '<expr>';
  const diagnostics: Diagnostic[] = [];

  let ir: IrProgram | undefined;
  try {
    ir = buildIr(expression, diagnostics, file);
  } catch (err) {
    internalError(diagnostics, file, 'parse', err);
  }
  if (!ir || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];
  const lineEnding = options.lineEnding ?? '\n';

  if (emit.emitAsm) {
    try {
      const program = emitProgram(ir, diagnostics, {
        debug: options.debug ?? false,
        sourceName: file,
        expression,
      });
      if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };
      artifacts.push(deps.formats.writeAsm(program, { lineEnding }));
    } catch (err) {
      internalError(diagnostics, file, 'code generation', err);
      return { diagnostics, artifacts: [] };
    }
  }

  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(ir, { lineEnding, sourceName: file }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file,
      });
    }
  }

  return { diagnostics, artifacts };
};
