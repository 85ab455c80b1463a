import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { AsmArtifact } from './formats/types.js';

/**
 * Compilation failure carrying every diagnostic reported for the expression.
 */
export class CompileError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const first = diagnostics.find((d) => d.severity === 'error');
    super(first ? first.message : 'Compilation failed');
    this.name = 'CompileError';
    this.diagnostics = diagnostics;
  }
}

export type CompileOutcome = { ok: true; text: string } | { ok: false; error: CompileError };

/**
 * One expression, compiled on demand.
 *
 * Each call to `compile` starts from scratch, so the same instance may be compiled repeatedly and
 * always produces identical text for identical settings.
 */
export class Compiler {
  private debug = false;

  constructor(private readonly expression: string) {}

  setDebug(value: boolean): void {
    this.debug = value;
  }

  compile(): CompileOutcome {
    const res = compile(this.expression, { debug: this.debug }, { formats: defaultFormatWriters });
    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    if (!asm || res.diagnostics.some((d) => d.severity === 'error')) {
      return { ok: false, error: new CompileError(res.diagnostics) };
    }
    return { ok: true, text: asm.text };
  }
}
