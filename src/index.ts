export { compile } from './compile.js';
export { Compiler, CompileError } from './compiler.js';
export type { CompileOutcome } from './compiler.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export type {
  Artifact,
  AsmArtifact,
  FormatWriters,
  ListingArtifact,
  WriteAsmOptions,
  WriteListingOptions,
} from './formats/types.js';
export { Lexer, tokenize } from './frontend/lexer.js';
export { lookupIdentifier } from './frontend/tokens.js';
export type { Token, TokenKind } from './frontend/tokens.js';
export { buildIr } from './ir/build.js';
export type { Instruction, InstructionKind, IrProgram } from './ir/instructions.js';
export { emitProgram } from './lowering/emit.js';
export { constantSymbol } from './lowering/constants.js';
export type { AsmProgram } from './amd64/asm.js';
