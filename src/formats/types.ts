import type { AsmProgram } from '../amd64/asm.js';
import type { IrProgram } from '../ir/instructions.js';

/**
 * Options for `.s` assembly writing.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 *
 * The listing is a deterministic instruction table plus the constant pool; it is a reading aid,
 * not an input to any tool.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /** Source name shown in the listing header. */
  sourceName?: string;
}

/**
 * In-memory assembly-language artifact (GNU `as`, Intel syntax).
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn lowered programs into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeListing?(ir: IrProgram, opts?: WriteListingOptions): ListingArtifact;
}
