import type { SourceSpan } from '../frontend/tokens.js';

/**
 * Instruction kinds that take no immediate value.
 */
export type OperationKind =
  | 'Plus'
  | 'Minus'
  | 'Multiply'
  | 'Divide'
  | 'Modulus'
  | 'Power'
  | 'Abs'
  | 'Sin'
  | 'Cos'
  | 'Tan'
  | 'Sqrt'
  | 'Dup'
  | 'Swap'
  | 'Factorial';

/**
 * Push a numeric literal onto the evaluation stack.
 */
export interface PushInstruction {
  kind: 'Push';
  /** Exact literal text; also the constant-pool key. */
  value: string;
  span?: SourceSpan;
}

export interface OperationInstruction {
  kind: OperationKind;
  span?: SourceSpan;
}

export type Instruction = PushInstruction | OperationInstruction;

export type InstructionKind = Instruction['kind'];

/**
 * Built intermediate form: instructions in program order plus the distinct literals they push.
 *
 * `constants` is in first-occurrence order so that emitted output is reproducible.
 */
export interface IrProgram {
  instructions: readonly Instruction[];
  constants: readonly string[];
}

/**
 * Run-time stack effect of one instruction: the depth it requires before running and the net
 * change it leaves behind.
 */
export interface StackEffect {
  requires: number;
  delta: number;
}

export const STACK_EFFECTS: Readonly<Record<InstructionKind, StackEffect>> = {
  Push: { requires: 0, delta: 1 },
  Plus: { requires: 2, delta: -1 },
  Minus: { requires: 2, delta: -1 },
  Multiply: { requires: 2, delta: -1 },
  Divide: { requires: 2, delta: -1 },
  Modulus: { requires: 2, delta: -1 },
  Power: { requires: 2, delta: -1 },
  Abs: { requires: 1, delta: 0 },
  Sin: { requires: 1, delta: 0 },
  Cos: { requires: 1, delta: 0 },
  Tan: { requires: 1, delta: 0 },
  Sqrt: { requires: 1, delta: 0 },
  Dup: { requires: 1, delta: 1 },
  Swap: { requires: 2, delta: 0 },
  Factorial: { requires: 1, delta: 0 },
};

export function isPush(instr: Instruction): instr is PushInstruction {
  return instr.kind === 'Push';
}
