import type { AsmLine } from '../amd64/asm.js';
import { at, blank, comment, imm, ins, label, mem, reg, target } from '../amd64/asm.js';
import type { Instruction, InstructionKind, OperationKind } from '../ir/instructions.js';
import { STACK_EFFECTS } from '../ir/instructions.js';
import { Cells, constantSymbol, Handlers } from './constants.js';

/*
 * Register use inside every block is local: `rax`, `rbx`, `rcx` and `rdx` are free on entry and
 * dead on exit. Values cross block boundaries only on the machine stack, and the x87 register
 * stack is empty between blocks.
 */

const handler = (name: string) => target(label(name));

const TITLES: Readonly<Record<InstructionKind, string>> = {
  Push: 'PUSH',
  Plus: 'PLUS',
  Minus: 'MINUS',
  Multiply: 'MULTIPLY',
  Divide: 'DIVIDE',
  Modulus: 'MODULUS',
  Power: 'POWER',
  Abs: 'ABS',
  Sin: 'SIN',
  Cos: 'COS',
  Tan: 'TAN',
  Sqrt: 'SQRT',
  Dup: 'DUP',
  Swap: 'SWAP',
  Factorial: 'FACTORIAL',
};

/** Jump to `stack_error` unless at least `k` values are on the stack. */
function guard(k: number): AsmLine[] {
  if (k === 0) return [];
  return [
    comment(
      k === 1
        ? 'ensure there is at least one value on the stack'
        : `ensure there are at least ${k} values on the stack`,
    ),
    ins('mov', reg('rax'), mem(Cells.depth)),
    ins('cmp', reg('rax'), imm(k)),
    ins('jb', handler(Handlers.stackError)),
  ];
}

function depthUpdate(delta: number): AsmLine[] {
  if (delta === 0) return [];
  if (delta === 1) return [ins('inc', mem(Cells.depth))];
  if (delta === -1) return [ins('dec', mem(Cells.depth))];
  return [ins('add', mem(Cells.depth), imm(delta))];
}

function popInto(cell: string): AsmLine[] {
  return [ins('pop', reg('rax')), ins('mov', mem(cell), reg('rax'))];
}

/** Pop two values: the top into `a`, the one below it into `b`. */
function popPair(): AsmLine[] {
  return [...popInto(Cells.a), ...popInto(Cells.b)];
}

/** Push the double held in cell `a`. */
function pushResult(): AsmLine[] {
  return [ins('mov', reg('rax'), mem(Cells.a)), ins('push', reg('rax'))];
}

/** Convert the integer in `rax` to a double and push it. */
function pushInteger(): AsmLine[] {
  return [
    ins('mov', mem(Cells.int), reg('rax')),
    ins('fild', mem(Cells.int)),
    ins('fstp', mem(Cells.a)),
    ...pushResult(),
  ];
}

/** Truncate both operands toward zero: `rbx` from `a` (top), `rax` from `b`. */
function truncatePair(): AsmLine[] {
  return [
    ins('cvttsd2si', reg('rbx'), mem(Cells.a)),
    ins('cvttsd2si', reg('rax'), mem(Cells.b)),
  ];
}

function genPush(value: string): AsmLine[] {
  return [ins('mov', reg('rax'), mem(constantSymbol(value))), ins('push', reg('rax'))];
}

/** `b <op> a` on the x87 stack, where `a` was the top of the evaluation stack. */
function genArithmetic(mnemonic: 'fadd' | 'fsub' | 'fmul'): AsmLine[] {
  return [
    ...popPair(),
    ins('fld', mem(Cells.b)),
    ins(mnemonic, mem(Cells.a)),
    ins('fstp', mem(Cells.a)),
    ...pushResult(),
  ];
}

function genDivide(): AsmLine[] {
  return [
    comment('+0.0 and -0.0 have every bit but the sign clear'),
    ins('pop', reg('rax')),
    ins('mov', reg('rcx'), reg('rax')),
    ins('shl', reg('rcx'), imm(1)),
    ins('jz', handler(Handlers.divisionByZero)),
    ins('mov', mem(Cells.a), reg('rax')),
    ...popInto(Cells.b),
    ins('fld', mem(Cells.b)),
    ins('fdiv', mem(Cells.a)),
    ins('fstp', mem(Cells.a)),
    ...pushResult(),
  ];
}

function genModulus(index: number): AsmLine[] {
  const done = label('modulus_done', index);
  return [
    ...popPair(),
    ...truncatePair(),
    ins('test', reg('rbx'), reg('rbx')),
    ins('jz', handler(Handlers.divisionByZero)),
    comment('remainder is read from rdx, so clear it first'),
    ins('xor', reg('rdx'), reg('rdx')),
    comment('x % -1 is 0, and idiv faults on INT64_MIN / -1'),
    ins('cmp', reg('rbx'), imm(-1)),
    ins('je', target(done)),
    ins('cqo'),
    ins('idiv', reg('rbx')),
    at(done),
    ins('mov', reg('rax'), reg('rdx')),
    ...pushInteger(),
  ];
}

/**
 * Integer power `b ^ a`. An exponent of zero or below yields 0; an exponent of one yields the
 * truncated base. Bases -1, 0 and 1 are answered without looping, so huge exponents finish.
 */
function genPower(index: number): AsmLine[] {
  const positive = label('power_positive', index);
  const multiply = label('power_multiply', index);
  const loop = label('power_loop', index);
  const store = label('power_store', index);
  return [
    ...popPair(),
    ...truncatePair(),
    comment('rax = base, rbx = exponent'),
    ins('cmp', reg('rbx'), imm(0)),
    ins('jg', target(positive)),
    ins('xor', reg('rax'), reg('rax')),
    ins('jmp', target(store)),
    at(positive),
    ins('mov', reg('rcx'), reg('rax')),
    comment('bases -1, 0 and 1 skip the loop: rax + 1 is at most 2 unsigned'),
    ins('mov', reg('rdx'), reg('rax')),
    ins('inc', reg('rdx')),
    ins('cmp', reg('rdx'), imm(2)),
    ins('ja', target(multiply)),
    ins('test', reg('rbx'), imm(1)),
    ins('jnz', target(store)),
    comment('even exponent: -1 becomes 1, 0 and 1 stay'),
    ins('imul', reg('rax'), reg('rax')),
    ins('jmp', target(store)),
    at(multiply),
    ins('dec', reg('rbx')),
    ins('jz', target(store)),
    at(loop),
    ins('imul', reg('rax'), reg('rcx')),
    ins('jo', handler(Handlers.registerOverflow)),
    ins('dec', reg('rbx')),
    ins('jnz', target(loop)),
    at(store),
    ...pushInteger(),
  ];
}

function genFactorial(index: number): AsmLine[] {
  const loop = label('factorial_loop', index);
  const store = label('factorial_store', index);
  return [
    ...popInto(Cells.a),
    ins('cvttsd2si', reg('rcx'), mem(Cells.a)),
    comment('zero or negative input yields 0'),
    ins('xor', reg('rax'), reg('rax')),
    ins('cmp', reg('rcx'), imm(0)),
    ins('jle', target(store)),
    ins('mov', reg('rax'), imm(1)),
    at(loop),
    ins('imul', reg('rax'), reg('rcx')),
    ins('jo', handler(Handlers.registerOverflow)),
    ins('dec', reg('rcx')),
    ins('jnz', target(loop)),
    at(store),
    ...pushInteger(),
  ];
}

function genUnary(mnemonic: 'fabs' | 'fsin' | 'fcos' | 'fsqrt'): AsmLine[] {
  return [
    ...popInto(Cells.a),
    ins('fld', mem(Cells.a)),
    ins(mnemonic),
    ins('fstp', mem(Cells.a)),
    ...pushResult(),
  ];
}

function genTan(): AsmLine[] {
  return [
    ...popInto(Cells.a),
    ins('fld', mem(Cells.a)),
    ins('fsincos'),
    comment('st(0) = cos, st(1) = sin'),
    ins('fstp', mem(Cells.b)),
    ins('fdiv', mem(Cells.b)),
    ins('fstp', mem(Cells.a)),
    ...pushResult(),
  ];
}

function genDup(): AsmLine[] {
  return [ins('pop', reg('rax')), ins('push', reg('rax')), ins('push', reg('rax'))];
}

function genSwap(): AsmLine[] {
  return [
    ins('pop', reg('rax')),
    ins('pop', reg('rbx')),
    ins('push', reg('rax')),
    ins('push', reg('rbx')),
  ];
}

const OPERATION_BODIES: Readonly<Record<OperationKind, (index: number) => AsmLine[]>> = {
  Plus: () => genArithmetic('fadd'),
  Minus: () => genArithmetic('fsub'),
  Multiply: () => genArithmetic('fmul'),
  Divide: genDivide,
  Modulus: genModulus,
  Power: genPower,
  Abs: () => genUnary('fabs'),
  Sin: () => genUnary('fsin'),
  Cos: () => genUnary('fcos'),
  Tan: genTan,
  Sqrt: () => genUnary('fsqrt'),
  Dup: genDup,
  Swap: genSwap,
  Factorial: genFactorial,
};

/**
 * Code block for the instruction at position `index` of the program.
 *
 * Every block is: title comment, depth guard, body, depth bookkeeping. Guard and bookkeeping both
 * come from `STACK_EFFECTS`.
 */
export function lowerInstruction(instr: Instruction, index: number): AsmLine[] {
  const effect = STACK_EFFECTS[instr.kind];
  const title = instr.kind === 'Push' ? `PUSH ${instr.value}` : TITLES[instr.kind];
  const body = instr.kind === 'Push' ? genPush(instr.value) : OPERATION_BODIES[instr.kind](index);
  return [
    blank(),
    comment(`[${title}]`),
    ...guard(effect.requires),
    ...body,
    ...depthUpdate(effect.delta),
  ];
}
