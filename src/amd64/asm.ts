/**
 * Structured x86-64 assembly, rendered to GNU `as` Intel syntax (`noprefix`) by `writeAsm`.
 *
 * Code blocks are built from these values instead of text templates so that labels, symbols and
 * operands stay data until the final render.
 */

export type Register =
  | 'rax'
  | 'rbx'
  | 'rcx'
  | 'rdx'
  | 'rdi'
  | 'rbp'
  | 'rsp'
  | 'xmm0';

/**
 * A code label. Labels inside loop-bearing blocks carry the owning instruction's index so that
 * repeated operations never collide.
 */
export interface AsmLabel {
  base: string;
  index?: number;
}

export type AsmOperand =
  | { kind: 'reg'; name: Register }
  | { kind: 'imm'; value: number }
  /** `qword ptr [symbol]` */
  | { kind: 'mem'; symbol: string }
  /** Bare symbol, as in `lea rdi, fmt` or `call printf`. */
  | { kind: 'sym'; name: string }
  | { kind: 'label'; label: AsmLabel };

export type DataDirective = '.double' | '.quad' | '.asciz';

export type AsmLine =
  | { kind: 'directive'; text: string }
  | { kind: 'data'; name: string; directive: DataDirective; value: string }
  | { kind: 'label'; label: AsmLabel }
  | { kind: 'instruction'; mnemonic: string; operands: AsmOperand[] }
  | { kind: 'comment'; text: string; level: 'top' | 'code' }
  | { kind: 'blank' };

export interface AsmProgram {
  lines: AsmLine[];
}

export const reg = (name: Register): AsmOperand => ({ kind: 'reg', name });
export const imm = (value: number): AsmOperand => ({ kind: 'imm', value });
export const mem = (symbol: string): AsmOperand => ({ kind: 'mem', symbol });
export const sym = (name: string): AsmOperand => ({ kind: 'sym', name });
export const target = (label: AsmLabel): AsmOperand => ({ kind: 'label', label });

export function label(base: string, index?: number): AsmLabel {
  return index === undefined ? { base } : { base, index };
}

export function ins(mnemonic: string, ...operands: AsmOperand[]): AsmLine {
  return { kind: 'instruction', mnemonic, operands };
}

export function at(l: AsmLabel): AsmLine {
  return { kind: 'label', label: l };
}

export function comment(text: string, level: 'top' | 'code' = 'code'): AsmLine {
  return { kind: 'comment', text, level };
}

export function blank(): AsmLine {
  return { kind: 'blank' };
}

export function labelName(l: AsmLabel): string {
  return l.index === undefined ? l.base : `${l.base}_${l.index}`;
}

/**
 * Escape text for an `.asciz` operand (quotes included).
 */
export function asciz(text: string): string {
  let out = '';
  for (const ch of text) {
    if (ch === '\\') out += '\\\\';
    else if (ch === '"') out += '\\"';
    else if (ch === '\n') out += '\\n';
    else if (ch === '\t') out += '\\t';
    else out += ch;
  }
  return `"${out}"`;
}
