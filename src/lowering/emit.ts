import type { AsmLine, AsmProgram } from '../amd64/asm.js';
import { asciz, at, blank, comment, imm, ins, label, mem, reg, sym, target } from '../amd64/asm.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { IrProgram } from '../ir/instructions.js';
import { isPush } from '../ir/instructions.js';
import { lowerInstruction } from './blocks.js';
import type { MessageName } from './constants.js';
import { Cells, constantSymbol, Handlers, MESSAGE_NAMES, Messages } from './constants.js';

export interface EmitOptions {
  /** Insert an `int 3` breakpoint right after the entry sequence. */
  debug?: boolean;
  /** Source name used in diagnostics. */
  sourceName?: string;
  /** Original expression, recorded in the banner comment. */
  expression?: string;
}

function diag(diagnostics: Diagnostic[], file: string, message: string): void {
  diagnostics.push({ id: DiagnosticIds.EmitError, severity: 'error', message, file });
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function dataSection(ir: IrProgram): AsmLine[] {
  const lines: AsmLine[] = [
    { kind: 'directive', text: '.data' },
    { kind: 'data', name: Cells.a, directive: '.double', value: '0.0' },
    { kind: 'data', name: Cells.b, directive: '.double', value: '0.0' },
    { kind: 'data', name: Cells.depth, directive: '.quad', value: '0' },
    { kind: 'data', name: Cells.int, directive: '.quad', value: '0' },
    blank(),
  ];
  for (const name of MESSAGE_NAMES) {
    lines.push({ kind: 'data', name, directive: '.asciz', value: asciz(Messages[name]) });
  }
  lines.push(blank());
  for (const literal of ir.constants) {
    const name = constantSymbol(literal);
    lines.push({ kind: 'data', name, directive: '.double', value: literal });
  }
  return lines;
}

function entry(debug: boolean): AsmLine[] {
  return [
    blank(),
    { kind: 'directive', text: '.text' },
    at(label('main')),
    ins('push', reg('rbp')),
    comment('the evaluation stack starts empty'),
    ins('mov', mem(Cells.depth), imm(0)),
    ...(debug ? [comment('debug break'), ins('int', imm(3))] : []),
  ];
}

function footer(): AsmLine[] {
  const errorExit = (handlerName: string, message: MessageName): AsmLine[] => [
    blank(),
    at(label(handlerName)),
    ins('lea', reg('rdi'), sym(message)),
    ins('jmp', target(label(Handlers.printAndExit))),
  ];

  return [
    blank(),
    comment('[PRINT]'),
    comment('exactly one value must remain'),
    ins('mov', reg('rax'), mem(Cells.depth)),
    ins('cmp', reg('rax'), imm(1)),
    ins('jb', target(label(Handlers.stackError))),
    ins('ja', target(label(Handlers.stackTooFull))),
    ins('pop', reg('rax')),
    ins('mov', mem(Cells.a), reg('rax')),
    ins('lea', reg('rdi'), sym('fmt')),
    ins('movq', reg('xmm0'), mem(Cells.a)),
    ins('mov', reg('rax'), imm(1)),
    ins('call', sym('printf')),
    ins('pop', reg('rbp')),
    ins('xor', reg('rax'), reg('rax')),
    ins('ret'),
    ...errorExit(Handlers.divisionByZero, 'div_zero'),
    ...errorExit(Handlers.registerOverflow, 'overflow'),
    ...errorExit(Handlers.stackTooFull, 'stack_full'),
    blank(),
    at(label(Handlers.stackError)),
    ins('lea', reg('rdi'), sym('stack_err')),
    comment(`falls through to ${Handlers.printAndExit}`),
    blank(),
    comment('rdi holds the message; the stack may be unbalanced here, so realign it'),
    at(label(Handlers.printAndExit)),
    ins('and', reg('rsp'), imm(-16)),
    ins('xor', reg('rax'), reg('rax')),
    ins('call', sym('printf')),
    ins('mov', reg('rdi'), imm(0)),
    ins('call', sym('exit')),
  ];
}

/**
 * Lower a built program to a complete x86-64 assembly program.
 *
 * Layout: data section (scratch cells, messages, one `.double` per pooled literal in pool order),
 * `main` entry, one block per instruction in program order, then the result printer and the shared
 * error handlers. Records an error diagnostic when the constant pool cannot be laid out.
 */
export function emitProgram(
  ir: IrProgram,
  diagnostics: Diagnostic[],
  options: EmitOptions = {},
): AsmProgram {
  const file = options.sourceName ?? '<expr>';

  const bySymbol = new Map<string, string>();
  for (const literal of ir.constants) {
    const name = constantSymbol(literal);
    const prev = bySymbol.get(name);
    if (prev !== undefined) {
      diag(diagnostics, file, `Constants "${prev}" and "${literal}" both map to symbol ${name}`);
    } else {
      bySymbol.set(name, literal);
    }
  }
  const pooled = new Set(ir.constants);
  for (const instr of ir.instructions) {
    if (isPush(instr) && !pooled.has(instr.value)) {
      diag(diagnostics, file, `Pushed literal "${instr.value}" is missing from the constant pool`);
    }
  }

  const lines: AsmLine[] = [];
  if (options.expression !== undefined) {
    lines.push(comment(`rpnasm: ${oneLine(options.expression)}`, 'top'), blank());
  }
  lines.push(
    { kind: 'directive', text: '.intel_syntax noprefix' },
    { kind: 'directive', text: '.global main' },
    blank(),
    ...dataSection(ir),
    ...entry(options.debug ?? false),
  );
  ir.instructions.forEach((instr, index) => {
    lines.push(...lowerInstruction(instr, index));
  });
  lines.push(...footer());

  return { lines };
}
