import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { writeAsm } from '../src/formats/writeAsm.js';
import { emitProgram } from '../src/lowering/emit.js';
import { asmFor } from './test-helpers.js';

describe('program emission', () => {
  it('lays out header, data section and entry sequence', () => {
    const lines = asmFor('3 4 +').split('\n');
    expect(lines.slice(0, 27)).toEqual([
      '# rpnasm: 3 4 +',
      '',
      '.intel_syntax noprefix',
      '.global main',
      '',
      '.data',
      'a: .double 0.0',
      'b: .double 0.0',
      'depth: .quad 0',
      'ival: .quad 0',
      '',
      'fmt: .asciz "Result %g\\n"',
      'div_zero: .asciz "Attempted division by zero.  Aborting\\n"',
      'overflow: .asciz "Overflow - value out of range.  Aborting\\n"',
      'stack_err: .asciz "Insufficient entries on the stack.  Aborting\\n"',
      'stack_full: .asciz "Too many entries remaining on the stack.  Aborting\\n"',
      '',
      'const_3: .double 3',
      'const_4: .double 4',
      '',
      '.text',
      'main:',
      '        push rbp',
      '        # the evaluation stack starts empty',
      '        mov qword ptr [depth], 0',
      '',
      '        # [PUSH 3]',
    ]);
  });

  it('emits one data entry per distinct literal', () => {
    const text = asmFor('3 3 + 3 *');
    expect(text.split('\n').filter((l) => l.startsWith('const_'))).toEqual(['const_3: .double 3']);
    expect(text.split('\n').filter((l) => l === '        # [PUSH 3]')).toHaveLength(3);
  });

  it('collapses whitespace in the banner', () => {
    expect(asmFor('  3\t4   +\n').split('\n')[0]).toBe('# rpnasm: 3 4 +');
  });

  it('checks the final depth before printing', () => {
    const lines = asmFor('3 abs').split('\n');
    const start = lines.indexOf('        # [PRINT]');
    expect(lines.slice(start, start + 17)).toEqual([
      '        # [PRINT]',
      '        # exactly one value must remain',
      '        mov rax, qword ptr [depth]',
      '        cmp rax, 1',
      '        jb stack_error',
      '        ja stack_too_full',
      '        pop rax',
      '        mov qword ptr [a], rax',
      '        lea rdi, fmt',
      '        movq xmm0, qword ptr [a]',
      '        mov rax, 1',
      '        call printf',
      '        pop rbp',
      '        xor rax, rax',
      '        ret',
      '',
      'division_by_zero:',
    ]);
  });

  it('routes every handler through print_msg_and_exit', () => {
    const text = asmFor('3 abs');
    const handler = (name: string, message: string) =>
      `${name}:\n        lea rdi, ${message}\n        jmp print_msg_and_exit\n`;
    expect(text).toContain(handler('division_by_zero', 'div_zero'));
    expect(text).toContain(handler('register_overflow', 'overflow'));
    expect(text).toContain(handler('stack_too_full', 'stack_full'));

    const tail = [
      'stack_error:',
      '        lea rdi, stack_err',
      '        # falls through to print_msg_and_exit',
      '',
      '        # rdi holds the message; the stack may be unbalanced here, so realign it',
      'print_msg_and_exit:',
      '        and rsp, -16',
      '        xor rax, rax',
      '        call printf',
      '        mov rdi, 0',
      '        call exit',
      '',
    ].join('\n');
    expect(text.endsWith(tail)).toBe(true);
  });

  it('adds a breakpoint only in debug mode', () => {
    const plain = asmFor('3 abs').split('\n');
    const debug = asmFor('3 abs', { debug: true }).split('\n');
    expect(plain).not.toContain('        int 3');
    const entryEnd = debug.indexOf('        mov qword ptr [depth], 0');
    expect(debug.slice(entryEnd + 1, entryEnd + 3)).toEqual([
      '        # debug break',
      '        int 3',
    ]);
    expect(debug.length).toBe(plain.length + 2);
  });

  it('omits the banner when no expression is given', () => {
    const diagnostics: Diagnostic[] = [];
    const program = emitProgram(
      { instructions: [{ kind: 'Push', value: '1' }], constants: ['1'] },
      diagnostics,
    );
    expect(diagnostics).toEqual([]);
    expect(writeAsm(program).text.split('\n')[0]).toBe('.intel_syntax noprefix');
  });

  it('reports constants that would share a symbol', () => {
    const diagnostics: Diagnostic[] = [];
    emitProgram({ instructions: [], constants: ['1.5', '1_5'] }, diagnostics, { sourceName: 'x' });
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.EmitError,
        severity: 'error',
        message: 'Constants "1.5" and "1_5" both map to symbol const_1_5',
        file: 'x',
      },
    ]);
  });

  it('reports pushes missing from the constant pool', () => {
    const diagnostics: Diagnostic[] = [];
    emitProgram({ instructions: [{ kind: 'Push', value: '7' }], constants: [] }, diagnostics);
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Pushed literal "7" is missing from the constant pool',
    ]);
  });

  it('honours the requested line ending', () => {
    const text = asmFor('3 abs', { lineEnding: '\r\n' });
    expect(text.split('\r\n')[2]).toBe('.intel_syntax noprefix');
    expect(text.replace(/\r\n/g, '').includes('\n')).toBe(false);
    expect(text.endsWith('        call exit\r\n')).toBe(true);
  });
});
